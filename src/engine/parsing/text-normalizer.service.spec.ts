import { TextNormalizerService } from './text-normalizer.service.js';

describe('TextNormalizerService', () => {
  let normalizer: TextNormalizerService;

  beforeEach(() => {
    normalizer = new TextNormalizerService();
  });

  it('lowercases and strips punctuation', () => {
    expect(normalizer.normalize('Need a PLUMBER, ASAP!')).toBe(
      'need a plumber asap',
    );
  });

  it('collapses whitespace runs and trims', () => {
    expect(normalizer.normalize('  roof \t\n leak   now  ')).toBe(
      'roof leak now',
    );
  });

  it('keeps digits', () => {
    expect(normalizer.normalize('2nd floor toilet #3')).toBe(
      '2nd floor toilet 3',
    );
  });

  it('replaces non-ASCII letters with spaces', () => {
    expect(normalizer.normalize("C'est l'été")).toBe('c est l t');
  });

  it('empty string → empty string', () => {
    expect(normalizer.normalize('')).toBe('');
  });

  it('punctuation only → empty string', () => {
    expect(normalizer.normalize('?!... --- ***')).toBe('');
  });
});
