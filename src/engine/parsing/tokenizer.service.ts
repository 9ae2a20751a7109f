import { Injectable } from '@nestjs/common';

// Articles, prepositions, pronouns and politeness words
const STOPWORDS: ReadonlySet<string> = new Set([
  'i',
  'need',
  'a',
  'an',
  'the',
  'to',
  'for',
  'my',
  'in',
  'at',
  'on',
  'of',
  'please',
  'help',
  'with',
  'and',
  'is',
  'it',
  'that',
  'can',
  'you',
]);

@Injectable()
export class TokenizerService {
  /**
   * Normalized text → tokens, stopwords dropped, input order kept.
   */
  tokenize(normalizedText: string): string[] {
    return normalizedText
      .split(/\s+/)
      .filter((token) => token.length > 0 && !STOPWORDS.has(token));
  }
}
