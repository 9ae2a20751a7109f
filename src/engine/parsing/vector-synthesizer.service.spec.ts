import { VectorSynthesizerService } from './vector-synthesizer.service.js';

describe('VectorSynthesizerService', () => {
  let synthesizer: VectorSynthesizerService;

  beforeEach(() => {
    synthesizer = new VectorSynthesizerService();
  });

  it('general_service with no labels → [0, 0, 0]', () => {
    expect(synthesizer.synthesize('general_service', null, null)).toEqual([
      0.0, 0.0, 0.0,
    ]);
  });

  it('plumbing / emergency / low → [0.1, 1.0, 0.2]', () => {
    expect(synthesizer.synthesize('plumbing_service', 'emergency', 'low')).toEqual(
      [0.1, 1.0, 0.2],
    );
  });

  it('hvac / same_day / absent → [0.3, 0.7, 0.0]', () => {
    expect(synthesizer.synthesize('hvac_service', 'same_day', null)).toEqual([
      0.3, 0.7, 0.0,
    ]);
  });

  it('electrical / soon / high → [0.4, 0.5, 0.8]', () => {
    expect(synthesizer.synthesize('electrical_service', 'soon', 'high')).toEqual(
      [0.4, 0.5, 0.8],
    );
  });

  it('cement / flexible / medium → [0.5, 0.2, 0.5]', () => {
    expect(synthesizer.synthesize('cement_service', 'flexible', 'medium')).toEqual(
      [0.5, 0.2, 0.5],
    );
  });

  it('intent without a weight → 0.0', () => {
    expect(synthesizer.synthesize('toilet_service', 'emergency', null)).toEqual(
      [0.0, 1.0, 0.0],
    );
    expect(synthesizer.synthesize('unknown_service', null, 'low')).toEqual([
      0.0, 0.0, 0.2,
    ]);
  });

  it('always three elements', () => {
    expect(synthesizer.synthesize('roofing_service', null, null)).toHaveLength(
      3,
    );
  });
});
