import { Module } from '@nestjs/common';
import { TextNormalizerService } from './parsing/text-normalizer.service.js';
import { TokenizerService } from './parsing/tokenizer.service.js';
import { KeywordClassifierService } from './parsing/keyword-classifier.service.js';
import { VectorSynthesizerService } from './parsing/vector-synthesizer.service.js';
import { QueryParserService } from './parsing/query-parser.service.js';

const providers = [
  // Stage 1-2
  TextNormalizerService,
  TokenizerService,
  // Stage 3
  KeywordClassifierService,
  // Stage 4
  VectorSynthesizerService,
  // Assembly
  QueryParserService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
