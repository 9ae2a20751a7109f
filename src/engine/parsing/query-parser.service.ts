// Free-text service request → ParsedQuery
// normalize → tokenize → classify → synthesize, no state kept between calls

import { Injectable, Logger } from '@nestjs/common';
import type { ParsedQuery, RawQuery } from '../../types/index.js';
import { TextNormalizerService } from './text-normalizer.service.js';
import { TokenizerService } from './tokenizer.service.js';
import { KeywordClassifierService } from './keyword-classifier.service.js';
import { VectorSynthesizerService } from './vector-synthesizer.service.js';

export const DEFAULT_USER_ROLE = 'customer';
export const DEFAULT_CHANNEL = 'web';

@Injectable()
export class QueryParserService {
  private readonly logger = new Logger(QueryParserService.name);

  constructor(
    private readonly normalizer: TextNormalizerService,
    private readonly tokenizer: TokenizerService,
    private readonly classifier: KeywordClassifierService,
    private readonly synthesizer: VectorSynthesizerService,
  ) {}

  parse(input: RawQuery): ParsedQuery {
    const normalized = this.normalizer.normalize(input.query);
    const tokens = this.tokenizer.tokenize(normalized);

    const primaryIntent = this.classifier.extractPrimaryIntent(tokens);
    const serviceType = this.classifier.extractServiceType(tokens);
    const urgency = this.classifier.extractUrgency(normalized);
    const budgetSensitivity = this.classifier.extractBudget(normalized);

    const parsed: ParsedQuery = {
      primaryIntent,
      serviceType,
      urgency,
      budgetSensitivity,
      location: input.location ?? null,
      modifiers: this.buildModifiers(input),
      quantumReadyVector: this.synthesizer.synthesize(
        primaryIntent,
        urgency,
        budgetSensitivity,
      ),
    };

    this.logger.debug(
      `Parsed ${tokens.length} tokens → ${primaryIntent} (urgency=${urgency ?? '-'}, budget=${budgetSensitivity ?? '-'})`,
    );
    return parsed;
  }

  /** undefined falls back to the default; null or "" leaves the key out */
  private buildModifiers(input: RawQuery): Record<string, string> {
    const userRole =
      input.userRole === undefined ? DEFAULT_USER_ROLE : input.userRole;
    const channel = input.channel === undefined ? DEFAULT_CHANNEL : input.channel;

    const modifiers: Record<string, string> = {};
    if (userRole) modifiers.user_role = userRole;
    if (channel) modifiers.channel = channel;
    return modifiers;
  }
}
