// Keyword tables → intent, service type, urgency, budget

import { Injectable } from '@nestjs/common';
import {
  GENERAL_INTENT,
  SERVICE_TYPE,
  type BudgetSensitivity,
  type PrimaryIntent,
  type ServiceCategory,
  type ServiceType,
  type Urgency,
} from '../../types/index.js';

// Single-word tokens only; lookups run per token
const SERVICE_KEYWORDS: ReadonlyMap<string, ServiceCategory> = new Map([
  ['plumber', 'plumbing'],
  ['plumbing', 'plumbing'],
  ['leak', 'leak'],
  ['pipe', 'leak'],
  ['drain', 'drain'],
  ['toilet', 'toilet'],
  ['roof', 'roofing'],
  ['roofer', 'roofing'],
  ['hvac', 'hvac'],
  ['furnace', 'hvac'],
  ['electrician', 'electrical'],
  ['electrical', 'electrical'],
  ['cement', 'cement'],
  ['concrete', 'cement'],
]);

const SERVICE_TYPE_TOKENS: ReadonlySet<string> = new Set<string>(SERVICE_TYPE);

// Scanned in order, first substring hit wins
const URGENCY_PHRASES: ReadonlyArray<{ phrase: string; urgency: Urgency }> = [
  { phrase: 'now', urgency: 'emergency' },
  { phrase: 'asap', urgency: 'emergency' },
  { phrase: 'urgent', urgency: 'emergency' },
  { phrase: 'tonight', urgency: 'emergency' },
  { phrase: 'today', urgency: 'same_day' },
  { phrase: 'tomorrow', urgency: 'soon' },
  { phrase: 'whenever', urgency: 'flexible' },
];

const BUDGET_PHRASES: ReadonlyArray<{
  phrase: string;
  budget: BudgetSensitivity;
}> = [
  { phrase: 'cheap', budget: 'low' },
  { phrase: 'affordable', budget: 'low' },
  { phrase: 'budget', budget: 'low' },
  { phrase: 'expensive', budget: 'high' },
  { phrase: 'premium', budget: 'high' },
  { phrase: 'fair price', budget: 'medium' },
];

function isServiceType(token: string): token is ServiceType {
  return SERVICE_TYPE_TOKENS.has(token);
}

@Injectable()
export class KeywordClassifierService {
  /**
   * Earliest token with a service keyword decides the intent.
   * Table order plays no part.
   */
  extractPrimaryIntent(tokens: readonly string[]): PrimaryIntent {
    for (const token of tokens) {
      const category = SERVICE_KEYWORDS.get(token);
      if (category) return `${category}_service`;
    }
    return GENERAL_INTENT;
  }

  extractServiceType(tokens: readonly string[]): ServiceType | null {
    for (const token of tokens) {
      if (isServiceType(token)) return token;
    }
    return null;
  }

  /** Substring scan over the normalized text, so "now" also hits "know". */
  extractUrgency(normalizedText: string): Urgency | null {
    for (const entry of URGENCY_PHRASES) {
      if (normalizedText.includes(entry.phrase)) return entry.urgency;
    }
    return null;
  }

  extractBudget(normalizedText: string): BudgetSensitivity | null {
    for (const entry of BUDGET_PHRASES) {
      if (normalizedText.includes(entry.phrase)) return entry.budget;
    }
    return null;
  }
}
