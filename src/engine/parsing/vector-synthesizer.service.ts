import { Injectable } from '@nestjs/common';
import type {
  BudgetSensitivity,
  QuantumReadyVector,
  Urgency,
} from '../../types/index.js';

// Intents outside this table encode as 0.0
const INTENT_WEIGHTS: ReadonlyMap<string, number> = new Map([
  ['plumbing_service', 0.1],
  ['roofing_service', 0.2],
  ['hvac_service', 0.3],
  ['electrical_service', 0.4],
  ['cement_service', 0.5],
  ['general_service', 0.0],
]);

const URGENCY_WEIGHTS: Readonly<Record<Urgency, number>> = {
  emergency: 1.0,
  same_day: 0.7,
  soon: 0.5,
  flexible: 0.2,
};

const BUDGET_WEIGHTS: Readonly<Record<BudgetSensitivity, number>> = {
  low: 0.2,
  medium: 0.5,
  high: 0.8,
};

const ABSENT_WEIGHT = 0.0;

@Injectable()
export class VectorSynthesizerService {
  /**
   * Fixed categorical encoding: [intent, urgency, budget].
   * Every input, including an unmapped intent or an absent label, has a value.
   */
  synthesize(
    primaryIntent: string,
    urgency: Urgency | null,
    budgetSensitivity: BudgetSensitivity | null,
  ): QuantumReadyVector {
    const intentValue = INTENT_WEIGHTS.get(primaryIntent) ?? ABSENT_WEIGHT;
    const urgencyValue = urgency ? URGENCY_WEIGHTS[urgency] : ABSENT_WEIGHT;
    const budgetValue = budgetSensitivity
      ? BUDGET_WEIGHTS[budgetSensitivity]
      : ABSENT_WEIGHT;

    return [intentValue, urgencyValue, budgetValue];
  }
}
