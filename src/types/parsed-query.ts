import type {
  BudgetSensitivity,
  PrimaryIntent,
  ServiceType,
  Urgency,
} from './enums.js';

/** undefined → default applies, null → field is absent */
export type RawQuery = {
  query: string;
  userRole?: string | null;
  location?: string | null;
  channel?: string | null;
};

/** [intent, urgency, budget] */
export type QuantumReadyVector = readonly [number, number, number];

export type ParsedQuery = {
  readonly primaryIntent: PrimaryIntent;
  readonly serviceType: ServiceType | null;
  readonly urgency: Urgency | null;
  readonly budgetSensitivity: BudgetSensitivity | null;
  readonly location: string | null;
  readonly modifiers: Readonly<Record<string, string>>;
  readonly quantumReadyVector: QuantumReadyVector;
};
