import { z } from 'zod';
import type {
  BudgetSensitivity,
  ParsedQuery,
  RawQuery,
  ServiceType,
  Urgency,
} from '../../types/index.js';

export const ParseQueryBodySchema = z.object({
  query: z.string().max(2000),
  user_role: z.string().max(80).nullable().optional(),
  location: z.string().max(200).nullable().optional(),
  channel: z.string().max(40).nullable().optional(),
});

export type ParseQueryBody = z.infer<typeof ParseQueryBodySchema>;

export function toRawQuery(body: ParseQueryBody): RawQuery {
  return {
    query: body.query,
    userRole: body.user_role,
    location: body.location,
    channel: body.channel,
  };
}

/** Wire shape of POST /parse; absent labels serialize as null */
export type ParsedQueryResponse = {
  primary_intent: string;
  service_type: ServiceType | null;
  urgency: Urgency | null;
  budget_sensitivity: BudgetSensitivity | null;
  location: string | null;
  modifiers: Record<string, string>;
  quantum_ready_vector: number[];
};

export function toParsedQueryResponse(
  parsed: ParsedQuery,
): ParsedQueryResponse {
  return {
    primary_intent: parsed.primaryIntent,
    service_type: parsed.serviceType,
    urgency: parsed.urgency,
    budget_sensitivity: parsed.budgetSensitivity,
    location: parsed.location,
    modifiers: { ...parsed.modifiers },
    quantum_ready_vector: [...parsed.quantumReadyVector],
  };
}
