// Canonical label enums

export const URGENCY = ['emergency', 'same_day', 'soon', 'flexible'] as const;
export type Urgency = (typeof URGENCY)[number];

export const BUDGET_SENSITIVITY = ['low', 'medium', 'high'] as const;
export type BudgetSensitivity = (typeof BUDGET_SENSITIVITY)[number];

export const SERVICE_CATEGORY = [
  'plumbing',
  'leak',
  'drain',
  'toilet',
  'roofing',
  'hvac',
  'electrical',
  'cement',
] as const;
export type ServiceCategory = (typeof SERVICE_CATEGORY)[number];

/** Fine-grained sub-categories, returned verbatim from the matching token */
export const SERVICE_TYPE = [
  'leak',
  'drain',
  'toilet',
  'hvac',
  'cement',
  'concrete',
] as const;
export type ServiceType = (typeof SERVICE_TYPE)[number];

export const GENERAL_INTENT = 'general_service';
export type PrimaryIntent = `${ServiceCategory}_service` | typeof GENERAL_INTENT;
