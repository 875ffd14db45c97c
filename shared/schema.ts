import { z } from "zod";

// ============================================================================
// Form identifiers
// ============================================================================

export const formIds = ["sum", "a_b", "d", "e_f"] as const;

export type FormId = (typeof formIds)[number];

export const formIdSchema = z.enum(formIds);

export const formTitles = {
  sum: "Official Form 106Sum",
  a_b: "Official Form 106A/B",
  d: "Official Form 106D",
  e_f: "Official Form 106 E/F",
} as const satisfies Record<FormId, string>;

export type FormTitle = (typeof formTitles)[FormId];

// ============================================================================
// Checkbox fields
// ============================================================================

export const CHECKBOX_UNREADABLE = "Checkbox unreadable";

/**
 * A checkbox category as it appears inside a record: the labels of the checked
 * options, or the unreadable sentinel when the region's boxes could not be decoded.
 */
export const checkboxFieldSchema = z.union([
  z.array(z.string()),
  z.literal(CHECKBOX_UNREADABLE),
]);

export type CheckboxField = z.infer<typeof checkboxFieldSchema>;

// ============================================================================
// Creditor records (Schedules D and E/F)
// ============================================================================

export const otherCreditorSchema = z.object({
  key: z.string(),
  address: z.string(),
  acct: z.string(),
});

export type OtherCreditor = z.infer<typeof otherCreditorSchema>;

export const priorityAmountsSchema = z.object({
  priority_amount: z.string(),
  non_priority_amount: z.string(),
});

export type PriorityAmounts = z.infer<typeof priorityAmountsSchema>;

export const unsecuredCreditorSchema = z.object({
  kind: z.literal("unsecured"),
  key: z.string(),
  name: z.string(),
  acct: z.string(),
  total: z.string(),
  date: z.string(),
  address: z.string(),
  claim_type_other: z.string(),
  priority_amounts: priorityAmountsSchema.optional(),
  debtor: checkboxFieldSchema,
  offset: checkboxFieldSchema,
  info: checkboxFieldSchema,
  claim_type: checkboxFieldSchema,
  community: checkboxFieldSchema,
  other_creditors: z.array(otherCreditorSchema),
});

export type UnsecuredCreditor = z.infer<typeof unsecuredCreditorSchema>;

export const securedCreditorSchema = z.object({
  kind: z.literal("secured"),
  key: z.string(),
  claim: z.string(),
  collateral: z.string(),
  unsecured: z.string(),
  name: z.string(),
  property: z.string(),
  address: z.string(),
  claim_type_other: z.string(),
  date: z.string(),
  acct: z.string(),
  debtor: checkboxFieldSchema,
  info: checkboxFieldSchema,
  claim_type: checkboxFieldSchema,
  community: checkboxFieldSchema,
  other_creditors: z.array(otherCreditorSchema),
});

export type SecuredCreditor = z.infer<typeof securedCreditorSchema>;

// ============================================================================
// Property records (Schedule A/B)
// ============================================================================

export const realEstateSchema = z.object({
  kind: z.literal("real_estate"),
  key: z.string(),
  address: z.string(),
  city: z.string(),
  state: z.string(),
  zip: z.string(),
  property_value: z.string(),
  your_property_value: z.string(),
  other: z.string(),
  ownership_interest: z.string(),
  county: z.string(),
  property_id: z.string(),
  property_interest: checkboxFieldSchema,
  debtor: checkboxFieldSchema,
});

export type RealEstate = z.infer<typeof realEstateSchema>;

export const vehicleSchema = z.object({
  kind: z.literal("vehicle"),
  key: z.string(),
  make: z.string(),
  model: z.string(),
  year: z.string(),
  mileage: z.string(),
  other_information: z.string(),
  property_value: z.string(),
  your_property_value: z.string(),
  debtor: checkboxFieldSchema,
});

export type Vehicle = z.infer<typeof vehicleSchema>;

export const otherPropertySchema = z.object({
  kind: z.literal("other_property"),
  key: z.string(),
  make: z.string(),
  model: z.string(),
  year: z.string(),
  other: z.string(),
  property_value: z.string(),
  your_property_value: z.string(),
  debtor: checkboxFieldSchema,
});

export type OtherProperty = z.infer<typeof otherPropertySchema>;

export const propertyEntrySchema = z.discriminatedUnion("kind", [
  realEstateSchema,
  vehicleSchema,
  otherPropertySchema,
]);

export type PropertyEntry = z.infer<typeof propertyEntrySchema>;

/**
 * An item from parts 3 through 7 of Schedule A/B. Entries whose text carries
 * dollar amounts keep each amount run separately; anything else is kept as text.
 */
export const propertyLineItemSchema = z.union([
  z.object({ key: z.string(), amounts: z.array(z.string()) }),
  z.object({ key: z.string(), text: z.string() }),
]);

export type PropertyLineItem = z.infer<typeof propertyLineItemSchema>;

export const abTotalsSchema = z.object({
  total_real_estate: z.string(),
  total_vehicles: z.string(),
  total_household: z.string(),
  total_financial_assets: z.string(),
  total_business: z.string(),
  total_farm: z.string(),
  total_other: z.string(),
  total_personal: z.string(),
  total_all: z.string(),
});

export type AbTotals = z.infer<typeof abTotalsSchema>;

// ============================================================================
// Form results
// ============================================================================

export const FORM_NOT_FOUND = "Failed to find document.";
export const FORM_FAILED = "Failed to extract document.";

export const formErrorSchema = z.object({
  error: z.string(),
});

export type FormError = z.infer<typeof formErrorSchema>;

export const summaryTextFields = [
  "1a", "1b", "1c", "2", "3a", "3b", "3_total", "4", "5", "8",
  "9a", "9b", "9c", "9d", "9e", "9f", "9g",
] as const;

export type SummaryTextField = (typeof summaryTextFields)[number];

export const summaryFlagsSchema = z.object({
  "7/11/13": z.boolean(),
  amended: z.boolean(),
  consumer_debts: z.boolean(),
  non_consumer_debts: z.boolean(),
});

export type SummaryFlags = z.infer<typeof summaryFlagsSchema>;
export type SummaryResult = Partial<Record<SummaryTextField, string>> & SummaryFlags;

export const statisticsFields = ["6a", "6b", "6c", "6d", "6e", "6f", "6g", "6h", "6i", "6j"] as const;

export type StatisticsField = (typeof statisticsFields)[number];

export const scheduleAbResultSchema = z.object({
  cars_land_and_crafts: z.array(propertyEntrySchema),
  debtors: z.array(z.string()),
  other_property: z.array(propertyLineItemSchema),
  totals: abTotalsSchema.nullable(),
});

export type ScheduleAbResult = z.infer<typeof scheduleAbResultSchema>;

export const scheduleDResultSchema = z.object({
  creditors: z.array(securedCreditorSchema),
});

export type ScheduleDResult = z.infer<typeof scheduleDResultSchema>;

export const scheduleEfResultSchema = z.object({
  debtor1: z.string(),
  debtor2: z.string(),
  creditors: z.array(unsecuredCreditorSchema),
  statistics: z.record(z.enum(statisticsFields), z.string()).optional(),
});

export type ScheduleEfResult = z.infer<typeof scheduleEfResultSchema>;

export type FormResult<T> = T | FormError;

export function isFormError<T extends object>(result: FormResult<T>): result is FormError {
  return "error" in result;
}

// ============================================================================
// Aggregate
// ============================================================================

export interface BankruptcyExtraction {
  info: {
    debtor_1: string | null;
    debtor_2: string | null;
  };
  form_106_ab: FormResult<ScheduleAbResult>;
  form_106_d: FormResult<ScheduleDResult>;
  form_106_ef: FormResult<ScheduleEfResult>;
  form_106_sum: FormResult<SummaryResult>;
}

export interface FormPayloads {
  sum: SummaryResult;
  a_b: ScheduleAbResult;
  d: ScheduleDResult;
  e_f: ScheduleEfResult;
}
