/**
 * Record assemblers: turn the ordered field values read from one form section
 * into a typed record. Each layout has a fixed positional contract; a list
 * shorter than the contract is rejected with `PartialRecordError`.
 */

import {
  CHECKBOX_UNREADABLE,
  statisticsFields,
  summaryTextFields,
  type AbTotals,
  type CheckboxField,
  type OtherProperty,
  type PriorityAmounts,
  type PropertyLineItem,
  type RealEstate,
  type SecuredCreditor,
  type StatisticsField,
  type SummaryResult,
  type UnsecuredCreditor,
  type Vehicle,
} from "@shared/schema";
import type { CheckboxCategory, CheckboxRead } from "./checkbox";
import { PartialRecordError } from "./errors";

function requireFields(record: string, fields: readonly string[], expected: number): void {
  if (fields.length < expected) {
    throw new PartialRecordError(record, expected, fields.length);
  }
}

const stripNewlines = (value: string): string => value.replaceAll("\n", "");

/** Field value counted from the end of the list (`-1` is the last field). */
const fromEnd = (fields: readonly string[], offset: number): string => fields[fields.length - offset];

/** Copy one checkbox category out of a decoded region. */
export function checkboxField(read: CheckboxRead, category: CheckboxCategory): CheckboxField {
  return read.readable ? read.boxes[category] : CHECKBOX_UNREADABLE;
}

// ============================================================================
// Schedule E/F
// ============================================================================

/** Item 2 entries carry the priority split; item 4 entries do not. */
export const isPriorityKey = (key: string): boolean => key.includes("2.");

export const PRIORITY_FIELDS = 10;
export const NONPRIORITY_FIELDS = 8;

/** The priority and nonpriority amounts sit right before the date. */
export function assemblePriorityAmounts(fields: readonly string[]): PriorityAmounts {
  return {
    priority_amount: fromEnd(fields, 6),
    non_priority_amount: fromEnd(fields, 5),
  };
}

export function assembleUnsecuredCreditor(
  fields: readonly string[],
  boxes: CheckboxRead,
  sectionKey: string,
): UnsecuredCreditor {
  const priority = isPriorityKey(sectionKey);
  requireFields("Unsecured creditor", fields, priority ? PRIORITY_FIELDS : NONPRIORITY_FIELDS);

  const creditor: UnsecuredCreditor = {
    kind: "unsecured",
    key: stripNewlines(fields[0]),
    name: fields[1],
    acct: fields[2],
    total: fields[3],
    date: fromEnd(fields, 4),
    address: fromEnd(fields, 3),
    claim_type_other: fromEnd(fields, 2) + fromEnd(fields, 1),
    debtor: checkboxField(boxes, "debtor"),
    offset: checkboxField(boxes, "offset"),
    info: checkboxField(boxes, "info"),
    claim_type: checkboxField(boxes, "claim_type"),
    community: checkboxField(boxes, "community"),
    other_creditors: [],
  };

  if (priority) {
    creditor.priority_amounts = assemblePriorityAmounts(fields);
  }
  return creditor;
}

// ============================================================================
// Schedule D
// ============================================================================

export const SECURED_FIELDS = 12;

export function assembleSecuredCreditor(fields: readonly string[], boxes: CheckboxRead): SecuredCreditor {
  requireFields("Secured creditor", fields, SECURED_FIELDS);

  return {
    kind: "secured",
    key: fields[0],
    claim: fields[1],
    collateral: fields[2],
    unsecured: fields[3],
    name: fields[4],
    property: fields[6],
    address: fields[7],
    claim_type_other: fields[8],
    date: fields[9],
    acct: fields[11],
    debtor: checkboxField(boxes, "debtor"),
    info: checkboxField(boxes, "info"),
    claim_type: checkboxField(boxes, "claim_type"),
    community: checkboxField(boxes, "community"),
    other_creditors: [],
  };
}

// ============================================================================
// Schedule A/B
// ============================================================================

export function assembleRealEstate(key: string, fields: readonly string[], boxes: CheckboxRead): RealEstate {
  requireFields("Real estate", fields, 9);

  return {
    kind: "real_estate",
    key,
    address: fields[0],
    city: fields[1],
    state: fields[2],
    zip: fields[3],
    property_value: fields[4],
    your_property_value: fields[5],
    other: fields[6],
    ownership_interest: fields[7],
    county: fields[8],
    property_id: fields.length === 10 ? fields[9] : "",
    property_interest: checkboxField(boxes, "property"),
    debtor: checkboxField(boxes, "debtor"),
  };
}

export function assembleVehicle(key: string, fields: readonly string[], boxes: CheckboxRead): Vehicle {
  requireFields("Vehicle", fields, 8);

  return {
    kind: "vehicle",
    key,
    make: fields[0],
    model: fields[1],
    year: fields[2],
    mileage: fields[3],
    other_information: fields[5],
    property_value: fields[6],
    your_property_value: fields[7],
    debtor: checkboxField(boxes, "debtor"),
  };
}

export function assembleOtherProperty(key: string, fields: readonly string[], boxes: CheckboxRead): OtherProperty {
  requireFields("Other property", fields, 7);

  return {
    kind: "other_property",
    key,
    make: fields[0],
    model: fields[1],
    year: fields[2],
    other: fields[4],
    property_value: fields[5],
    your_property_value: fields[6],
    debtor: checkboxField(boxes, "debtor"),
  };
}

const AMOUNT_RUN = /.*?\$[\d., $]+/gm;

/**
 * Split an item's rows into description-plus-amount runs. Rows without any
 * dollar amount are kept whole as text.
 */
export function assembleLineItem(key: string, rows: readonly string[]): PropertyLineItem {
  const joined = rows.join(" ");
  const amounts = joined.match(AMOUNT_RUN);
  return amounts ? { key, amounts } : { key, text: joined };
}

const TOTAL_AMOUNT = /\$(.*?) /g;

/** Part 8 of Schedule A/B: ten dollar amounts, the ninth of which is not kept. */
export function assembleAbTotals(rows: readonly string[]): AbTotals {
  const amounts = Array.from(`${rows.join(" ")} `.matchAll(TOTAL_AMOUNT), (match) => match[1]);
  requireFields("Schedule A/B totals", amounts, 10);

  return {
    total_real_estate: amounts[0],
    total_vehicles: amounts[1],
    total_household: amounts[2],
    total_financial_assets: amounts[3],
    total_business: amounts[4],
    total_farm: amounts[5],
    total_other: amounts[6],
    total_personal: amounts[7],
    total_all: amounts[9],
  };
}

// ============================================================================
// Summary and statistics
// ============================================================================

/** Input positions on the summary page that carry no field of their own. */
const SUMMARY_SKIPPED = [6, 7, 10, -1, -2];

/**
 * Remove entries one after another, each index applied to the list left by the
 * previous removal; negative indices count from the end.
 */
export function removeSequentially<T>(values: readonly T[], indices: readonly number[]): T[] {
  const remaining = [...values];
  for (const index of indices) {
    const position = index < 0 ? remaining.length + index : index;
    if (position >= 0 && position < remaining.length) {
      remaining.splice(position, 1);
    }
  }
  return remaining;
}

export function assembleSummary(inputs: readonly string[], boxLines: readonly string[]): SummaryResult {
  const values = removeSequentially(inputs, SUMMARY_SKIPPED);
  const isChecked = (index: number) => boxLines[index]?.includes("√") ?? false;

  const result: SummaryResult = {
    "7/11/13": isChecked(2),
    amended: isChecked(0),
    consumer_debts: isChecked(3),
    non_consumer_debts: isChecked(4),
  };
  summaryTextFields.forEach((field, index) => {
    if (index < values.length) result[field] = values[index];
  });
  return result;
}

export function assembleStatistics(values: readonly string[]): Partial<Record<StatisticsField, string>> {
  requireFields("Statistics", values, statisticsFields.length);

  const statistics: Partial<Record<StatisticsField, string>> = {};
  statisticsFields.forEach((field, index) => {
    statistics[field] = values[index];
  });
  return statistics;
}
