/**
 * DEPENDENCIES
 * Consumed by: RiskRewardForm.tsx, risk-reward-report.ts, useStore.ts
 * Consumes: zod, @/types
 * Risk-sensitive: YES — guards the tickSize divisor
 * Notes: Order matters: missing fields → number parsing → zero tick size.
 *        Errors are returned, never thrown.
 */

import { z } from 'zod';
import type { RiskRewardField, RiskRewardInputs } from '@/types';

export interface RiskRewardFieldDefinition {
  key: RiskRewardField;
  name: string; // used in "missing fields" messages
  label: string;
  required: boolean;
  help: string;
  group: 'price' | 'position' | 'cost';
}

export const RISK_REWARD_FIELDS: RiskRewardFieldDefinition[] = [
  {
    key: 'avgPrice',
    name: 'Average Price',
    label: 'Average Price ($)',
    required: true,
    help: 'The average entry price of your position (e.g., 0.008, 150.25, 0.00001234)',
    group: 'price',
  },
  {
    key: 'maxAgainstPrice',
    name: 'Max Against Price',
    label: 'Max Against Price - Stop Loss ($)',
    required: true,
    help: 'Maximum price movement against your position (e.g., 0.006, 148.50)',
    group: 'price',
  },
  {
    key: 'targetPrice',
    name: 'Target Price',
    label: 'Target Price ($)',
    required: true,
    help: 'Your profit target price (e.g., 0.012, 155.75)',
    group: 'price',
  },
  {
    key: 'tickSize',
    name: 'Tick Size',
    label: 'Tick Size ($)',
    required: true,
    help: 'Minimum price movement unit (e.g., 0.001, 0.01, 0.00001)',
    group: 'price',
  },
  {
    key: 'numLots',
    name: 'Number of Lots',
    label: 'Number of Lots',
    required: true,
    help: 'Total number of lots in your position (e.g., 1, 10, 0.5)',
    group: 'position',
  },
  {
    key: 'tickValue',
    name: 'Tick Value',
    label: 'Tick Value ($)',
    required: true,
    help: 'Monetary value of one tick movement in dollars (e.g., 1, 25, 0.01)',
    group: 'position',
  },
  {
    key: 'totalLotsEntryExit',
    name: 'Total Lots for Entry/Exit',
    label: 'Total Lots for Entry/Exit',
    required: true,
    help: 'Number of lots used for entry and exit calculations',
    group: 'position',
  },
  {
    key: 'costPerLot',
    name: 'Transaction Cost per Lot',
    label: 'Transaction Cost per Lot ($)',
    required: false,
    help: 'Transaction cost charged per lot in dollars (optional - defaults to 0)',
    group: 'cost',
  },
  {
    key: 'rebatePerLot',
    name: 'Rebate per Lot',
    label: 'Rebate per Lot ($)',
    required: false,
    help: 'Rebate received per lot in dollars (optional - defaults to 0)',
    group: 'cost',
  },
];

export type RiskRewardFormValues = Partial<Record<RiskRewardField, string>>;

export type RiskRewardValidationCode = 'MISSING_FIELD' | 'INVALID_NUMBER' | 'ZERO_TICK_SIZE';

export interface RiskRewardValidationError {
  code: RiskRewardValidationCode;
  message: string;
  missingFields?: string[];
}

export type RiskRewardValidationResult =
  | { ok: true; inputs: Required<RiskRewardInputs> }
  | { ok: false; error: RiskRewardValidationError };

export const MISSING_FIELD_MESSAGE = 'Please fill in the following required fields';
export const INVALID_NUMBER_MESSAGE =
  'Please enter valid numbers in all fields. Check for any invalid characters.';
export const ZERO_TICK_SIZE_MESSAGE = 'Tick size cannot be zero';

// Plain decimal literal: sign, digits, optional fraction and exponent.
// Rejects hex, "Infinity" and other strings Number() would accept.
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const numericLiteralSchema = z
  .string()
  .trim()
  .regex(DECIMAL_LITERAL)
  .transform(Number)
  .refine((value) => Number.isFinite(value));

export function parseNumericInput(raw: string): number | null {
  const parsed = numericLiteralSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function getMissingFields(values: RiskRewardFormValues): string[] {
  return RISK_REWARD_FIELDS
    .filter((field) => field.required && !(values[field.key] ?? '').trim())
    .map((field) => field.name);
}

export function validateRiskRewardForm(values: RiskRewardFormValues): RiskRewardValidationResult {
  const missingFields = getMissingFields(values);
  if (missingFields.length > 0) {
    return {
      ok: false,
      error: {
        code: 'MISSING_FIELD',
        message: `${MISSING_FIELD_MESSAGE}: ${missingFields.join(', ')}`,
        missingFields,
      },
    };
  }

  const parsed: Partial<Record<RiskRewardField, number>> = {};
  for (const field of RISK_REWARD_FIELDS) {
    const raw = (values[field.key] ?? '').trim();
    if (!raw) {
      // Only optional fields reach here
      parsed[field.key] = 0;
      continue;
    }
    const value = parseNumericInput(raw);
    if (value === null) {
      return { ok: false, error: { code: 'INVALID_NUMBER', message: INVALID_NUMBER_MESSAGE } };
    }
    parsed[field.key] = value;
  }

  const inputs = toInputs(parsed);
  if (inputs.tickSize === 0) {
    return { ok: false, error: { code: 'ZERO_TICK_SIZE', message: ZERO_TICK_SIZE_MESSAGE } };
  }

  return { ok: true, inputs };
}

function toInputs(parsed: Partial<Record<RiskRewardField, number>>): Required<RiskRewardInputs> {
  return {
    avgPrice: parsed.avgPrice ?? 0,
    maxAgainstPrice: parsed.maxAgainstPrice ?? 0,
    targetPrice: parsed.targetPrice ?? 0,
    tickSize: parsed.tickSize ?? 0,
    numLots: parsed.numLots ?? 0,
    tickValue: parsed.tickValue ?? 0,
    totalLotsEntryExit: parsed.totalLotsEntryExit ?? 0,
    costPerLot: parsed.costPerLot ?? 0,
    rebatePerLot: parsed.rebatePerLot ?? 0,
  };
}

// Optional cost fields start at "0", everything else blank
export const DEFAULT_FORM_VALUES: Record<RiskRewardField, string> = {
  avgPrice: '',
  maxAgainstPrice: '',
  targetPrice: '',
  tickSize: '',
  numLots: '',
  tickValue: '',
  totalLotsEntryExit: '',
  costPerLot: '0',
  rebatePerLot: '0',
};
