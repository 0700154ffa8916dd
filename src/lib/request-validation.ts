/**
 * DEPENDENCIES
 * Consumed by: /api/risk-reward/route.ts
 * Consumes: zod, api-response.ts, risk-reward-input.ts
 * Risk-sensitive: NO
 * Notes: Malformed bodies are 400 (INVALID_JSON / INVALID_REQUEST).
 *        Field-level problems are left to validateRiskRewardForm and come back as 422.
 */

import type { NextRequest } from 'next/server';
import { z } from 'zod';
import { apiError, type ApiErrorCode } from '@/lib/api-response';
import type { RiskRewardFormValues, RiskRewardValidationError } from '@/lib/risk-reward-input';

type RequestErrorCode = Extract<ApiErrorCode, 'INVALID_JSON' | 'INVALID_REQUEST'>;

type ValidationResult<T> =
  | { ok: true; data: T }
  | { ok: false; code: RequestErrorCode; response: ReturnType<typeof apiError> };

// Numbers are stringified so they go through the same parser as form text
const fieldValue = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));

const riskRewardRequestSchema = z.object({
  avgPrice: fieldValue,
  maxAgainstPrice: fieldValue,
  targetPrice: fieldValue,
  tickSize: fieldValue,
  numLots: fieldValue,
  tickValue: fieldValue,
  totalLotsEntryExit: fieldValue,
  costPerLot: fieldValue,
  rebatePerLot: fieldValue,
});

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'body';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

export async function parseRiskRewardRequest(
  request: NextRequest
): Promise<ValidationResult<RiskRewardFormValues>> {
  let rawBody: unknown;

  try {
    rawBody = await request.json();
  } catch {
    return {
      ok: false,
      code: 'INVALID_JSON',
      response: apiError(400, 'INVALID_JSON', 'Request body must be valid JSON'),
    };
  }

  const parsed = riskRewardRequestSchema.safeParse(rawBody);
  if (!parsed.success) {
    return {
      ok: false,
      code: 'INVALID_REQUEST',
      response: apiError(
        400,
        'INVALID_REQUEST',
        'Invalid request payload',
        formatZodError(parsed.error)
      ),
    };
  }

  return { ok: true, data: parsed.data };
}

/** 422 carrying the same message the form shows; missing names go in details. */
export function validationErrorResponse(error: RiskRewardValidationError) {
  return apiError(422, error.code, error.message, error.missingFields?.join(', '));
}
