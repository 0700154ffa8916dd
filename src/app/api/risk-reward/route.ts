/**
 * DEPENDENCIES
 * Consumed by: useRiskRewardCalculation.ts (frontend)
 * Consumes: risk-reward-report.ts, request-validation.ts, api-response.ts, env.ts
 * Risk-sensitive: NO — stateless calculation, nothing is stored
 * Notes: Body parsing and error mapping live in request-validation.ts.
 */

export const dynamic = 'force-dynamic';

import { NextRequest, NextResponse } from 'next/server';
import { apiError } from '@/lib/api-response';
import { isRequestLoggingEnabled } from '@/lib/env';
import { parseRiskRewardRequest, validationErrorResponse } from '@/lib/request-validation';
import { analyzeRiskRewardForm } from '@/lib/risk-reward-report';

export async function POST(request: NextRequest) {
  try {
    const parsed = await parseRiskRewardRequest(request);
    if (!parsed.ok) {
      if (isRequestLoggingEnabled()) {
        console.info(`[RiskReward] Rejected: ${parsed.code}`);
      }
      return parsed.response;
    }

    const outcome = analyzeRiskRewardForm(parsed.data);

    if (!outcome.ok) {
      if (isRequestLoggingEnabled()) {
        console.info(`[RiskReward] Rejected: ${outcome.error.code}`);
      }
      return validationErrorResponse(outcome.error);
    }

    if (isRequestLoggingEnabled()) {
      const { result, ratioDisplay } = outcome.report;
      console.info(
        `[RiskReward] risk=${result.totalRisk} reward=${result.totalReward} ratio=${ratioDisplay}`
      );
    }

    return NextResponse.json({ ok: true, report: outcome.report });
  } catch (error) {
    console.error('[RiskReward] Calculation failed:', error);
    return apiError(500, 'INTERNAL_ERROR', 'Failed to calculate risk-reward', error instanceof Error ? error.message : undefined);
  }
}
