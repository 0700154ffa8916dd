import type { RiskRewardFormValues } from '@/lib/risk-reward-input';
import type { RiskRewardReport } from '@/types';

export class ApiClientError extends Error {
  status: number;
  code?: string;
  details?: string;
  retryable?: boolean;

  constructor(message: string, status: number, code?: string, details?: string, retryable?: boolean) {
    super(message);
    this.name = 'ApiClientError';
    this.status = status;
    this.code = code;
    this.details = details;
    this.retryable = retryable;
  }
}

function parseErrorPayload(payload: unknown): {
  message: string;
  code?: string;
  details?: string;
  retryable?: boolean;
} {
  const fallback = { message: 'Request failed' };

  if (!payload || typeof payload !== 'object' || !('error' in payload)) return fallback;

  // { ok: false, error: { code, message, details, retryable } }
  const nested = payload.error;
  if (!nested || typeof nested !== 'object') return fallback;

  const errObj: Record<string, unknown> = { ...nested };
  return {
    message: typeof errObj.message === 'string' ? errObj.message : fallback.message,
    code: typeof errObj.code === 'string' ? errObj.code : undefined,
    details: typeof errObj.details === 'string' ? errObj.details : undefined,
    retryable: typeof errObj.retryable === 'boolean' ? errObj.retryable : undefined,
  };
}

export async function apiRequest<T>(input: RequestInfo | URL, init?: RequestInit): Promise<T> {
  const response = await fetch(input, init);

  let payload: unknown = null;
  try {
    payload = await response.json();
  } catch {
    // Non-JSON response
  }

  if (!response.ok) {
    const err = parseErrorPayload(payload);
    throw new ApiClientError(err.message, response.status, err.code, err.details, err.retryable);
  }

  return payload as T;
}

export interface RiskRewardResponse {
  ok: true;
  report: RiskRewardReport;
}

export async function postRiskReward(values: RiskRewardFormValues): Promise<RiskRewardReport> {
  const body = await apiRequest<RiskRewardResponse>('/api/risk-reward', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(values),
  });
  return body.report;
}
