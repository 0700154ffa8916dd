import { NextResponse } from 'next/server';

export type ApiErrorCode =
  | 'INVALID_JSON'
  | 'INVALID_REQUEST'
  | 'MISSING_FIELD'
  | 'INVALID_NUMBER'
  | 'ZERO_TICK_SIZE'
  | 'INTERNAL_ERROR';

export interface ApiErrorPayload {
  ok: false;
  error: {
    code: ApiErrorCode;
    message: string;
    details?: string;
    retryable?: boolean;
  };
}

export function apiError(
  status: number,
  code: ApiErrorCode,
  message: string,
  details?: string,
  retryable?: boolean
) {
  return NextResponse.json<ApiErrorPayload>(
    {
      ok: false,
      error: { code, message, details, retryable },
    },
    { status }
  );
}
