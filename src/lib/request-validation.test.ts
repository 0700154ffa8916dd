import { describe, expect, it } from 'vitest';
import type { NextRequest } from 'next/server';
import { parseRiskRewardRequest, validationErrorResponse } from './request-validation';

function jsonRequest(body: unknown): NextRequest {
  return {
    json: async () => body,
  } as unknown as NextRequest;
}

describe('parseRiskRewardRequest', () => {
  it('stringifies numbers and drops null fields', async () => {
    const parsed = await parseRiskRewardRequest(jsonRequest({
      avgPrice: 0.008,
      tickSize: '0.001',
      costPerLot: null,
    }));

    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.data.avgPrice).toBe('0.008');
      expect(parsed.data.tickSize).toBe('0.001');
      expect(parsed.data.costPerLot).toBeUndefined();
    }
  });

  it('maps an unreadable body to INVALID_JSON', async () => {
    const request = {
      json: async () => {
        throw new SyntaxError('Unexpected end of JSON input');
      },
    } as unknown as NextRequest;

    const parsed = await parseRiskRewardRequest(request);
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.code).toBe('INVALID_JSON');
      expect(parsed.response.status).toBe(400);
      expect(await parsed.response.json()).toEqual({
        ok: false,
        error: { code: 'INVALID_JSON', message: 'Request body must be valid JSON' },
      });
    }
  });

  it('maps a wrongly typed field to INVALID_REQUEST with its path', async () => {
    const parsed = await parseRiskRewardRequest(jsonRequest({ numLots: true }));
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.code).toBe('INVALID_REQUEST');
      expect(parsed.response.status).toBe(400);
      const body = await parsed.response.json();
      expect(body.error.message).toBe('Invalid request payload');
      expect(body.error.details).toMatch(/^numLots: /);
    }
  });

  it('reports a non-object body against "body"', async () => {
    const parsed = await parseRiskRewardRequest(jsonRequest('0.008'));
    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      const body = await parsed.response.json();
      expect(body.error.details).toMatch(/^body: /);
    }
  });
});

describe('validationErrorResponse', () => {
  it('returns 422 with missing field names as details', async () => {
    const response = validationErrorResponse({
      code: 'MISSING_FIELD',
      message: 'Please fill in the following required fields: Tick Size',
      missingFields: ['Tick Size'],
    });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      ok: false,
      error: {
        code: 'MISSING_FIELD',
        message: 'Please fill in the following required fields: Tick Size',
        details: 'Tick Size',
      },
    });
  });
});
