import { afterEach, describe, expect, it, vi } from 'vitest';
import { ApiClientError, postRiskReward } from './api-client';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('postRiskReward', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the raw form values and unwraps the report', async () => {
    const fetchMock = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) => jsonResponse(200, { ok: true, report: { ratioDisplay: '1:2.000' } }));
    vi.stubGlobal('fetch', fetchMock);

    const report = await postRiskReward({ avgPrice: '0.008', tickSize: '0.001' });

    expect(report.ratioDisplay).toBe('1:2.000');
    expect(fetchMock).toHaveBeenCalledWith('/api/risk-reward', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"avgPrice":"0.008","tickSize":"0.001"}',
    });
  });

  it('raises ApiClientError with the server code and details', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(422, {
      ok: false,
      error: {
        code: 'MISSING_FIELD',
        message: 'Please fill in the following required fields: Tick Size',
        details: 'Tick Size',
      },
    })));

    const error = await postRiskReward({}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiClientError);
    expect(error).toMatchObject({
      status: 422,
      code: 'MISSING_FIELD',
      message: 'Please fill in the following required fields: Tick Size',
      details: 'Tick Size',
    });
  });

  it('falls back to a generic message for non-JSON failures', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('Bad Gateway', { status: 502 })));

    const error = await postRiskReward({}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiClientError);
    expect(error).toMatchObject({ status: 502, message: 'Request failed', code: undefined });
  });
});
