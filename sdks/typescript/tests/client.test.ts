import { describe, expect, it, vi } from 'vitest';
import { AuditClient } from '../src/client.js';

const createFetch = (handlers: Record<string, () => Promise<Response>>) => {
  return vi.fn(async (url: string | URL | Request, init?: RequestInit) => {
    const key = `${init?.method ?? 'GET'} ${url.toString()}`;
    const handler = handlers[key];
    if (!handler) {
      throw new Error(`No handler for ${key}`);
    }
    return handler();
  });
};

const record = {
  score: 76,
  status: 'INVESTIGATE',
  summary: 'Label partially obscured.',
  findings: [],
  checklist: [],
  riskAssessment: 'Low',
  recommendedActions: [],
  experiment: { detected: 'MTT_CELL_VIABILITY', expected: 'MTT_CELL_VIABILITY', mismatch: false },
};

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('AuditClient', () => {
  it('posts audit payloads and returns JSON', async () => {
    const fetchMock = createFetch({
      'POST https://example.test/audit': async () =>
        json({
          auditId: 'audit_a_b',
          record,
          trace: {
            auditId: 'audit_a_b',
            imageDigest: 'a',
            protocolDigest: 'b',
            states: ['UPLOADED', 'COMPLETE'],
            visionCached: false,
            reasoningCached: false,
          },
          storedAt: '2026-01-01T00:00:00.000Z',
        }),
    });

    const client = new AuditClient({ baseUrl: 'https://example.test/', fetchImpl: fetchMock });
    const result = await client.audit({ image: 'aW1n', protocol: 'MTT Cell Viability Assay' });

    expect(result.record.status).toBe('INVESTIGATE');
    expect(result.record.score).toBe(76);
    expect(fetchMock).toHaveBeenCalledWith('https://example.test/audit', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ image: 'aW1n', protocol: 'MTT Cell Viability Assay' }),
    });
  });

  it('refuses to send an audit without a protocol', async () => {
    const fetchMock = createFetch({});
    const client = new AuditClient({ baseUrl: 'https://example.test', fetchImpl: fetchMock });

    await expect(client.audit({ image: 'aW1n', protocol: '  ' })).rejects.toThrow('protocol is required');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('throws on non-200 audit responses', async () => {
    const fetchMock = createFetch({
      'POST https://example.test/audit': async () => new Response('invalid', { status: 400 }),
    });

    const client = new AuditClient({ baseUrl: 'https://example.test', fetchImpl: fetchMock });
    await expect(client.audit({ image: 'aW1n', protocol: 'Gel' })).rejects.toThrow(
      'Audit request failed with 400: invalid',
    );
  });

  it('retrieves reports with encoded ids', async () => {
    const fetchMock = createFetch({
      'GET https://example.test/report/audit%2Fx': async () =>
        json({ auditId: 'audit/x', record, storedAt: '2026-01-01T00:00:00.000Z' }),
    });

    const client = new AuditClient({
      baseUrl: 'https://example.test',
      fetchImpl: fetchMock,
      headers: { Authorization: 'Bearer test-secret' },
    });
    const report = await client.getReport('audit/x');

    expect(report.record.experiment.detected).toBe('MTT_CELL_VIABILITY');
    expect(fetchMock).toHaveBeenCalledWith('https://example.test/report/audit%2Fx', {
      method: 'GET',
      headers: { Authorization: 'Bearer test-secret' },
    });
  });

  it('throws if report missing', async () => {
    const fetchMock = createFetch({
      'GET https://example.test/report/missing': async () => new Response('', { status: 404 }),
    });

    const client = new AuditClient({ baseUrl: 'https://example.test', fetchImpl: fetchMock });
    await expect(client.getReport('missing')).rejects.toThrow(/Report not found/);
  });

  it('reports whether a cache entry was removed', async () => {
    const fetchMock = createFetch({
      'DELETE https://example.test/cache/vision_abc': async () => new Response(null, { status: 204 }),
      'DELETE https://example.test/cache/vision_none': async () => new Response('', { status: 404 }),
    });

    const client = new AuditClient({ baseUrl: 'https://example.test', fetchImpl: fetchMock });

    await expect(client.invalidateCache('vision_abc')).resolves.toBe(true);
    await expect(client.invalidateCache('vision_none')).resolves.toBe(false);
  });
});
