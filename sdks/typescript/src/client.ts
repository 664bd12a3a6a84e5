import { AuditRequest, AuditResponse, ReportResponse } from './types.js';

export interface AuditClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class AuditClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: AuditClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async audit(payload: AuditRequest): Promise<AuditResponse> {
    if (!payload.protocol.trim()) {
      throw new Error('protocol is required');
    }

    const response = await this.fetchImpl(`${this.baseUrl}/audit`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...this.defaultHeaders,
      },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new Error(`Audit request failed with ${response.status}: ${body}`);
    }

    return (await response.json()) as AuditResponse;
  }

  async getReport(auditId: string): Promise<ReportResponse> {
    if (!auditId) {
      throw new Error('auditId is required');
    }

    const response = await this.fetchImpl(`${this.baseUrl}/report/${encodeURIComponent(auditId)}`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });

    if (response.status === 404) {
      throw new Error('Report not found');
    }

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new Error(`Report request failed with ${response.status}: ${body}`);
    }

    return (await response.json()) as ReportResponse;
  }

  /** Drops one cache entry. Resolves false when the key was not cached. */
  async invalidateCache(key: string): Promise<boolean> {
    if (!key) {
      throw new Error('key is required');
    }

    const response = await this.fetchImpl(`${this.baseUrl}/cache/${encodeURIComponent(key)}`, {
      method: 'DELETE',
      headers: this.defaultHeaders,
    });

    if (response.status === 404) {
      return false;
    }

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new Error(`Cache invalidation failed with ${response.status}: ${body}`);
    }

    return true;
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
