import type { ApiConnection } from './config';
import { TransportError } from './errors';
import { getLogger } from './logger';
import { type InvitePayload, type RemoteMember, RemoteMemberListSchema } from './types';

const log = getLogger('reconcile:client');

export interface HttpRequest {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
}

/** The part of a fetch Response the client reads. */
export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: HttpRequest) => Promise<HttpResponse>;

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

function messageOf(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string') {
    return value.message;
  }
  return String(value);
}

/** The error message followed by its cause, e.g. `fetch failed (connect ECONNREFUSED 127.0.0.1:443)`. */
function describeFailure(error: unknown): string {
  const message = messageOf(error);
  if (typeof error === 'object' && error !== null && 'cause' in error && error.cause !== undefined) {
    return `${message} (${messageOf(error.cause)})`;
  }
  return message;
}

export function membersUrl(host: string, orgId: string): string {
  return `${host.replace(/\/+$/, '')}/organizations/${orgId}/members`;
}

/**
 * Client for the organization membership endpoints. One request per call; no retries.
 */
export class MembershipClient {
  private readonly url: string;

  constructor(
    private readonly connection: ApiConnection,
    private readonly fetchImpl: FetchLike = defaultFetch
  ) {
    this.url = membersUrl(connection.host, connection.orgId);
  }

  get membersUrl(): string {
    return this.url;
  }

  async listMembers(): Promise<RemoteMember[]> {
    const body = await this.request({
      method: 'GET',
      headers: { Authorization: `Bearer ${this.connection.apiKey}` },
    });

    const parsed = RemoteMemberListSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(
        `Unexpected members response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`
      );
    }
    log.info('Fetched members', { count: parsed.data.length });
    return parsed.data;
  }

  /** Posts one batch of invites and returns the response body untouched. */
  async sendInvites(payload: InvitePayload): Promise<unknown> {
    const body = await this.request({
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.connection.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
    });
    log.info('Sent invites', { count: payload.invites.length, role: payload.role });
    return body;
  }

  private async request(init: HttpRequest): Promise<unknown> {
    log.debug('Request', { method: init.method, url: this.url });

    let response: HttpResponse;
    let text: string;
    try {
      response = await this.fetchImpl(this.url, init);
      text = await response.text();
    } catch (error) {
      throw new TransportError(`${init.method} ${this.url} failed: ${describeFailure(error)}`);
    }

    if (!response.ok) {
      log.warn('Request rejected', { method: init.method, status: response.status });
      throw new TransportError(`${init.method} ${this.url} returned ${response.status}`, response.status, text);
    }

    try {
      const value: unknown = JSON.parse(text);
      return value;
    } catch (_err) {
      throw new TransportError(`${init.method} ${this.url} returned a non-JSON body`, response.status, text);
    }
  }
}
