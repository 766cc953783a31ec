import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';

import type { FetchLike, HttpRequest, HttpResponse } from '../../src/client';
import type { InviteSyncConfig } from '../../src/config';
import type { Registrant } from '../../src/types';

export function registrant(rowNumber: number, name: string, email: string): Registrant {
  return { rowNumber, name, email, record: { Name: name, Email: email } };
}

export function jsonResponse(status: number, body: unknown): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

export interface FakeFetch {
  fetch: FetchLike;
  calls: Array<{ url: string; init: HttpRequest }>;
}

/** Answers GET with `members` and POST with `inviteResponse`. */
export function fakeMembershipApi(
  members: unknown,
  inviteResponse: HttpResponse = jsonResponse(200, { ok: true })
): FakeFetch {
  const calls: FakeFetch['calls'] = [];
  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, init });
    return init.method === 'GET' ? jsonResponse(200, members) : inviteResponse;
  };
  return { fetch, calls };
}

export async function makeTempDir(prefix = 'invite-sync-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function testConfig(dir: string, overrides: Partial<InviteSyncConfig> = {}): InviteSyncConfig {
  return {
    apiKey: 'test-api-key-0000',
    host: 'https://api.test.local',
    orgId: 'org-123',
    inviteRole: 'manager',
    customMessage: 'Welcome!',
    inputDir: path.join(dir, 'input'),
    outputDir: path.join(dir, 'output'),
    inviteCsv: path.join(dir, 'output', 'test_invite.csv'),
    uninvitedCsv: path.join(dir, 'output', 'uninvited_members.csv'),
    logLevel: 'error',
    envFile: path.join(dir, 'dev.env'),
    envFileLoaded: false,
    ...overrides,
  };
}

export function collectOutput(): { print: (line: string) => void; lines: string[] } {
  const lines: string[] = [];
  return { print: (line) => lines.push(line), lines };
}
