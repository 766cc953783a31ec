/**
 * Plain-text renderers for the operator reports. Each returns the lines to print, so the
 * commands stay free of console calls and the output can be asserted in tests.
 */

import { normalizeEmail } from './email';
import type { TransportError } from './errors';
import type { AlreadyMember, ClassificationResult, InvitePayload, Registrant, TableRecord } from './types';

export const BANNER = '='.repeat(80);

export function banner(title: string): string[] {
  return [BANNER, title, BANNER];
}

export function section(title: string): string[] {
  return ['', BANNER, title, BANNER];
}

export function maskSecret(value: string): string {
  if (value.length <= 8) return '********';
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}

export function renderConfiguration(entries: ReadonlyArray<readonly [string, string]>): string[] {
  return ['', 'Configuration:', ...entries.map(([label, value]) => `  ${label}: ${value}`)];
}

/** The first `limit` rows as a pipe-separated table. */
export function renderRows(columns: readonly string[], rows: readonly TableRecord[], limit: number): string[] {
  const shown = rows.slice(0, limit);
  const lines = [columns.join(' | ')];
  for (const row of shown) {
    lines.push(columns.map((column) => row[column] ?? '').join(' | '));
  }
  if (rows.length > shown.length) {
    lines.push(`... ${rows.length - shown.length} more row(s)`);
  }
  return lines;
}

export function renderSkipped(skipped: readonly Registrant[]): string[] {
  return skipped.map((registrant) => `Skipping row ${registrant.rowNumber}: No email address`);
}

export function renderUserList(registrants: readonly Registrant[]): string[] {
  return registrants.map(
    (registrant, idx) => `  ${idx + 1}. ${registrant.name.trim() || 'N/A'} (${registrant.email.trim() || 'N/A'})`
  );
}

export function renderAlreadyMembers(entries: readonly AlreadyMember[]): string[] {
  return entries.map((entry) => {
    const registrantName = entry.registrant.name.trim() || 'N/A';
    const memberName = entry.member.name || 'N/A';
    return `  - ${registrantName} (${entry.email}) role: ${entry.member.role}, member name: ${memberName}`;
  });
}

export interface UninvitedTotals {
  memberCount: number;
  classification: ClassificationResult;
}

export function renderUninvitedTotals({ memberCount, classification }: UninvitedTotals): string[] {
  const { needsInvite, alreadyMember, skipped } = classification;
  const total = needsInvite.length + alreadyMember.length + skipped.length;
  return [
    '',
    BANNER,
    `Total registrations: ${total}`,
    `Total members in workspace: ${memberCount}`,
    `Registrations already in workspace: ${alreadyMember.length}`,
    `Registrations needing invites: ${needsInvite.length}`,
    `Registrations skipped (no email): ${skipped.length}`,
    BANNER,
  ];
}

export function renderInviteRequest(url: string, payload: InvitePayload): string[] {
  const lines = [
    ...section('API CALL DETAILS'),
    '',
    `Endpoint: POST ${url}`,
    '',
    'Headers:',
    '  Authorization: Bearer [API_KEY]',
    '  Content-Type: application/json',
    ...section('PAYLOAD'),
    ...JSON.stringify(payload, null, 2).split('\n'),
    ...section('INVITE DETAILS'),
  ];

  payload.invites.forEach((invite, idx) => {
    lines.push(
      '',
      `${idx + 1}. ${invite.firstName} ${invite.lastName}`.trimEnd(),
      `   Email: ${invite.email}`,
      `   Role: ${payload.role}`,
      `   Message: ${invite.customMessage}`
    );
  });

  return lines;
}

export function renderTransportFailure(error: TransportError, indent = ''): string[] {
  const lines = [`${indent}Error: ${error.message}`];
  if (error.status !== undefined) {
    lines.push(`${indent}Response status: ${error.status}`);
  }
  if (error.body !== undefined) {
    lines.push(`${indent}Response body: ${error.body}`);
  }
  return lines;
}

export type SendOutcome =
  | { success: true; sent: number; response: unknown }
  | { success: false; error: string };

export function renderSendSummary(outcome: SendOutcome): string[] {
  return [
    '',
    BANNER,
    'Summary:',
    outcome.success
      ? `  Successfully sent ${outcome.sent} invite(s)`
      : `  Failed to send invites: ${outcome.error}`,
    BANNER,
  ];
}

export type Verdict = 'member' | 'not-member' | 'skipped';

export function renderVerdict(registrant: Registrant, verdict: Verdict, role?: string): string[] {
  const name = registrant.name.trim();
  const email = normalizeEmail(registrant.email) ?? '';
  switch (verdict) {
    case 'skipped':
      return ['', `⚠ Skipping row ${registrant.rowNumber}: No email address`];
    case 'member':
      return ['', `✗ ALREADY A MEMBER: ${name} (${email})`, `    Role: ${role ?? 'N/A'}`];
    case 'not-member':
      return ['', `✓ NOT A MEMBER: ${name} (${email})`, '    Can be invited'];
  }
}

export function renderVerificationSummary(csvFile: string, classification: ClassificationResult): string[] {
  const { needsInvite, alreadyMember, skipped } = classification;
  const total = needsInvite.length + alreadyMember.length + skipped.length;
  const lines = [
    '',
    BANNER,
    'Summary:',
    `  Total participants in invite list: ${total}`,
    `  Already organization members: ${alreadyMember.length}`,
    `  Not members (safe to invite): ${needsInvite.length}`,
    `  Skipped (no email): ${skipped.length}`,
    BANNER,
  ];

  if (alreadyMember.length > 0) {
    lines.push('', '⚠ WARNING: The following participants are already members:');
    for (const entry of alreadyMember) {
      lines.push(`  - ${entry.registrant.name.trim()} (${entry.email})`);
    }
    lines.push('', `You may want to remove them from ${csvFile} before sending invites.`);
  } else {
    lines.push(
      '',
      `✓ All participants in ${csvFile} are NOT currently members.`,
      '  It is safe to proceed with sending invites.'
    );
  }

  return lines;
}
