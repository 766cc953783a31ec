import { normalizeEmail } from './email';
import type { MemberDetail, MembershipIndex, RemoteMember } from './types';

export const UNKNOWN_ROLE = 'N/A';

export function emptyMembershipIndex(): MembershipIndex {
  return { emails: new Set(), details: new Map() };
}

/**
 * Builds the lookup of current members keyed by normalized email.
 * Members without a usable email are left out; a repeated email keeps the last member's detail.
 */
export function buildMembershipIndex(members: readonly RemoteMember[]): MembershipIndex {
  const index = emptyMembershipIndex();

  for (const member of members) {
    const email = normalizeEmail(member.email);
    if (!email) continue;

    index.emails.add(email);
    index.details.set(email, {
      name: `${member.firstName ?? ''} ${member.lastName ?? ''}`.trim(),
      role: member.role ?? UNKNOWN_ROLE,
    });
  }

  return index;
}

export function isMember(index: MembershipIndex, email: string): boolean {
  const key = normalizeEmail(email);
  return key !== null && index.emails.has(key);
}

export function memberDetail(index: MembershipIndex, email: string): MemberDetail | undefined {
  const key = normalizeEmail(email);
  return key === null ? undefined : index.details.get(key);
}
