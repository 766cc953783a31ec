import { normalizeEmail } from './email';
import { emptyMembershipIndex, isMember, memberDetail, UNKNOWN_ROLE } from './membership-index';
import type { ClassificationResult, MembershipIndex, Registrant } from './types';

/**
 * Splits registrants into those that need an invite, those already in the organization and
 * those without a usable email. Every registrant lands in exactly one partition and each
 * partition keeps the input order.
 */
export function classifyRegistrants(
  registrants: readonly Registrant[],
  index: MembershipIndex
): ClassificationResult {
  const result: ClassificationResult = { needsInvite: [], alreadyMember: [], skipped: [] };

  for (const registrant of registrants) {
    const email = normalizeEmail(registrant.email);
    if (!email) {
      result.skipped.push(registrant);
      continue;
    }

    if (isMember(index, email)) {
      result.alreadyMember.push({
        registrant,
        email,
        member: memberDetail(index, email) ?? { name: '', role: UNKNOWN_ROLE },
      });
    } else {
      result.needsInvite.push(registrant);
    }
  }

  return result;
}

/** Rows of an explicitly supplied invite list that carry an email, and the ones that do not. */
export function partitionInvitable(registrants: readonly Registrant[]): {
  invitable: Registrant[];
  skipped: Registrant[];
} {
  const { needsInvite, skipped } = classifyRegistrants(registrants, emptyMembershipIndex());
  return { invitable: needsInvite, skipped };
}
