import { displayEmail } from './email';
import type { Invite, InvitePayload, Registrant } from './types';

/** Role code the invite endpoint expects on every individual invite. */
export const DEFAULT_INVITE_ROLE_CODE = '1';

export interface InvitePayloadOptions {
  role: string;
  customMessage: string;
}

export function splitName(name: string): { firstName: string; lastName: string } {
  const trimmed = name.trim();
  const spaceAt = trimmed.indexOf(' ');
  if (spaceAt === -1) {
    return { firstName: trimmed, lastName: '' };
  }
  return { firstName: trimmed.slice(0, spaceAt), lastName: trimmed.slice(spaceAt + 1) };
}

/**
 * Callers filter out rows without an email first; such a row gets an empty email here.
 */
export function buildInvite(registrant: Registrant, customMessage: string): Invite {
  const { firstName, lastName } = splitName(registrant.name);
  return {
    firstName,
    lastName,
    email: displayEmail(registrant.email) ?? '',
    customMessage,
    inviteRole: DEFAULT_INVITE_ROLE_CODE,
  };
}

export function buildInvitePayload(
  registrants: readonly Registrant[],
  options: InvitePayloadOptions
): InvitePayload {
  return {
    invites: registrants.map((registrant) => buildInvite(registrant, options.customMessage)),
    role: options.role,
  };
}
