import { z } from 'zod';

/** A cell value as read from the registration table; absent cells are empty strings. */
export type CellValue = string;

export type TableRecord = Record<string, CellValue>;

export interface Table {
  /** Header row, in file order. */
  columns: string[];
  rows: TableRecord[];
}

export interface Registrant {
  /** 1-based position among the data rows. */
  rowNumber: number;
  name: string;
  email: string;
  /** Every original column of the row, keyed by header. */
  record: TableRecord;
}

export const RemoteMemberSchema = z
  .object({
    email: z.string().nullish(),
    firstName: z.string().nullish(),
    lastName: z.string().nullish(),
    role: z.string().nullish(),
  })
  .passthrough();

export type RemoteMember = z.infer<typeof RemoteMemberSchema>;

export const RemoteMemberListSchema = z.array(RemoteMemberSchema);

export interface MemberDetail {
  name: string;
  role: string;
}

export interface MembershipIndex {
  emails: Set<string>;
  details: Map<string, MemberDetail>;
}

export interface Invite {
  firstName: string;
  lastName: string;
  email: string;
  customMessage: string;
  inviteRole: string;
}

export interface InvitePayload {
  invites: Invite[];
  role: string;
}

export interface AlreadyMember {
  registrant: Registrant;
  email: string;
  member: MemberDetail;
}

export interface ClassificationResult {
  needsInvite: Registrant[];
  alreadyMember: AlreadyMember[];
  skipped: Registrant[];
}
