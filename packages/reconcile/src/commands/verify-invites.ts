import { classifyRegistrants } from '../classifier';
import { type InviteSyncConfig, requireApiConnection } from '../config';
import { buildMembershipIndex } from '../membership-index';
import {
  banner,
  renderConfiguration,
  renderVerdict,
  renderVerificationSummary,
  section,
  type Verdict,
} from '../report';
import { resolveColumns, toRegistrants } from '../schema';
import { readTable } from '../table';
import type { ClassificationResult, Registrant } from '../types';

import { type CommandContext, type CommandResult, createClient, printLines } from './context';

export interface VerifyInvitesOptions {
  csvFile?: string;
  /** Header of the email column, when several headers mention "email". */
  emailColumn?: string;
  /** Header of the name column, when it is not called "Name". */
  nameColumn?: string;
}

export interface VerifyInvitesResult extends CommandResult {
  classification: ClassificationResult;
}

/** Checks an invite list against the live member list; read-only. */
export async function verifyInvites(
  config: InviteSyncConfig,
  ctx: CommandContext,
  options: VerifyInvitesOptions = {}
): Promise<VerifyInvitesResult> {
  const connection = requireApiConnection(config);
  const { print } = ctx;
  const csvFile = options.csvFile ?? config.inviteCsv;

  printLines(print, banner('Invite Verification - Checking Against Existing Members'));

  const table = await readTable(csvFile);
  printLines(
    print,
    renderConfiguration([
      ['Host', connection.host],
      ['Organization ID', connection.orgId],
      ['CSV File', csvFile],
    ])
  );

  print('');
  print(`Loading invites from: ${csvFile}`);
  print(`Found ${table.rows.length} participants in invite list`);

  const columns = resolveColumns(table.columns, {
    emailColumn: options.emailColumn,
    nameColumn: options.nameColumn,
  });
  const registrants = toRegistrants(table, columns);

  const client = createClient(connection, ctx);
  print('');
  print('Fetching existing members...');
  print(`URL: ${client.membersUrl}`);
  const index = buildMembershipIndex(await client.listMembers());
  print(`Found ${index.emails.size} existing members`);

  const classification = classifyRegistrants(registrants, index);

  const verdicts = new Map<Registrant, { verdict: Verdict; role?: string }>();
  classification.skipped.forEach((registrant) => verdicts.set(registrant, { verdict: 'skipped' }));
  classification.needsInvite.forEach((registrant) => verdicts.set(registrant, { verdict: 'not-member' }));
  classification.alreadyMember.forEach((entry) =>
    verdicts.set(entry.registrant, { verdict: 'member', role: entry.member.role })
  );

  printLines(print, section('Verification Results:'));
  for (const registrant of registrants) {
    const entry = verdicts.get(registrant);
    if (entry) {
      printLines(print, renderVerdict(registrant, entry.verdict, entry.role));
    }
  }

  printLines(print, renderVerificationSummary(csvFile, classification));

  return { exitCode: 0, classification };
}
