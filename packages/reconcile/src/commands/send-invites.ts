import { classifyRegistrants, partitionInvitable } from '../classifier';
import { type InviteSyncConfig, requireApiConnection } from '../config';
import type { Confirm } from '../confirm';
import { TransportError } from '../errors';
import { getLogger } from '../logger';
import { buildMembershipIndex } from '../membership-index';
import { buildInvitePayload } from '../payload';
import {
  banner,
  BANNER,
  maskSecret,
  renderAlreadyMembers,
  renderConfiguration,
  renderSendSummary,
  renderSkipped,
  renderTransportFailure,
  renderUserList,
  type SendOutcome,
} from '../report';
import { resolveColumns, toRegistrants } from '../schema';
import { readTable } from '../table';
import type { AlreadyMember, InvitePayload, Registrant } from '../types';

import { type CommandContext, type CommandResult, createClient, printLines } from './context';

const log = getLogger('reconcile:send-invites');

export const CONFIRM_QUESTION = '\nProceed with sending invites? (yes/no): ';

export interface SendInvitesContext extends CommandContext {
  confirm: Confirm;
}

export interface SendInvitesOptions {
  csvFile?: string;
  /** Header of the email column, when several headers mention "email". */
  emailColumn?: string;
  /** Header of the name column, when it is not called "Name". */
  nameColumn?: string;
  role?: string;
  /** Send to every row with an email, without checking current membership first. */
  skipMemberCheck?: boolean;
  /** Skip the confirmation prompt. */
  assumeYes?: boolean;
}

export type SendStatus = 'sent' | 'failed' | 'aborted' | 'nothing-to-send';

export interface SendInvitesResult extends CommandResult {
  status: SendStatus;
  payload: InvitePayload | null;
  skipped: Registrant[];
  alreadyMember: AlreadyMember[];
  response?: unknown;
}

/**
 * Sends one batch invite for the rows of an invite list, after an explicit confirmation.
 * A failed request is reported in the summary and never retried.
 */
export async function sendInvites(
  config: InviteSyncConfig,
  ctx: SendInvitesContext,
  options: SendInvitesOptions = {}
): Promise<SendInvitesResult> {
  const connection = requireApiConnection(config);
  const { print } = ctx;
  const csvFile = options.csvFile ?? config.inviteCsv;
  const role = options.role ?? config.inviteRole;

  printLines(print, banner('Invite Sender'));

  const table = await readTable(csvFile);
  printLines(
    print,
    renderConfiguration([
      ['Host', connection.host],
      ['Organization ID', connection.orgId],
      ['CSV File', csvFile],
      ['Default Permission', role],
      ['API Key', maskSecret(connection.apiKey)],
    ])
  );

  print('');
  print(`Loading invites from: ${csvFile}`);
  print(`Found ${table.rows.length} users to invite`);

  const columns = resolveColumns(table.columns, {
    emailColumn: options.emailColumn,
    nameColumn: options.nameColumn,
  });
  const registrants = toRegistrants(table, columns);
  print('');
  print(BANNER);
  print('Users to invite:');
  printLines(print, renderUserList(registrants));
  print(BANNER);

  const { invitable, skipped } = partitionInvitable(registrants);
  printLines(print, renderSkipped(skipped));

  const client = createClient(connection, ctx);
  let toInvite = invitable;
  let alreadyMember: AlreadyMember[] = [];
  if (!options.skipMemberCheck) {
    print('');
    print('Checking current organization members...');
    const index = buildMembershipIndex(await client.listMembers());
    const classification = classifyRegistrants(invitable, index);
    toInvite = classification.needsInvite;
    alreadyMember = classification.alreadyMember;
    if (alreadyMember.length > 0) {
      print('Leaving out participants who are already members:');
      printLines(print, renderAlreadyMembers(alreadyMember));
    }
  }

  if (toInvite.length === 0) {
    print('');
    print('No invites to send.');
    return { exitCode: 0, status: 'nothing-to-send', payload: null, skipped, alreadyMember };
  }

  const proceed = options.assumeYes ? true : await ctx.confirm(CONFIRM_QUESTION);
  if (!proceed) {
    print('Aborted.');
    return { exitCode: 0, status: 'aborted', payload: null, skipped, alreadyMember };
  }

  const payload = buildInvitePayload(toInvite, { role, customMessage: config.customMessage });
  print('');
  print(`Sending ${payload.invites.length} invite(s)`);
  print(`  URL: ${client.membersUrl}`);
  print(`  Role: ${payload.role}`);
  printLines(print, `  Payload: ${JSON.stringify(payload, null, 2)}`.split('\n'));

  let outcome: SendOutcome;
  try {
    const response = await client.sendInvites(payload);
    outcome = { success: true, sent: payload.invites.length, response };
    print('✓ Successfully sent invites');
    printLines(print, `  Response: ${JSON.stringify(response, null, 2)}`.split('\n'));
  } catch (error) {
    if (!(error instanceof TransportError)) throw error;
    log.error('Invite batch failed', { status: error.status });
    outcome = { success: false, error: error.message };
    print('✗ Failed to send invites');
    printLines(print, renderTransportFailure(error, '  '));
  }

  printLines(print, renderSendSummary(outcome));

  if (outcome.success) {
    return {
      exitCode: 0,
      status: 'sent',
      payload,
      skipped,
      alreadyMember,
      response: outcome.response,
    };
  }
  return { exitCode: 1, status: 'failed', payload, skipped, alreadyMember };
}
