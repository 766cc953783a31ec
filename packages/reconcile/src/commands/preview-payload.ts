import { partitionInvitable } from '../classifier';
import { membersUrl } from '../client';
import { type InviteSyncConfig, requireEndpoint } from '../config';
import { buildInvitePayload } from '../payload';
import { banner, renderConfiguration, renderInviteRequest, renderSkipped } from '../report';
import { resolveColumns, toRegistrants } from '../schema';
import { readTable } from '../table';
import type { InvitePayload, Registrant } from '../types';

import { type CommandContext, type CommandResult, printLines } from './context';

export interface PreviewPayloadOptions {
  csvFile?: string;
  /** Header of the email column, when several headers mention "email". */
  emailColumn?: string;
  /** Header of the name column, when it is not called "Name". */
  nameColumn?: string;
  role?: string;
}

export interface PreviewPayloadResult extends CommandResult {
  url: string;
  payload: InvitePayload;
  skipped: Registrant[];
}

/** Prints the batch invite request for an invite list without sending it. */
export async function previewPayload(
  config: InviteSyncConfig,
  ctx: CommandContext,
  options: PreviewPayloadOptions = {}
): Promise<PreviewPayloadResult> {
  const endpoint = requireEndpoint(config);
  const { print } = ctx;
  const csvFile = options.csvFile ?? config.inviteCsv;
  const role = options.role ?? config.inviteRole;

  printLines(print, banner('Invite Payload Preview'));

  const table = await readTable(csvFile);
  printLines(
    print,
    renderConfiguration([
      ['Host', endpoint.host],
      ['Organization ID', endpoint.orgId],
      ['CSV File', csvFile],
      ['Default Permission', role],
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
  const { invitable, skipped } = partitionInvitable(registrants);
  printLines(print, renderSkipped(skipped));

  const payload = buildInvitePayload(invitable, { role, customMessage: config.customMessage });
  const url = membersUrl(endpoint.host, endpoint.orgId);
  printLines(print, renderInviteRequest(url, payload));

  return { exitCode: 0, url, payload, skipped };
}
