import { classifyRegistrants } from '../classifier';
import { type InviteSyncConfig, requireApiConnection } from '../config';
import { getLogger } from '../logger';
import { buildMembershipIndex } from '../membership-index';
import {
  banner,
  BANNER,
  renderAlreadyMembers,
  renderRows,
  renderUninvitedTotals,
} from '../report';
import { resolveColumns, toRegistrants } from '../schema';
import { findInputWorkbook, readTable, writeCsv } from '../table';
import type { ClassificationResult } from '../types';

import { type CommandContext, type CommandResult, createClient, printLines } from './context';

const log = getLogger('reconcile:generate-uninvited-list');

export interface GenerateUninvitedOptions {
  /** Registration file; defaults to the first workbook in the input directory. */
  inputFile?: string;
  /** Defaults to the configured uninvited CSV path. */
  outputFile?: string;
  emailColumn?: string;
  nameColumn?: string;
}

export interface GenerateUninvitedResult extends CommandResult {
  classification: ClassificationResult;
  memberCount: number;
  /** Null when nobody needs an invite and no file was written. */
  outputFile: string | null;
}

/**
 * Writes the registrants that are not yet organization members to CSV, keeping every
 * original column.
 */
export async function generateUninvitedList(
  config: InviteSyncConfig,
  ctx: CommandContext,
  options: GenerateUninvitedOptions = {}
): Promise<GenerateUninvitedResult> {
  const connection = requireApiConnection(config);
  const { print } = ctx;

  printLines(print, banner('Uninvited Members List Generator'));

  const inputFile = options.inputFile ?? (await findInputWorkbook(config.inputDir));
  print(`Using file: ${inputFile}`);
  print('');

  const table = await readTable(inputFile);
  print(`Loaded ${table.rows.length} rows`);
  print(`Columns: ${table.columns.join(', ')}`);
  print('');
  print('First few rows:');
  printLines(print, renderRows(table.columns, table.rows, 5));
  print('');

  const columns = resolveColumns(table.columns, {
    emailColumn: options.emailColumn,
    nameColumn: options.nameColumn,
  });
  print(`Using column '${columns.emailColumn}' for email addresses`);

  const client = createClient(connection, ctx);
  print('');
  print('Fetching existing members...');
  print(`URL: ${client.membersUrl}`);
  const members = await client.listMembers();
  const index = buildMembershipIndex(members);
  print(`Found ${index.emails.size} existing members`);

  print('');
  print('First 5 existing member emails:');
  [...index.emails].slice(0, 5).forEach((email, idx) => print(`  ${idx + 1}. ${email}`));

  const classification = classifyRegistrants(toRegistrants(table, columns), index);
  log.info('Classified registrants', {
    needsInvite: classification.needsInvite.length,
    alreadyMember: classification.alreadyMember.length,
    skipped: classification.skipped.length,
  });

  printLines(print, renderUninvitedTotals({ memberCount: index.emails.size, classification }));

  if (classification.alreadyMember.length > 0) {
    print('');
    print('Already in workspace:');
    printLines(print, renderAlreadyMembers(classification.alreadyMember));
  }

  if (classification.needsInvite.length === 0) {
    print('');
    print('No uninvited members found!');
    return { exitCode: 0, classification, memberCount: index.emails.size, outputFile: null };
  }

  const outputFile = options.outputFile ?? config.uninvitedCsv;
  const records = classification.needsInvite.map((registrant) => registrant.record);
  await writeCsv(outputFile, table.columns, records);

  print('');
  print(`Uninvited members list saved to: ${outputFile}`);
  print('');
  print('First few uninvited members:');
  printLines(print, renderRows(table.columns, records, 10));
  print(BANNER);

  return { exitCode: 0, classification, memberCount: index.emails.size, outputFile };
}
