#!/usr/bin/env tsx
/**
 * Sends one batch of organization invites for the rows of an invite list.
 * Asks for an explicit "yes" before the request is made.
 *
 * Usage: npx tsx scripts/send-invites.ts [csv-file] [role] [options]
 */

import {
  createReadlineConfirm,
  loadConfig,
  runCli,
  sendInvites,
  setLogLevel,
} from '@invite-sync/reconcile';

interface CliOptions {
  envFile?: string;
  emailColumn?: string;
  nameColumn?: string;
  csvFile?: string;
  role?: string;
  skipMemberCheck: boolean;
  yes: boolean;
}

function printHelp(): void {
  console.log(`Send organization invites for an invite list

Requires API_KEY, PENNSIEVE_HOST and ORG_ID (environment or dev.env).

Usage:
  npx tsx scripts/send-invites.ts [csv-file] [role] [options]

Arguments:
  csv-file              Invite list (default INVITE_CSV, ./data/output/test_invite.csv)
  role                  Organization role for the invitees (default INVITE_ROLE, manager)

Options:
  --skip-member-check   Do not fetch current members to leave them out of the batch
  --yes                 Send without the confirmation prompt
  --email-column <name> Header of the email column when several headers mention "email"
  --name-column <name>  Header of the name column when it is not "Name"
  --env-file <path>     Settings file (default dev.env)
  -h, --help            Show this help message`);
}

function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { skipMemberCheck: false, yes: false };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--skip-member-check':
        opts.skipMemberCheck = true;
        break;
      case '--yes':
        opts.yes = true;
        break;
      case '--email-column':
        opts.emailColumn = argv[++i];
        break;
      case '--name-column':
        opts.nameColumn = argv[++i];
        break;
      case '--env-file':
        opts.envFile = argv[++i];
        break;
      case '-h':
      case '--help':
        printHelp();
        process.exit(0);
        break;
      default:
        if (arg.startsWith('-')) {
          console.error(`Unknown argument: ${arg}`);
          printHelp();
          process.exit(1);
        }
        positional.push(arg);
    }
  }

  [opts.csvFile, opts.role] = positional;
  return opts;
}

async function main(): Promise<number> {
  const opts = parseArgs(process.argv.slice(2));
  const config = loadConfig({ envFile: opts.envFile });
  setLogLevel(config.logLevel);

  const result = await sendInvites(
    config,
    { print: (line) => console.log(line), confirm: createReadlineConfirm() },
    {
      csvFile: opts.csvFile,
      role: opts.role,
      skipMemberCheck: opts.skipMemberCheck,
      assumeYes: opts.yes,
      emailColumn: opts.emailColumn,
      nameColumn: opts.nameColumn,
    }
  );
  return result.exitCode;
}

void runCli(main);
