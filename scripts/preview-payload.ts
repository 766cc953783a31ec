#!/usr/bin/env tsx
/**
 * Prints the batch invite request that send-invites would make, without sending anything.
 *
 * Usage: npx tsx scripts/preview-payload.ts [csv-file] [role]
 */

import { loadConfig, previewPayload, runCli, setLogLevel } from '@invite-sync/reconcile';

interface CliOptions {
  envFile?: string;
  emailColumn?: string;
  nameColumn?: string;
  csvFile?: string;
  role?: string;
}

function printHelp(): void {
  console.log(`Preview the invite payload for an invite list

Requires PENNSIEVE_HOST and ORG_ID (environment or dev.env).

Usage:
  npx tsx scripts/preview-payload.ts [csv-file] [role] [options]

Arguments:
  csv-file                Invite list (default INVITE_CSV, ./data/output/test_invite.csv)
  role                    Organization role for the invitees (default INVITE_ROLE, manager)

Options:
  --email-column <name>   Header of the email column when several headers mention "email"
  --name-column <name>    Header of the name column when it is not "Name"
  --env-file <path>       Settings file (default dev.env)
  -h, --help              Show this help message`);
}

function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
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

  const result = await previewPayload(
    config,
    { print: (line) => console.log(line) },
    { csvFile: opts.csvFile, role: opts.role, emailColumn: opts.emailColumn, nameColumn: opts.nameColumn }
  );
  return result.exitCode;
}

void runCli(main);
