#!/usr/bin/env tsx
/**
 * Checks every row of an invite list against the live member list and warns about
 * participants who are already members.
 *
 * Usage: npx tsx scripts/verify-invites.ts [csv-file]
 */

import { loadConfig, runCli, setLogLevel, verifyInvites } from '@invite-sync/reconcile';

interface CliOptions {
  envFile?: string;
  emailColumn?: string;
  nameColumn?: string;
  csvFile?: string;
}

function printHelp(): void {
  console.log(`Verify an invite list against current organization members

Requires API_KEY, PENNSIEVE_HOST and ORG_ID (environment or dev.env).

Usage:
  npx tsx scripts/verify-invites.ts [csv-file] [options]

Options:
  --email-column <name>   Header of the email column when several headers mention "email"
  --name-column <name>    Header of the name column when it is not "Name"
  --env-file <path>       Settings file (default dev.env)
  -h, --help              Show this help message`);
}

function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {};

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
        if (arg.startsWith('-') || opts.csvFile) {
          console.error(`Unknown argument: ${arg}`);
          printHelp();
          process.exit(1);
        }
        opts.csvFile = arg;
    }
  }

  return opts;
}

async function main(): Promise<number> {
  const opts = parseArgs(process.argv.slice(2));
  const config = loadConfig({ envFile: opts.envFile });
  setLogLevel(config.logLevel);

  const result = await verifyInvites(
    config,
    { print: (line) => console.log(line) },
    { csvFile: opts.csvFile, emailColumn: opts.emailColumn, nameColumn: opts.nameColumn }
  );
  return result.exitCode;
}

void runCli(main);
