#!/usr/bin/env tsx
/**
 * Writes the registrants from the input workbook that are not yet organization members
 * to data/output/uninvited_members.csv.
 *
 * Usage: npx tsx scripts/generate-uninvited-list.ts [options]
 */

import {
  generateUninvitedList,
  loadConfig,
  runCli,
  setLogLevel,
} from '@invite-sync/reconcile';

interface CliOptions {
  envFile?: string;
  nameColumn?: string;
  input?: string;
  output?: string;
  emailColumn?: string;
}

function printHelp(): void {
  console.log(`Generate the list of registrants that still need an invite

Requires API_KEY, PENNSIEVE_HOST and ORG_ID (environment or dev.env).

Usage:
  npx tsx scripts/generate-uninvited-list.ts [options]

Options:
  --input <file>          Registration workbook (default: first .xlsx in INPUT_DIR)
  --output <file>         CSV to write (default: OUTPUT_DIR/uninvited_members.csv)
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
      case '--input':
        opts.input = argv[++i];
        break;
      case '--output':
        opts.output = argv[++i];
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
        console.error(`Unknown argument: ${arg}`);
        printHelp();
        process.exit(1);
    }
  }

  return opts;
}

async function main(): Promise<number> {
  const opts = parseArgs(process.argv.slice(2));
  const config = loadConfig({ envFile: opts.envFile });
  setLogLevel(config.logLevel);

  const result = await generateUninvitedList(
    config,
    { print: (line) => console.log(line) },
    { inputFile: opts.input, outputFile: opts.output, emailColumn: opts.emailColumn, nameColumn: opts.nameColumn }
  );
  return result.exitCode;
}

void runCli(main);
