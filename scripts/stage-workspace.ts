#!/usr/bin/env tsx
/**
 * Container entry point: lists RESOURCES_DIR, prints its static-file.txt and copies
 * INPUT_DIR into OUTPUT_DIR.
 *
 * Usage: npx tsx scripts/stage-workspace.ts
 */

import { loadConfig, runCli, setLogLevel, stageWorkspace } from '@invite-sync/reconcile';

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const result = await stageWorkspace(config, { print: (line) => console.log(line) }, { argv });
  return result.exitCode;
}

void runCli(main);
