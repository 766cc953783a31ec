import { promises as fs } from 'fs';
import * as path from 'path';

import type { InviteSyncConfig } from '../config';
import { ConfigurationMissingError, InputNotFoundError } from '../errors';
import { getLogger } from '../logger';

import { type CommandContext, type CommandResult, printLines } from './context';

const log = getLogger('reconcile:stage-workspace');

export const STATIC_FILE_NAME = 'static-file.txt';

export interface StageWorkspaceOptions {
  argv?: readonly string[];
}

export interface StageWorkspaceResult extends CommandResult {
  copiedFrom: string;
  copiedTo: string;
}

async function statOrNull(target: string) {
  try {
    return await fs.stat(target);
  } catch (_err) {
    return null;
  }
}

async function isDirectory(dir: string): Promise<boolean> {
  return (await statOrNull(dir))?.isDirectory() ?? false;
}

/**
 * Indented listing of a directory: each directory as `name/`, its files one level deeper,
 * then its subdirectories. Entries are sorted by name.
 */
export async function listTree(root: string): Promise<string[]> {
  const lines: string[] = [];

  async function walk(dir: string, level: number): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    lines.push(`${' '.repeat(4 * level)}${path.basename(dir)}/`);
    for (const entry of entries) {
      if (!entry.isDirectory()) {
        lines.push(`${' '.repeat(4 * (level + 1))}${entry.name}`);
      }
    }
    for (const entry of entries) {
      if (entry.isDirectory()) {
        await walk(path.join(dir, entry.name), level + 1);
      }
    }
  }

  await walk(root, 0);
  return lines;
}

/**
 * Container entry point: shows the static resources and copies the input directory into the
 * output directory, merging with whatever is already there.
 */
export async function stageWorkspace(
  config: InviteSyncConfig,
  ctx: CommandContext,
  options: StageWorkspaceOptions = {}
): Promise<StageWorkspaceResult> {
  if (!config.resourcesDir) {
    throw new ConfigurationMissingError(['RESOURCES_DIR']);
  }
  const { print } = ctx;
  const resourcesDir = config.resourcesDir;

  print('start of processing');
  print('Command line arguments ...');
  print(JSON.stringify(options.argv ?? []));
  print('Directories ...');
  print(`  input: ${config.inputDir}`);
  print(`  output: ${config.outputDir}`);
  print(`  resources: ${resourcesDir}`);

  if (await isDirectory(resourcesDir)) {
    printLines(print, await listTree(resourcesDir));
    const staticFile = path.join(resourcesDir, STATIC_FILE_NAME);
    if ((await statOrNull(staticFile))?.isFile()) {
      print(await fs.readFile(staticFile, 'utf8'));
    } else {
      log.debug('No static file in resources', { staticFile });
    }
  } else {
    print(`Resources directory not found: ${resourcesDir}`);
  }

  if (!(await isDirectory(config.inputDir))) {
    throw new InputNotFoundError(`Input directory not found: ${config.inputDir}`, config.inputDir);
  }
  await fs.cp(config.inputDir, config.outputDir, { recursive: true, force: true });
  log.info('Copied input to output', { from: config.inputDir, to: config.outputDir });

  print('end of processing');
  return { exitCode: 0, copiedFrom: config.inputDir, copiedTo: config.outputDir };
}
