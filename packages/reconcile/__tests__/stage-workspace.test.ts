/**
 * @jest-environment node
 */

import { promises as fs } from 'fs';
import * as path from 'path';

import { listTree, stageWorkspace, STATIC_FILE_NAME } from '../src/commands/stage-workspace';
import { ConfigurationMissingError, InputNotFoundError } from '../src/errors';

import { collectOutput, makeTempDir, testConfig } from './helpers/fixtures';

describe('stageWorkspace', () => {
  let dir: string;
  let resourcesDir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    resourcesDir = path.join(dir, 'resources');
    await fs.mkdir(path.join(resourcesDir, 'sub'), { recursive: true });
    await fs.writeFile(path.join(resourcesDir, STATIC_FILE_NAME), 'hello static');
    await fs.writeFile(path.join(resourcesDir, 'sub', 'nested.txt'), 'nested');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('lists files before subdirectories, indented by depth', async () => {
    expect(await listTree(resourcesDir)).toEqual(['resources/', '    static-file.txt', '    sub/', '        nested.txt']);
  });

  it('prints the resources and merges the input into the output directory', async () => {
    const config = testConfig(dir, { resourcesDir });
    await fs.mkdir(path.join(config.inputDir, 'batch'), { recursive: true });
    await fs.writeFile(path.join(config.inputDir, 'batch', 'registrations.csv'), 'Name,Email\n');
    await fs.mkdir(config.outputDir, { recursive: true });
    await fs.writeFile(path.join(config.outputDir, 'previous.csv'), 'kept');
    const out = collectOutput();

    const result = await stageWorkspace(config, { print: out.print }, { argv: ['--flag'] });

    expect(result).toEqual({ exitCode: 0, copiedFrom: config.inputDir, copiedTo: config.outputDir });
    expect(out.lines[0]).toBe('start of processing');
    expect(out.lines).toContain('["--flag"]');
    expect(out.lines).toContain('    static-file.txt');
    expect(out.lines).toContain('hello static');
    expect(out.lines[out.lines.length - 1]).toBe('end of processing');

    expect(await fs.readFile(path.join(config.outputDir, 'batch', 'registrations.csv'), 'utf8')).toBe('Name,Email\n');
    expect(await fs.readFile(path.join(config.outputDir, 'previous.csv'), 'utf8')).toBe('kept');
  });

  it('continues without a resources directory', async () => {
    const missing = path.join(dir, 'nope');
    const config = testConfig(dir, { resourcesDir: missing });
    await fs.mkdir(config.inputDir, { recursive: true });
    const out = collectOutput();

    await stageWorkspace(config, { print: out.print });

    expect(out.lines).toContain(`Resources directory not found: ${missing}`);
  });

  it('requires RESOURCES_DIR', async () => {
    await expect(stageWorkspace(testConfig(dir), { print: collectOutput().print })).rejects.toThrow(
      new ConfigurationMissingError(['RESOURCES_DIR']).message
    );
  });

  it('fails when the input directory is missing', async () => {
    await expect(
      stageWorkspace(testConfig(dir, { resourcesDir }), { print: collectOutput().print })
    ).rejects.toBeInstanceOf(InputNotFoundError);
  });
});
