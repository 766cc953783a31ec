/**
 * @jest-environment node
 */

import { promises as fs } from 'fs';
import * as path from 'path';

import {
  DEFAULT_CUSTOM_MESSAGE,
  loadConfig,
  readEnvFile,
  requireApiConnection,
  requireEndpoint,
} from '../src/config';
import { ConfigurationInvalidError, ConfigurationMissingError } from '../src/errors';

import { makeTempDir, testConfig } from './helpers/fixtures';

describe('loadConfig', () => {
  let dir: string;
  let envFile: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    envFile = path.join(dir, 'dev.env');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('prefers the environment and falls back to the env file', async () => {
    await fs.writeFile(
      envFile,
      ['# settings', 'API_KEY=file-key', 'PENNSIEVE_HOST=https://api.test.local', 'ORG_ID=org-1', ''].join('\n')
    );

    const config = loadConfig({ env: { API_KEY: 'env-key' }, envFile });

    expect(config).toEqual({
      apiKey: 'env-key',
      host: 'https://api.test.local',
      orgId: 'org-1',
      inviteRole: 'manager',
      customMessage: DEFAULT_CUSTOM_MESSAGE,
      inputDir: './data/input',
      outputDir: './data/output',
      resourcesDir: undefined,
      inviteCsv: './data/output/test_invite.csv',
      uninvitedCsv: path.join('./data/output', 'uninvited_members.csv'),
      logLevel: 'warn',
      envFile,
      envFileLoaded: true,
    });
  });

  it('treats blank environment values as unset', async () => {
    await fs.writeFile(envFile, 'API_KEY=file-key\n');

    expect(loadConfig({ env: { API_KEY: '   ' }, envFile }).apiKey).toBe('file-key');
  });

  it('reads quoted values from the env file', async () => {
    await fs.writeFile(envFile, 'INVITE_MESSAGE="Welcome to the hackathon"\nINVITE_ROLE=viewer\n');

    const config = loadConfig({ env: {}, envFile });

    expect(config.customMessage).toBe('Welcome to the hackathon');
    expect(config.inviteRole).toBe('viewer');
  });

  it('works without an env file', () => {
    const config = loadConfig({ env: { ORG_ID: 'org-9', OUTPUT_DIR: '/tmp/out' }, envFile });

    expect(config.envFileLoaded).toBe(false);
    expect(config.orgId).toBe('org-9');
    expect(config.apiKey).toBeUndefined();
    expect(config.uninvitedCsv).toBe(path.join('/tmp/out', 'uninvited_members.csv'));
  });

  it('finds the env file through INVITE_SYNC_ENV_FILE', async () => {
    const custom = path.join(dir, 'custom.env');
    await fs.writeFile(custom, 'ORG_ID=from-custom\n');

    expect(loadConfig({ env: { INVITE_SYNC_ENV_FILE: custom } }).orgId).toBe('from-custom');
  });

  it('normalizes LOG_LEVEL and rejects unknown levels', () => {
    expect(loadConfig({ env: { LOG_LEVEL: 'DEBUG' }, envFile }).logLevel).toBe('debug');
    expect(() => loadConfig({ env: { LOG_LEVEL: 'loud' }, envFile })).toThrow(ConfigurationInvalidError);
  });

  it('rejects a host that is not a URL', () => {
    expect(() => loadConfig({ env: { PENNSIEVE_HOST: 'not a url' }, envFile })).toThrow(ConfigurationInvalidError);
  });
});

describe('readEnvFile', () => {
  it('returns null for a missing file', () => {
    expect(readEnvFile('/definitely/not/here/dev.env')).toBeNull();
  });
});

describe('required settings', () => {
  it('lists every missing API setting at once', () => {
    const config = testConfig('/tmp/x', { apiKey: undefined, host: undefined, orgId: undefined });

    expect(() => requireApiConnection(config)).toThrow(
      'Missing required setting(s): API_KEY, PENNSIEVE_HOST, ORG_ID (set them in the environment or the env file)'
    );
  });

  it('returns the connection when everything is present', () => {
    expect(requireApiConnection(testConfig('/tmp/x'))).toEqual({
      apiKey: 'test-api-key-0000',
      host: 'https://api.test.local',
      orgId: 'org-123',
    });
  });

  it('needs only host and organization for an endpoint', () => {
    expect(requireEndpoint(testConfig('/tmp/x', { apiKey: undefined }))).toEqual({
      host: 'https://api.test.local',
      orgId: 'org-123',
    });

    try {
      requireEndpoint(testConfig('/tmp/x', { orgId: undefined }));
      throw new Error('expected missing configuration');
    } catch (error) {
      if (!(error instanceof ConfigurationMissingError)) throw error;
      expect(error.missing).toEqual(['ORG_ID']);
    }
  });
});
