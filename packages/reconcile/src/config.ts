import { existsSync, readFileSync } from 'fs';
import * as path from 'path';

import * as dotenv from 'dotenv';
import { z } from 'zod';

import { ConfigurationInvalidError, ConfigurationMissingError } from './errors';
import { getLogger, type LogLevel } from './logger';

const log = getLogger('reconcile:config');

export const DEFAULT_ENV_FILE = 'dev.env';
export const DEFAULT_INVITE_ROLE = 'manager';
export const DEFAULT_CUSTOM_MESSAGE = 'Welcome to the Pennsieve Hackathon';
export const DEFAULT_INPUT_DIR = './data/input';
export const DEFAULT_OUTPUT_DIR = './data/output';
export const DEFAULT_INVITE_CSV = './data/output/test_invite.csv';
export const UNINVITED_CSV_NAME = 'uninvited_members.csv';

export type EnvSource = Record<string, string | undefined>;

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalSetting = z.preprocess(blankToUndefined, z.string().trim().optional());

const settingWithDefault = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const SettingsSchema = z.object({
  API_KEY: optionalSetting,
  PENNSIEVE_HOST: z.preprocess(blankToUndefined, z.string().trim().url().optional()),
  ORG_ID: optionalSetting,
  INVITE_ROLE: settingWithDefault(DEFAULT_INVITE_ROLE),
  INVITE_MESSAGE: settingWithDefault(DEFAULT_CUSTOM_MESSAGE),
  INPUT_DIR: settingWithDefault(DEFAULT_INPUT_DIR),
  OUTPUT_DIR: settingWithDefault(DEFAULT_OUTPUT_DIR),
  RESOURCES_DIR: optionalSetting,
  INVITE_CSV: settingWithDefault(DEFAULT_INVITE_CSV),
  UNINVITED_CSV: optionalSetting,
  LOG_LEVEL: z.preprocess(
    (value) => {
      const v = blankToUndefined(value);
      return typeof v === 'string' ? v.trim().toLowerCase() : v;
    },
    z.enum(['debug', 'info', 'warn', 'error']).default('warn')
  ),
});

const SETTING_KEYS = SettingsSchema.keyof().options;

export type SettingKey = (typeof SETTING_KEYS)[number];

export interface InviteSyncConfig {
  apiKey?: string;
  host?: string;
  orgId?: string;
  inviteRole: string;
  customMessage: string;
  inputDir: string;
  outputDir: string;
  resourcesDir?: string;
  inviteCsv: string;
  uninvitedCsv: string;
  logLevel: LogLevel;
  /** Env file consulted for settings missing from the environment. */
  envFile: string;
  envFileLoaded: boolean;
}

export interface LoadConfigOptions {
  env?: EnvSource;
  /** Overrides INVITE_SYNC_ENV_FILE and the default dev.env. */
  envFile?: string;
}

export function readEnvFile(filePath: string): Record<string, string> | null {
  if (!existsSync(filePath)) return null;
  return dotenv.parse(readFileSync(filePath));
}

function firstNonBlank(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '');
}

/**
 * Assembles the run configuration once: process environment first, then the env file.
 * Nothing else in the package reads the environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): InviteSyncConfig {
  const env = options.env ?? process.env;
  const envFile = options.envFile ?? firstNonBlank(env.INVITE_SYNC_ENV_FILE) ?? DEFAULT_ENV_FILE;
  const fileVars = readEnvFile(envFile);

  if (fileVars) {
    log.debug('Loaded env file', { envFile, keys: Object.keys(fileVars).length });
  } else {
    log.debug('Env file not found, using environment only', { envFile });
  }

  const raw: Partial<Record<SettingKey, string>> = {};
  for (const key of SETTING_KEYS) {
    raw[key] = firstNonBlank(env[key], fileVars?.[key]);
  }

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationInvalidError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const settings = parsed.data;
  return {
    apiKey: settings.API_KEY,
    host: settings.PENNSIEVE_HOST,
    orgId: settings.ORG_ID,
    inviteRole: settings.INVITE_ROLE,
    customMessage: settings.INVITE_MESSAGE,
    inputDir: settings.INPUT_DIR,
    outputDir: settings.OUTPUT_DIR,
    resourcesDir: settings.RESOURCES_DIR,
    inviteCsv: settings.INVITE_CSV,
    uninvitedCsv: settings.UNINVITED_CSV ?? path.join(settings.OUTPUT_DIR, UNINVITED_CSV_NAME),
    logLevel: settings.LOG_LEVEL,
    envFile,
    envFileLoaded: fileVars !== null,
  };
}

export interface Endpoint {
  host: string;
  orgId: string;
}

export interface ApiConnection extends Endpoint {
  apiKey: string;
}

/** Host and organization, for commands that only describe a request. */
export function requireEndpoint(config: InviteSyncConfig): Endpoint {
  const missing: string[] = [];
  if (!config.host) missing.push('PENNSIEVE_HOST');
  if (!config.orgId) missing.push('ORG_ID');
  if (!config.host || !config.orgId) {
    throw new ConfigurationMissingError(missing);
  }
  return { host: config.host, orgId: config.orgId };
}

export function requireApiConnection(config: InviteSyncConfig): ApiConnection {
  const missing: string[] = [];
  if (!config.apiKey) missing.push('API_KEY');
  if (!config.host) missing.push('PENNSIEVE_HOST');
  if (!config.orgId) missing.push('ORG_ID');
  if (!config.apiKey || !config.host || !config.orgId) {
    throw new ConfigurationMissingError(missing);
  }
  return { apiKey: config.apiKey, host: config.host, orgId: config.orgId };
}
