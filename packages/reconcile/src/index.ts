/**
 * @invite-sync/reconcile - reconciles a registrant list against an organization's members
 *
 * This package provides:
 * - Email normalization and the membership index used to join both sides
 * - Classification of registrants into needs-invite / already-member / skipped
 * - Batch invite payloads and the membership API client
 * - Table I/O for .xlsx and .csv files, configuration loading and the script commands
 */

export { normalizeEmail, displayEmail } from './email';
export {
  buildMembershipIndex,
  emptyMembershipIndex,
  isMember,
  memberDetail,
  UNKNOWN_ROLE,
} from './membership-index';
export { classifyRegistrants, partitionInvitable } from './classifier';
export { buildInvite, buildInvitePayload, splitName, DEFAULT_INVITE_ROLE_CODE } from './payload';
export type { InvitePayloadOptions } from './payload';
export { resolveColumns, toRegistrants } from './schema';
export type { ColumnOverrides, ResolvedColumns } from './schema';
export { findInputWorkbook, parseCsv, readTable, tableFromMatrix, toCsv, writeCsv } from './table';

// Transport
export { MembershipClient, membersUrl } from './client';
export type { FetchLike, HttpRequest, HttpResponse } from './client';

// Configuration
export {
  loadConfig,
  readEnvFile,
  requireApiConnection,
  requireEndpoint,
  DEFAULT_CUSTOM_MESSAGE,
  DEFAULT_ENV_FILE,
  DEFAULT_INVITE_CSV,
  DEFAULT_INVITE_ROLE,
} from './config';
export type { ApiConnection, Endpoint, EnvSource, InviteSyncConfig, LoadConfigOptions } from './config';

// Errors, logging, CLI plumbing
export {
  ConfigurationInvalidError,
  ConfigurationMissingError,
  InputNotFoundError,
  InviteSyncError,
  SchemaMismatchError,
  TransportError,
} from './errors';
export { getLogger, getLogLevel, logger, setLogLevel, LOG_LEVELS } from './logger';
export type { Logger, LogLevel } from './logger';
export { createReadlineConfirm, isAffirmative } from './confirm';
export type { Confirm } from './confirm';
export { reportFailure, runCli } from './cli';
export type { CliIO } from './cli';
export * from './report';

export * from './commands';

export type {
  AlreadyMember,
  CellValue,
  ClassificationResult,
  Invite,
  InvitePayload,
  MemberDetail,
  MembershipIndex,
  Registrant,
  RemoteMember,
  Table,
  TableRecord,
} from './types';
export { RemoteMemberSchema, RemoteMemberListSchema } from './types';
