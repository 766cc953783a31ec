export type { CommandContext, CommandResult, Print } from './context';
export { printLines } from './context';
export { generateUninvitedList } from './generate-uninvited-list';
export type { GenerateUninvitedOptions, GenerateUninvitedResult } from './generate-uninvited-list';
export { previewPayload } from './preview-payload';
export type { PreviewPayloadOptions, PreviewPayloadResult } from './preview-payload';
export { CONFIRM_QUESTION, sendInvites } from './send-invites';
export type { SendInvitesContext, SendInvitesOptions, SendInvitesResult, SendStatus } from './send-invites';
export { listTree, STATIC_FILE_NAME, stageWorkspace } from './stage-workspace';
export type { StageWorkspaceOptions, StageWorkspaceResult } from './stage-workspace';
export { verifyInvites } from './verify-invites';
export type { VerifyInvitesOptions, VerifyInvitesResult } from './verify-invites';
