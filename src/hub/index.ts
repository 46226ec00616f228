/**
 * Hub Module Exports
 */

export { Hub, DEFAULT_REPLY_TIMEOUT_MS } from './hub';
export type { HubOptions } from './hub';
export { MoveHub, MoveHubPort, EXPECTED_SLOTS } from './move-hub';
export type { MoveHubOptions, MoveHubSlot, HubInfo } from './move-hub';
export { AttachmentTracker } from './attachment-tracker';
export type { AttachmentChange } from './attachment-tracker';
export { ReplySlot } from './reply-slot';
