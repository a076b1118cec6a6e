/**
 * Command exports
 */

export { appsGetCommand, appsListCommand, type AppsGetOptions, type AppsListOptions } from './apps.js';
export {
  relationListCommand,
  relationAddCommand,
  relationRemoveCommand,
  type RelationTarget,
  type RelationListOptions,
  type RelationEditOptions,
  type RelationEditResult,
} from './relations.js';
export { diffCommand, type DiffOptions, type DiffResult, type ApplicationDiff } from './diff.js';
export { syncCommand, type SyncOptions, type SyncResult } from './sync.js';
