/**
 * Manifest module exports
 */

export type { ApplicationManifestEntry, Manifest, ManifestErrorCode } from './types.js';
export { ManifestError, MANAGED_RELATIONS, desiredRelations } from './types.js';
export { loadManifest, parseManifest, validateManifest, SUPPORTED_API_VERSION } from './loader.js';
