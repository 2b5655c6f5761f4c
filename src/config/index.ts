/**
 * Configuration module exports
 */

export {
  loadManifest,
  parseManifest,
  toManifestDocument,
  stringifyManifest,
  MANIFEST_API_VERSION,
  MANIFEST_KIND,
  DEFAULT_APPLY_METHOD,
  type ManifestLoadOptions,
  type ManifestLoadResult,
  type ManifestDocument,
} from './manifest.js';

export {
  ManifestError,
  type ManifestErrorCode,
  type ManifestIssue,
  type ManifestIssueSeverity,
} from './errors.js';
