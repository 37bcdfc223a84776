/**
 * Manifest module exports
 */

export {
  loadManifest,
  parseManifest,
  parseManifestText,
  DEFAULT_TIMEOUT_SECONDS,
  type LoadedManifest,
} from './loader.js';

export {
  ManifestValidationError,
  missingField,
  invalidField,
  unknownField,
  type ManifestIssue,
  type ManifestIssueCode,
  type ManifestIssueSeverity,
} from './errors.js';
