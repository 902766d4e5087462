/**
 * page-distiller
 *
 * Boilerplate removal for rendered pages: finds the article or
 * documentation body, prunes navigation and advertising, and returns a
 * sanitized, link-preserving HTML fragment.
 *
 * @example
 * import { distill } from 'page-distiller';
 *
 * const result = distill(renderedHtml, { sourceUrl: 'https://example.com/post' });
 * console.log(result.tier, result.confidence, result.html);
 */

export { ContentDistiller, distill, type ContentDistillerOptions } from './core/content-distiller.js';
export {
  sanitizeFragment,
  sanitizeNode,
  verifyFragment,
  withNofollow,
  type SanitizeOptions,
  type SanitizeResult,
} from './core/sanitizer.js';
export {
  ExtractionError,
  MalformedInputError,
  NoContentFoundError,
  isExtractionError,
  type ExtractionErrorCode,
} from './core/extraction-errors.js';
export {
  buildPolicyTables,
  getPolicyTables,
  loadPolicyData,
  withFrameworkProfiles,
  type PolicyTables,
} from './core/policy-tables.js';
export {
  DEFAULT_EXTRACTION_CONFIG,
  ConfigValidationError,
  extractionConfigSchema,
  type ExtractionConfig,
  type ExtractionConfigInput,
} from './utils/config-schemas.js';
export {
  applyLogConfig,
  clearConfigFileCache,
  generateSampleConfig,
  getMergedExtractionConfig,
} from './utils/config-loader.js';
export { configureLogger, type LoggerConfig } from './utils/logger.js';
export type {
  DetectionPredicate,
  ExclusionRule,
  ExtractionResult,
  ExtractionState,
  ExtractionTier,
  FrameworkProfile,
  PageMetadata,
  RootReference,
  ScoreEntry,
  SemanticSource,
} from './types/extraction.js';
