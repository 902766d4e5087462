/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * Environment variables arrive as strings and go through the `*EnvSchema`
 * variants; config files and per-call overrides use the typed schemas.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; any other value as false.
 * A missing value yields `defaultValue`.
 */
export function booleanStringSchema(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultValue;
      return ['true', '1', 'yes'].includes(val.toLowerCase());
    });
}

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  let schema = z.coerce.number().int();

  if (options.min !== undefined) schema = schema.min(options.min);
  if (options.max !== undefined) schema = schema.max(options.max);

  return schema.default(options.default);
}

/**
 * Schema for parsing a string as a float between 0 and 1 (ratio/threshold).
 */
export function rateSchema(defaultVal: number) {
  return z.coerce.number().min(0).max(1).default(defaultVal);
}

/**
 * Schema for an ISO 639 primary language subtag ("en", "pt", "fil").
 */
export const languageCodeSchema = z
  .string()
  .regex(/^[a-zA-Z]{2,3}$/, { message: 'Must be an ISO 639 language code such as "en"' })
  .transform((val) => val.toLowerCase());

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema(false),
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// EXTRACTION CONFIGURATION
// ============================================

/**
 * Tunable extraction constants. Values are heuristic; the defaults are
 * the ones the property tests are written against.
 */
export const extractionConfigSchema = z.object({
  /** Link density above which a candidate or root child counts as navigation */
  linkDensityThreshold: z.number().min(0).max(1).default(0.5),
  /** Paragraph-like nodes shorter than this are not scored */
  minParagraphLength: z.number().int().min(0).max(10_000).default(25),
  /** Text a semantic candidate must exceed to be accepted */
  minSemanticTextLength: z.number().int().min(0).max(1_000_000).default(140),
  /** Weight multiplier applied per ancestor level during propagation */
  propagationDecay: z.number().min(0).max(1).default(0.5),
  /** Number of ancestor levels a paragraph contributes to */
  propagationDepth: z.number().int().min(1).max(10).default(3),
  /** Bonus/penalty for positive/negative class and id patterns */
  classWeight: z.number().min(0).max(100).default(25),
  /** Stopword density below which prose is considered suspicious */
  stopwordDensityThreshold: z.number().min(0).max(1).default(0.1),
  /** Contribution multiplier for paragraphs under the stopword threshold */
  lowProseFactor: z.number().min(0).max(1).default(0.5),
  /** Share of articleBody tokens a DOM node must contain to match it */
  structuredCoverageThreshold: z.number().min(0).max(1).default(0.8),
  /** Traversal depth cap; deeper nodes are ignored by scoring and dropped by the sanitizer */
  maxTraversalDepth: z.number().int().min(16).max(4096).default(512),
  /** Stopword set used when the document declares no language */
  defaultLanguage: languageCodeSchema.default('en'),
  /** Keep class and id attributes in the sanitized output */
  keepClassAndId: z.boolean().default(true),
  /** Resolve relative href/src values against the page's source URL */
  resolveRelativeUrls: z.boolean().default(true),
});

export type ExtractionConfig = z.infer<typeof extractionConfigSchema>;
export type ExtractionConfigInput = z.input<typeof extractionConfigSchema>;

export const EXTRACTION_CONFIG_KEYS = extractionConfigSchema.keyof().options;

/**
 * String-valued variant used for environment variables.
 */
export const extractionEnvSchema = z.object({
  linkDensityThreshold: rateSchema(0.5),
  minParagraphLength: integerStringSchema({ min: 0, max: 10_000, default: 25 }),
  minSemanticTextLength: integerStringSchema({ min: 0, max: 1_000_000, default: 140 }),
  propagationDecay: rateSchema(0.5),
  propagationDepth: integerStringSchema({ min: 1, max: 10, default: 3 }),
  classWeight: z.coerce.number().min(0).max(100).default(25),
  stopwordDensityThreshold: rateSchema(0.1),
  lowProseFactor: rateSchema(0.5),
  structuredCoverageThreshold: rateSchema(0.8),
  maxTraversalDepth: integerStringSchema({ min: 16, max: 4096, default: 512 }),
  defaultLanguage: languageCodeSchema.default('en'),
  keepClassAndId: booleanStringSchema(true),
  resolveRelativeUrls: booleanStringSchema(true),
});

/**
 * Environment variable names for each extraction setting.
 */
export const EXTRACTION_ENV_VARS: Readonly<Record<keyof ExtractionConfig, string>> = {
  linkDensityThreshold: 'DISTILLER_LINK_DENSITY_THRESHOLD',
  minParagraphLength: 'DISTILLER_MIN_PARAGRAPH_LENGTH',
  minSemanticTextLength: 'DISTILLER_MIN_SEMANTIC_TEXT_LENGTH',
  propagationDecay: 'DISTILLER_PROPAGATION_DECAY',
  propagationDepth: 'DISTILLER_PROPAGATION_DEPTH',
  classWeight: 'DISTILLER_CLASS_WEIGHT',
  stopwordDensityThreshold: 'DISTILLER_STOPWORD_DENSITY_THRESHOLD',
  lowProseFactor: 'DISTILLER_LOW_PROSE_FACTOR',
  structuredCoverageThreshold: 'DISTILLER_STRUCTURED_COVERAGE_THRESHOLD',
  maxTraversalDepth: 'DISTILLER_MAX_TRAVERSAL_DEPTH',
  defaultLanguage: 'DISTILLER_DEFAULT_LANGUAGE',
  keepClassAndId: 'DISTILLER_KEEP_CLASS_AND_ID',
  resolveRelativeUrls: 'DISTILLER_RESOLVE_RELATIVE_URLS',
};

/**
 * Defaults, as produced by the schema.
 */
export const DEFAULT_EXTRACTION_CONFIG: Readonly<ExtractionConfig> = Object.freeze(
  extractionConfigSchema.parse({})
);

// ============================================
// VALIDATION HELPERS
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse with a schema, throwing ConfigValidationError on failure.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  section: string
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
}
