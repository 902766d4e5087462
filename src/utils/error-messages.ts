/**
 * Error Messages with Actionable Suggestions
 *
 * Provides user-facing error messages that include:
 * - Clear description of what went wrong
 * - Actionable suggestions for resolution
 * - Alternative approaches when available
 */

/**
 * Error message builder for consistent formatting
 */
export interface ErrorMessageOptions {
  /** Main error description */
  message: string;
  /** Suggested actions to resolve the issue */
  suggestions?: string[];
  /** Alternative approaches */
  alternatives?: string[];
}

/**
 * Build a formatted error message with suggestions
 */
export function buildErrorMessage(options: ErrorMessageOptions): string {
  const parts: string[] = [options.message];

  if (options.suggestions && options.suggestions.length > 0) {
    if (options.suggestions.length === 1) {
      parts.push(options.suggestions[0]);
    } else {
      parts.push('Suggestions:');
      options.suggestions.forEach(s => parts.push(`  - ${s}`));
    }
  }

  if (options.alternatives && options.alternatives.length > 0) {
    if (options.alternatives.length === 1) {
      parts.push(`Alternative: ${options.alternatives[0]}`);
    } else {
      parts.push('Alternatives:');
      options.alternatives.forEach(a => parts.push(`  - ${a}`));
    }
  }

  return parts.join('\n');
}

// =============================================================================
// INPUT ERRORS
// =============================================================================

/**
 * Error when the caller hands over something that is not a document
 */
export function malformedInputMessage(reason: string): string {
  return buildErrorMessage({
    message: `Input is not a rendered document: ${reason}.`,
    suggestions: [
      'Pass the serialized HTML of the rendered page, or a parsed Document',
      'Check that the rendering service returned a body before extracting',
    ],
  });
}

// =============================================================================
// EXTRACTION ERRORS
// =============================================================================

/**
 * Error when every discovery tier was exhausted
 */
export function noContentFoundMessage(url?: string): string {
  const target = url ? ` for ${url}` : '';
  return buildErrorMessage({
    message: `No main content could be located${target}.`,
    suggestions: [
      'Re-render the page and wait for client-side content to load',
      'Lower minParagraphLength if the page consists of very short paragraphs',
    ],
    alternatives: [
      'Register a framework profile for the site if its markup is known',
    ],
  });
}
