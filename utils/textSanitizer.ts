/**
 * Text sanitization for human time input
 */

// Pre-compiled regexes for performance
const CONTROL_CHARS_REGEX = /[\x00-\x08\x0E-\x1F\x7F]/g;
const WHITESPACE_REGEX = /\s+/g;

/**
 * Sanitize text by removing control characters and normalizing whitespace
 * @param text - Text to sanitize
 * @returns Sanitized text, or '' for anything that is not a string
 */
export function sanitizeText(text: unknown): string {
  if (!text || typeof text !== 'string') {
    return '';
  }

  return text
    .replace(CONTROL_CHARS_REGEX, '')
    .replace(WHITESPACE_REGEX, ' ')
    .trim();
}

/**
 * Bring raw user input into the shape the grammar expects:
 * sanitized, single-spaced and lowercase.
 */
export function normalizeHumanInput(text: unknown): string {
  return sanitizeText(text).toLowerCase();
}
