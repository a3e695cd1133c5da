/**
 * Secret redaction for strings that reach logs or the terminal
 */

const REDACTED = '[REDACTED]';

const SENSITIVE_PATTERNS: RegExp[] = [
  // GitHub tokens: personal, OAuth, user-to-server, server-to-server, refresh
  /gh[pousr]_[A-Za-z0-9]+/g,
  /github_pat_[A-Za-z0-9_]+/g,

  /bearer\s+[\w\-._]+/gi,
  /token[=:\s]+[\w\-._]+/gi,
  /api[_-]?key[=:\s]+[\w-]+/gi,
  /password[=:\s]+\S+/gi,

  // AWS access key id and secret access key
  /AKIA[0-9A-Z]{16}/g,
  /aws[_-]?secret[_-]?access[_-]?key[=:\s]+[\w/+=]+/gi,

  /secret[=:\s]+[\w\-._]+/gi
];

/**
 * Replaces secrets with [REDACTED], keeping a `name=` style prefix when present
 */
export function sanitizeString(input: string): string {
  let sanitized = input;

  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, (match) => {
      const separatorIndex = match.search(/[=:\s]/);
      if (separatorIndex !== -1) {
        return match.substring(0, separatorIndex + 1) + REDACTED;
      }
      return REDACTED;
    });
  }

  return sanitized;
}

/**
 * Returns a copy of the error with message and stack redacted
 */
export function sanitizeError(error: Error): Error {
  const sanitized = new Error(sanitizeString(error.message));
  sanitized.name = error.name;

  if (error.stack) {
    sanitized.stack = sanitizeString(error.stack);
  }

  return sanitized;
}

/**
 * Renders any thrown value as a redacted single message
 */
export function sanitizeForLogging(value: unknown): string {
  if (value instanceof Error) {
    return sanitizeString(`${value.name}: ${value.message}`);
  }
  return sanitizeString(String(value));
}
