// =============================================================================
// Error Sanitizer — strips secrets & PII from error messages before they leave
// =============================================================================
// Unexpected errors (anything that is not a GatewayError) may carry bearer
// tokens, JWTs or email addresses from a failed upstream call. The global
// error handler runs their message through `sanitizeMessage()` before
// putting it in a response body.
// =============================================================================

const EMAIL_RE = /[a-zA-Z0-9._%+\-]+@[a-zA-Z0-9.\-]+\.[a-zA-Z]{2,}/g;

/** Authorization header values and OAuth / JWT-shaped tokens */
const BEARER_RE = /Bearer\s+[A-Za-z0-9\-._~+/]+=*/g;
const JWT_RE = /\beyJ[A-Za-z0-9\-_]+\.eyJ[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_.+/=]+\b/g;

/** key=value pairs from query strings / form bodies */
const PARAM_RE = /\b(access_token|refresh_token|client_secret|code|password)=([^&\s]+)/gi;

/** 32+ char hex or 40+ char alphanumeric runs (API keys, opaque tokens) */
const TOKEN_HEX_RE = /\b[0-9a-fA-F]{32,}\b/g;
const API_KEY_RE = /\b[A-Za-z0-9]{40,}\b/g;

const PLACEHOLDERS: Array<[RegExp, string]> = [
  [JWT_RE, '[token]'],
  [BEARER_RE, 'Bearer [token]'],
  [PARAM_RE, '$1=[redacted]'],
  [EMAIL_RE, '[email]'],
  [TOKEN_HEX_RE, '[token]'],
  [API_KEY_RE, '[token]'],
];

/**
 * Strip sensitive data from a raw error message.
 */
export function sanitizeMessage(message: string): string {
  let sanitized = message;
  for (const [pattern, placeholder] of PLACEHOLDERS) {
    sanitized = sanitized.replace(pattern, placeholder);
  }
  return sanitized;
}

/**
 * Convert anything caught into an Error whose message is safe for a
 * client-facing response.
 */
export function toSafeError(err: unknown): Error {
  const original = err instanceof Error ? err : new Error(String(err));
  return new Error(sanitizeMessage(original.message));
}
