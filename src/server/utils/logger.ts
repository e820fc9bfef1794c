// =============================================================================
// Safe Logger — NEVER logs tokens, authorization codes, secrets or passwords
// =============================================================================
import winston from 'winston';

const REDACT_KEYS = new Set([
  'accesstoken', 'refreshtoken', 'idtoken', 'token',
  'secret', 'clientsecret', 'atlassianclientsecret', 'jwtsecret',
  'password', 'passwordhash', 'authorization', 'cookie',
  'apikey', 'code', 'state',
]);

export function redactSensitive(obj: unknown, depth = 0): unknown {
  if (depth > 6 || !obj || typeof obj !== 'object') return obj;
  if (Array.isArray(obj)) return obj.map((item) => redactSensitive(item, depth + 1));

  const clean: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const normKey = key.toLowerCase().replace(/[_\-.\s]/g, '');
    if (REDACT_KEYS.has(normKey)) {
      clean[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null) {
      clean[key] = redactSensitive(value, depth + 1);
    } else {
      clean[key] = value;
    }
  }
  return clean;
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const safe = redactSensitive(meta);
      const metaStr =
        typeof safe === 'object' && safe !== null && Object.keys(safe).length
          ? ` ${JSON.stringify(safe)}`
          : '';
      return `[${String(timestamp)}] ${level.toUpperCase()}: ${String(message)}${metaStr}`;
    }),
  ),
  transports: [
    new winston.transports.Console(),
    ...(process.env.LOG_FILE
      ? [new winston.transports.File({ filename: process.env.LOG_FILE, maxsize: 5_000_000, maxFiles: 3 })]
      : []),
  ],
});

export default logger;
