// =============================================================================
// GatewayError — Typed errors for every failure the API surfaces
// =============================================================================
// Each subclass carries the HTTP status it maps to, a short fixed `error` tag
// and an optional `detail` payload. The Express error middleware renders them
// as `{ error, status?, detail? }`.
// =============================================================================

export class GatewayError extends Error {
  /** HTTP status returned to the caller */
  public readonly status: number;
  /** Short, fixed descriptive tag (e.g. "JIRA search failed") */
  public readonly error: string;
  /** Structured diagnostic payload (upstream body, validation issues …) */
  public readonly detail?: unknown;

  constructor(status: number, error: string, detail?: unknown, message?: string) {
    super(message ?? error);
    this.name = 'GatewayError';
    this.status = status;
    this.error = error;
    this.detail = detail;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): { error: string; detail?: unknown } {
    return this.detail === undefined
      ? { error: this.error }
      : { error: this.error, detail: this.detail };
  }
}

/** Required OAuth settings are missing — fatal for the flow, surfaced as 500 */
export class ConfigurationError extends GatewayError {
  public readonly missing: string[];

  constructor(missing: string[]) {
    super(500, 'Server misconfiguration', `Missing required configuration: ${missing.join(', ')}`);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

export class BadRequestError extends GatewayError {
  constructor(message: string, detail?: unknown) {
    super(400, message, detail);
    this.name = 'BadRequestError';
  }
}

/** CSRF state absent, expired or already consumed (possible replay) */
export class InvalidStateError extends GatewayError {
  constructor() {
    super(400, 'Invalid state', 'The OAuth state is unknown, expired or was already used. Start the login again.');
    this.name = 'InvalidStateError';
  }
}

/** Non-2xx from an Atlassian endpoint — the upstream status is forwarded */
export class UpstreamHttpError extends GatewayError {
  public readonly upstreamBody: unknown;

  constructor(tag: string, status: number, upstreamBody: unknown) {
    super(status, tag, upstreamBody, `${tag} (HTTP ${status})`);
    this.name = 'UpstreamHttpError';
    this.upstreamBody = upstreamBody;
  }

  toJSON(): { error: string; status: number; detail?: unknown } {
    return { error: this.error, status: this.status, detail: this.upstreamBody };
  }
}

/** Network / transport failure talking to Atlassian (no HTTP response at all) */
export class UpstreamUnavailableError extends GatewayError {
  constructor(target: string, reason: string) {
    super(502, 'Upstream error', `${target} unreachable: ${reason}`);
    this.name = 'UpstreamUnavailableError';
  }
}

/** No usable Atlassian token in the cache */
export class AuthenticationRequiredError extends GatewayError {
  constructor(reason = 'Not authenticated with Atlassian. Visit /api/v1/auth/atlassian/login first.') {
    super(401, 'Not authenticated', reason);
    this.name = 'AuthenticationRequiredError';
  }
}

export class UnauthorizedError extends GatewayError {
  constructor(message = 'Could not validate credentials') {
    super(401, message);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends GatewayError {
  constructor(message = 'Not authorized to access this resource') {
    super(403, message);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string) {
    super(404, message);
    this.name = 'NotFoundError';
  }
}
