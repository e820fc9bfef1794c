// =============================================================================
// Atlassian HTTP Client Factory + Upstream Call Helper
// =============================================================================
// createAtlassianHttp(config)
//   → One Axios instance shared by every service, with the configured timeout.
//     The bearer token is attached per request, never baked into the instance,
//     because the token cache may swap it between calls.
//
// callUpstream(http, tag, request)
//   → Issues the call and classifies the outcome:
//       • 2xx                    — returned as-is
//       • any other HTTP status  — UpstreamHttpError(tag, status, body)
//       • no response at all     — UpstreamUnavailableError (→ 502)
//     Nothing is retried: the caller sees the upstream failure verbatim.
//
// parseUpstream(schema, data, tag)
//   → zod-validates a 2xx body at the translation boundary so missing
//     required fields fail fast instead of leaking `undefined` downstream.
// =============================================================================
import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { z } from 'zod';
import type { AppConfig } from '../config';
import logger from '../utils/logger';
import { UpstreamHttpError, UpstreamUnavailableError } from '../utils/GatewayError';

/** Status used when a 2xx body does not have the shape we rely on */
const MALFORMED_UPSTREAM_STATUS = 502;

export function createAtlassianHttp(config: Pick<AppConfig, 'httpTimeoutMs'>): AxiosInstance {
  return axios.create({
    timeout: config.httpTimeoutMs,
    headers: { Accept: 'application/json' },
  });
}

export function bearer(accessToken: string): Record<string, string> {
  return { Authorization: `Bearer ${accessToken}` };
}

/**
 * Executes one upstream call. Non-2xx responses are turned into a tagged
 * `UpstreamHttpError` carrying the upstream status and body unchanged.
 */
export async function callUpstream(
  http: AxiosInstance,
  tag: string,
  request: AxiosRequestConfig,
): Promise<AxiosResponse<unknown>> {
  let res: AxiosResponse<unknown>;
  try {
    res = await http.request<unknown>({ ...request, validateStatus: () => true });
  } catch (err) {
    if (axios.isAxiosError(err) && !err.response) {
      logger.error(`${tag}: upstream unreachable`, {
        method: request.method ?? 'GET',
        url: request.url,
        errorCode: err.code,
      });
      throw new UpstreamUnavailableError(hostOf(request.url), err.code ?? err.message);
    }
    throw err;
  }

  if (res.status < 200 || res.status >= 300) {
    logger.warn(tag, {
      method: request.method ?? 'GET',
      url: request.url,
      status: res.status,
    });
    throw new UpstreamHttpError(tag, res.status, res.data ?? null);
  }

  return res;
}

/**
 * Validates an upstream body against `schema`, failing with a tagged 502
 * whose detail lists the offending paths.
 */
export function parseUpstream<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  tag: string,
): z.infer<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({
      path: i.path.join('.'),
      message: i.message,
    }));
    logger.warn(`${tag}: unexpected upstream payload`, { issues });
    throw new UpstreamHttpError(tag, MALFORMED_UPSTREAM_STATUS, {
      message: 'Unexpected upstream response shape',
      issues,
    });
  }
  return parsed.data;
}

function hostOf(url: string | undefined): string {
  if (!url) return 'Atlassian';
  try {
    return new URL(url).host;
  } catch {
    return 'Atlassian';
  }
}
