// =============================================================================
// Atlassian OAuth Tests
// =============================================================================
// Tests: buildAuthorizationUrl, exchangeCode, refreshAccessToken
// =============================================================================

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { buildAuthorizationUrl, exchangeCode, refreshAccessToken } from '../services/atlassianOAuth';
import { UpstreamHttpError, UpstreamUnavailableError } from '../utils/GatewayError';
import { FakeAtlassian, TOKEN_URL } from './helpers/fakeAtlassian';
import { NOW, testConfig } from './helpers/testContext';

describe('buildAuthorizationUrl', () => {
  it('targets the Atlassian consent screen with every required parameter', () => {
    const config = testConfig({ ATLASSIAN_SCOPES: 'read:jira-work offline_access' });
    const url = new URL(buildAuthorizationUrl(config, 'state-abc'));

    expect(url.origin).toBe('https://auth.atlassian.com');
    expect(url.pathname).toBe('/authorize');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      audience: 'api.atlassian.com',
      client_id: 'test-client-id',
      scope: 'read:jira-work offline_access',
      redirect_uri: 'http://localhost:3001/api/v1/auth/atlassian/callback',
      state: 'state-abc',
      response_type: 'code',
      prompt: 'consent',
    });
  });

  it('requests offline_access by default', () => {
    const url = new URL(buildAuthorizationUrl(testConfig(), 's'));
    expect(url.searchParams.get('scope')?.split(' ')).toContain('offline_access');
  });
});

describe('exchangeCode', () => {
  it('posts a JSON authorization_code grant and builds the token record', async () => {
    const fake = new FakeAtlassian().on('POST', TOKEN_URL, {
      status: 200,
      data: {
        access_token: 'access-test',
        refresh_token: 'refresh-test',
        token_type: 'Bearer',
        expires_in: 3600,
        scope: 'read:jira-work',
      },
    });

    const { record, response } = await exchangeCode(fake.http(), testConfig(), 'code-1', () => NOW);

    expect(fake.calls[0]?.data).toEqual({
      grant_type: 'authorization_code',
      client_id: 'test-client-id',
      client_secret: 'test-client-secret',
      code: 'code-1',
      redirect_uri: 'http://localhost:3001/api/v1/auth/atlassian/callback',
    });
    expect(record).toEqual({
      accessToken: 'access-test',
      refreshToken: 'refresh-test',
      expiresAt: NOW + 3600_000,
      scope: 'read:jira-work',
      tokenType: 'Bearer',
    });
    expect(response.expires_in).toBe(3600);
  });

  it('forwards an upstream rejection with its status and body', async () => {
    const fake = new FakeAtlassian().on('POST', TOKEN_URL, {
      status: 400,
      data: { error: 'invalid_grant' },
    });

    const err = await exchangeCode(fake.http(), testConfig(), 'bad').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamHttpError);
    expect(err).toMatchObject({ status: 400, error: 'Token exchange failed', detail: { error: 'invalid_grant' } });
  });

  it('maps a transport failure to UpstreamUnavailableError', async () => {
    const fake = new FakeAtlassian().unreachable('POST', TOKEN_URL);

    const err = await exchangeCode(fake.http(), testConfig(), 'code').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamUnavailableError);
    expect(err).toMatchObject({
      status: 502,
      error: 'Upstream error',
      detail: 'auth.atlassian.com unreachable: ECONNREFUSED',
    });
  });

  it('rejects a 2xx body without an access token as a malformed response', async () => {
    const fake = new FakeAtlassian().on('POST', TOKEN_URL, { status: 200, data: { token_type: 'Bearer' } });

    await expect(exchangeCode(fake.http(), testConfig(), 'code')).rejects.toMatchObject({
      status: 502,
      error: 'Token exchange failed',
    });
  });
});

describe('refreshAccessToken', () => {
  it('keeps the current refresh token when none is returned', async () => {
    const fake = new FakeAtlassian().on('POST', TOKEN_URL, {
      status: 200,
      data: { access_token: 'access-2', expires_in: 600 },
    });

    const record = await refreshAccessToken(fake.http(), testConfig(), 'refresh-1', () => NOW);

    expect(fake.calls[0]?.data).toEqual({
      grant_type: 'refresh_token',
      client_id: 'test-client-id',
      client_secret: 'test-client-secret',
      refresh_token: 'refresh-1',
    });
    expect(record).toEqual({
      accessToken: 'access-2',
      refreshToken: 'refresh-1',
      expiresAt: NOW + 600_000,
      scope: undefined,
      tokenType: 'Bearer',
    });
  });

  it('adopts a rotated refresh token', async () => {
    const fake = new FakeAtlassian().on('POST', TOKEN_URL, {
      status: 200,
      data: { access_token: 'access-2', refresh_token: 'refresh-2', expires_in: 600 },
    });

    const record = await refreshAccessToken(fake.http(), testConfig(), 'refresh-1', () => NOW);
    expect(record.refreshToken).toBe('refresh-2');
  });
});
