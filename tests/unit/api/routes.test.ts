import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import jwt from 'jsonwebtoken';
import { createApp } from '../../../src/app.js';
import { createContainer } from '../../../src/infra/container.js';
import type { Container } from '../../../src/infra/container.js';
import { parseEnv } from '../../../src/infra/env.js';
import type { Toolkit } from '../../../src/infra/toolkit/Toolkit.js';

vi.mock('../../../src/infra/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/infra/logger.js')>();
  return {
    ...actual,
    logger: {
      info: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
    },
  };
});

const JWT_SECRET = 'test-secret';

function tokenFor(ownerId: string, secret = JWT_SECRET): string {
  return jwt.sign({ id: ownerId }, secret, { algorithm: 'HS256', expiresIn: '1h' });
}

describe('HTTP API', () => {
  let container: Container;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const env = parseEnv({
      NODE_ENV: 'test',
      JWT_SECRET,
      SQLITE_DB_PATH: ':memory:',
      QUEUE_DRIVER: 'memory',
      EMBEDDED_WORKERS: 'true',
    });
    const toolkit: Toolkit = { execute: vi.fn() };
    container = createContainer(env, { toolkit, refresher: { refresh: vi.fn() } });

    server = createApp(container).listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address: AddressInfo | string | null = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
    container.db.close();
  });

  function request(path: string, init: RequestInit & { ownerId?: string } = {}) {
    const { ownerId, headers, ...rest } = init;
    return fetch(`${baseUrl}${path}`, {
      ...rest,
      headers: {
        'Content-Type': 'application/json',
        ...(ownerId ? { Authorization: `Bearer ${tokenFor(ownerId)}` } : {}),
        ...headers,
      },
    });
  }

  function signIn(ownerId: string) {
    container.sessionService.upsertSession(ownerId, {
      authenticated: true,
      requestedScopes: ['drive', 'documents', 'gmail_readonly'],
      grantedScopes: ['gmail_readonly', 'drive'],
      credentialData: {
        accessToken: 'test-access',
        refreshToken: 'test-refresh',
        expiresAt: null,
        tokenType: 'Bearer',
        scopes: [],
      },
      profile: { email: `${ownerId}@example.com`, name: ownerId, picture: '' },
    });
  }

  it('serves health and readiness without authentication', async () => {
    const health = await request('/health');
    expect(health.status).toBe(200);
    expect(await health.json()).toMatchObject({ status: 'ok' });

    const ready = await request('/ready');
    expect(ready.status).toBe(200);
    expect(await ready.json()).toEqual({ status: 'ready', queueDepth: 0 });
  });

  it('lists the scope catalog publicly', async () => {
    const response = await request('/api/auth/scopes');
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.scopes).toHaveLength(10);
  });

  it('rejects requests without a valid bearer token', async () => {
    const missing = await request('/api/jobs');
    expect(missing.status).toBe(401);
    expect(await missing.json()).toEqual({
      error: 'UNAUTHORIZED',
      message: 'Missing bearer token',
    });

    const forged = await request('/api/jobs', {
      headers: { Authorization: `Bearer ${tokenFor('user-1', 'other-secret')}` },
    });
    expect(forged.status).toBe(401);
    expect(await forged.json()).toEqual({
      error: 'UNAUTHORIZED',
      message: 'Invalid or expired token',
    });
  });

  it('requires an authenticated session to submit', async () => {
    const response = await request('/api/jobs', {
      method: 'POST',
      ownerId: 'user-1',
      body: JSON.stringify({ message: 'hello' }),
    });

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      error: 'UNAUTHORIZED',
      message: 'User not authenticated. Please complete the OAuth flow first.',
    });
  });

  it('queues a job with the session identity and authorized scopes in its env', async () => {
    signIn('user-1');

    const response = await request('/api/jobs', {
      method: 'POST',
      ownerId: 'user-1',
      body: JSON.stringify({ message: 'Find my invoices', env: { TIMEZONE: 'Europe/Berlin' } }),
    });
    const body = await response.json();

    expect(response.status).toBe(202);
    expect(body).toEqual({
      jobId: expect.any(String),
      status: 'pending',
      message: 'Job queued for processing',
    });

    const delivery = await container.queue.reserve(['agent_runs']);
    expect(delivery?.message).toEqual({
      jobId: body.jobId,
      ownerId: 'user-1',
      input: 'Find my invoices',
      envContext: {
        TIMEZONE: 'Europe/Berlin',
        SESSION_USER_ID: 'user-1',
        AUTHORIZED_SCOPES: '["drive","gmail_readonly"]',
      },
    });
  });

  it('returns 400 for an invalid submission', async () => {
    signIn('user-1');

    const empty = await request('/api/jobs', {
      method: 'POST',
      ownerId: 'user-1',
      body: JSON.stringify({ message: '  ' }),
    });
    expect(empty.status).toBe(400);
    expect(await empty.json()).toMatchObject({
      error: 'VALIDATION_ERROR',
      message: 'message must not be empty',
    });

    const missing = await request('/api/jobs', {
      method: 'POST',
      ownerId: 'user-1',
      body: JSON.stringify({}),
    });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toMatchObject({ message: 'message is required' });

    const malformed = await request('/api/jobs', {
      method: 'POST',
      ownerId: 'user-1',
      body: '{"message":',
    });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({
      error: 'INVALID_JSON',
      message: 'Invalid JSON in request body',
    });
  });

  it('answers 503 when the task cannot be published', async () => {
    signIn('user-1');
    vi.spyOn(container.queue, 'publish').mockRejectedValueOnce(new Error('broker down'));

    const response = await request('/api/jobs', {
      method: 'POST',
      ownerId: 'user-1',
      body: JSON.stringify({ message: 'hello' }),
    });

    expect(response.status).toBe(503);
    expect(await response.json()).toMatchObject({
      error: 'PUBLISH_ERROR',
      message: 'Job queue unavailable, retry the submission later',
    });
  });

  it('scopes job reads to their owner', async () => {
    signIn('user-1');
    const job = await container.jobService.submit({ ownerId: 'user-1', input: 'mine' });

    const own = await request(`/api/jobs/${job.id}`, { ownerId: 'user-1' });
    expect(own.status).toBe(200);
    expect((await own.json()).job).toMatchObject({
      id: job.id,
      status: 'pending',
      message: 'mine',
      attempts: 0,
    });

    const foreign = await request(`/api/jobs/${job.id}`, { ownerId: 'user-2' });
    const missing = await request('/api/jobs/does-not-exist', { ownerId: 'user-2' });
    expect(foreign.status).toBe(404);
    expect(missing.status).toBe(404);
    expect((await foreign.json()).message).toBe(`Job with id ${job.id} not found`);
    expect((await missing.json()).message).toBe('Job with id does-not-exist not found');

    const list = await request('/api/jobs', { ownerId: 'user-2' });
    expect(await list.json()).toEqual({ jobs: [], total: 0 });
  });

  it('lists the caller jobs newest first', async () => {
    const first = await container.jobService.submit({ ownerId: 'user-1', input: 'first' });
    const second = await container.jobService.submit({ ownerId: 'user-1', input: 'second' });

    const response = await request('/api/jobs', { ownerId: 'user-1' });
    const body = await response.json();

    expect(body.total).toBe(2);
    expect(body.jobs.map((job: { id: string }) => job.id)).toEqual([second.id, first.id]);
    expect(body.jobs[0]).not.toHaveProperty('envContext');
  });

  it('reports session status and logs out', async () => {
    signIn('user-1');

    const status = await request('/api/auth/status', { ownerId: 'user-1' });
    expect(await status.json()).toEqual({
      authenticated: true,
      requestedScopes: ['drive', 'documents', 'gmail_readonly'],
      grantedScopes: ['gmail_readonly', 'drive'],
      email: 'user-1@example.com',
    });

    const logout = await request('/api/auth/logout', { method: 'DELETE', ownerId: 'user-1' });
    expect(logout.status).toBe(200);

    const after = await request('/api/auth/status', { ownerId: 'user-1' });
    expect((await after.json()).authenticated).toBe(false);

    const stranger = await request('/api/auth/status', { ownerId: 'user-9' });
    expect(await stranger.json()).toEqual({
      authenticated: false,
      requestedScopes: [],
      grantedScopes: [],
      email: null,
    });
  });
});
