import { describe, expect, it } from 'vitest';
import { redactSecrets } from '../../../src/infra/logger.js';

describe('redactSecrets', () => {
  it('masks secret-bearing keys at any depth', () => {
    expect(
      redactSecrets({
        jobId: 'job-1',
        session: { credentialData: { accessToken: 'test-access' }, ownerId: 'user-1' },
        headers: [{ authorization: 'Bearer test-token' }],
      })
    ).toEqual({
      jobId: 'job-1',
      session: { credentialData: '***REDACTED***', ownerId: 'user-1' },
      headers: [{ authorization: '***REDACTED***' }],
    });
  });

  it('masks bearer tokens and key assignments inside strings', () => {
    expect(redactSecrets('sent Bearer abc.def-123')).toBe('sent Bearer ***REDACTED***');
    expect(redactSecrets('api_key=test-secret rest')).toBe('api_key=***REDACTED*** rest');
  });

  it('flattens errors into plain objects', () => {
    const error = new Error('token=test-secret');

    expect(redactSecrets(error)).toMatchObject({
      name: 'Error',
      message: 'token=***REDACTED***',
    });
  });
});
