import { describe, expect, it } from 'vitest';
import {
  TERMINAL_STATUSES,
  canTransition,
  createJob,
  isTerminal,
  statusesLeadingTo,
  toJobSummary,
} from '../../../src/domain/entities/Job.js';

describe('Job entity', () => {
  const now = new Date('2026-03-01T10:00:00.000Z');

  it('creates a pending job with no result, error or claim', () => {
    const job = createJob({ id: 'job-1', ownerId: 'user-1', input: 'Summarize my inbox', now });

    expect(job.status).toBe('pending');
    expect(job.result).toBeNull();
    expect(job.error).toBeNull();
    expect(job.usageMetrics).toBeNull();
    expect(job.attempts).toBe(0);
    expect(job.claimedBy).toBeNull();
    expect(job.publishedAt).toBeNull();
    expect(job.createdAt).toEqual(now);
    expect(job.updatedAt).toEqual(now);
    expect(job.envContext).toEqual({});
  });

  it('copies and freezes the env context', () => {
    const envContext: Record<string, string> = { REGION: 'eu' };
    const job = createJob({ id: 'job-1', ownerId: 'user-1', input: 'hi', envContext, now });

    envContext.REGION = 'us';

    expect(job.envContext).toEqual({ REGION: 'eu' });
    expect(Object.isFrozen(job.envContext)).toBe(true);
  });

  it('allows only forward transitions', () => {
    expect(canTransition('pending', 'running')).toBe(true);
    expect(canTransition('running', 'completed')).toBe(true);
    expect(canTransition('running', 'failed')).toBe(true);
    expect(canTransition('pending', 'completed')).toBe(false);
    expect(canTransition('running', 'pending')).toBe(false);
  });

  it('has no exits from terminal states', () => {
    expect(isTerminal('completed')).toBe(true);
    expect(isTerminal('failed')).toBe(true);
    expect(isTerminal('pending')).toBe(false);
    expect(isTerminal('running')).toBe(false);
    expect(canTransition('completed', 'running')).toBe(false);
    expect(canTransition('failed', 'running')).toBe(false);
  });

  it('derives the guarded source statuses from the transition table', () => {
    expect(statusesLeadingTo('running')).toEqual(['pending']);
    expect(statusesLeadingTo('completed')).toEqual(['running']);
    expect(statusesLeadingTo('failed')).toEqual(['running']);
    expect(statusesLeadingTo('pending')).toEqual([]);
    expect(TERMINAL_STATUSES).toEqual(['completed', 'failed']);
  });

  it('omits env context and claim bookkeeping from summaries', () => {
    const job = createJob({
      id: 'job-1',
      ownerId: 'user-1',
      input: 'hi',
      envContext: { API_TOKEN: 'test-secret' },
      now,
    });

    const summary = toJobSummary(job);

    expect(summary).toEqual({
      id: 'job-1',
      ownerId: 'user-1',
      input: 'hi',
      status: 'pending',
      result: null,
      error: null,
      usageMetrics: null,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
    });
  });
});
