import { randomUUID } from 'node:crypto';
import { logger } from '../logger.js';
import type { TaskDelivery, TaskMessage, TaskQueue, TaskQueueOptions } from './TaskQueue.js';

type Entry = {
  id: string;
  queue: string;
  message: TaskMessage;
  availableAt: number;
  reservedUntil: number | null;
  receipt: string | null;
  deliveryCount: number;
  enqueuedAt: Date;
};

/**
 * In-process queue with the same reserve/ack/visibility semantics as the SQLite queue
 * Used by tests and by single-process deployments with embedded workers.
 */
export class InMemoryTaskQueue implements TaskQueue {
  private entries: Entry[] = [];
  private visibilityTimeoutMs: number;
  private clock: () => Date;

  constructor(options: TaskQueueOptions) {
    this.visibilityTimeoutMs = options.visibilityTimeoutMs;
    this.clock = options.clock ?? (() => new Date());
  }

  async publish(queue: string, message: TaskMessage): Promise<string> {
    const now = this.clock();
    const entry: Entry = {
      id: randomUUID(),
      queue,
      message: { ...message, envContext: { ...message.envContext } },
      availableAt: now.getTime(),
      reservedUntil: null,
      receipt: null,
      deliveryCount: 0,
      enqueuedAt: now,
    };
    this.entries.push(entry);
    logger.debug('Task published', { messageId: entry.id, queue, jobId: message.jobId });
    return entry.id;
  }

  async reserve(queues: readonly string[]): Promise<TaskDelivery | null> {
    const now = this.clock().getTime();
    const visible = this.entries
      .filter(
        (entry) =>
          queues.includes(entry.queue) &&
          entry.availableAt <= now &&
          (entry.reservedUntil === null || entry.reservedUntil <= now)
      )
      .sort((a, b) => a.availableAt - b.availableAt);

    const entry = visible[0];
    if (!entry) return null;

    entry.receipt = randomUUID();
    entry.reservedUntil = now + this.visibilityTimeoutMs;
    entry.deliveryCount += 1;

    return {
      messageId: entry.id,
      receipt: entry.receipt,
      queue: entry.queue,
      message: { ...entry.message, envContext: { ...entry.message.envContext } },
      deliveryCount: entry.deliveryCount,
      enqueuedAt: entry.enqueuedAt,
    };
  }

  async ack(delivery: TaskDelivery): Promise<void> {
    const index = this.entries.findIndex(
      (entry) => entry.id === delivery.messageId && entry.receipt === delivery.receipt
    );
    if (index === -1) {
      logger.warn('Ack ignored, reservation no longer held', {
        messageId: delivery.messageId,
        jobId: delivery.message.jobId,
      });
      return;
    }
    this.entries.splice(index, 1);
  }

  async release(delivery: TaskDelivery, delayMs = 0): Promise<void> {
    const entry = this.entries.find(
      (candidate) => candidate.id === delivery.messageId && candidate.receipt === delivery.receipt
    );
    if (!entry) {
      logger.warn('Release ignored, reservation no longer held', {
        messageId: delivery.messageId,
        jobId: delivery.message.jobId,
      });
      return;
    }
    entry.receipt = null;
    entry.reservedUntil = null;
    entry.availableAt = this.clock().getTime() + delayMs;
  }

  async depth(queue: string): Promise<number> {
    return this.entries.filter((entry) => entry.queue === queue).length;
  }
}
