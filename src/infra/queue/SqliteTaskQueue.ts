import { randomUUID } from 'node:crypto';
import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import { logger } from '../logger.js';
import { taskMessageSchema } from './TaskQueue.js';
import type { TaskDelivery, TaskMessage, TaskQueue, TaskQueueOptions } from './TaskQueue.js';

type TaskMessageRow = {
  id: string;
  queue: string;
  payload: string;
  available_at: string;
  reserved_until: string | null;
  receipt: string | null;
  delivery_count: number;
  created_at: string;
};

/**
 * Durable task queue stored in the `task_messages` table
 * Reservation is a transaction: pick the oldest visible row, stamp a receipt and
 * push its visibility out by the timeout.
 */
export class SqliteTaskQueue implements TaskQueue {
  private visibilityTimeoutMs: number;
  private clock: () => Date;

  constructor(
    private db: DatabaseAdapter,
    options: TaskQueueOptions
  ) {
    this.visibilityTimeoutMs = options.visibilityTimeoutMs;
    this.clock = options.clock ?? (() => new Date());
  }

  async publish(queue: string, message: TaskMessage): Promise<string> {
    const id = randomUUID();
    const now = this.clock().toISOString();
    this.db.execute(
      `
      INSERT INTO task_messages (id, queue, payload, available_at, delivery_count, created_at)
      VALUES (?, ?, ?, ?, 0, ?)
      `,
      [id, queue, JSON.stringify(message), now, now]
    );

    logger.debug('Task published', { messageId: id, queue, jobId: message.jobId });
    return id;
  }

  async reserve(queues: readonly string[]): Promise<TaskDelivery | null> {
    if (queues.length === 0) return null;

    return this.db.transaction(() => {
      const now = this.clock();
      const nowIso = now.toISOString();
      const placeholders = queues.map(() => '?').join(', ');
      const selectSql = `
        SELECT * FROM task_messages
        WHERE queue IN (${placeholders})
          AND available_at <= ?
          AND (reserved_until IS NULL OR reserved_until <= ?)
        ORDER BY available_at ASC, rowid ASC
        LIMIT 1
      `;

      for (;;) {
        const row = this.db.queryOne<TaskMessageRow>(selectSql, [...queues, nowIso, nowIso]);
        if (!row) return null;

        const parsed = this.parsePayload(row.payload);
        if (!parsed) {
          logger.error('Discarding malformed task message', { messageId: row.id, queue: row.queue });
          this.db.execute('DELETE FROM task_messages WHERE id = ?', [row.id]);
          continue;
        }

        const receipt = randomUUID();
        const reservedUntil = new Date(now.getTime() + this.visibilityTimeoutMs).toISOString();
        this.db.execute(
          `
          UPDATE task_messages
          SET reserved_until = ?, receipt = ?, delivery_count = delivery_count + 1
          WHERE id = ?
          `,
          [reservedUntil, receipt, row.id]
        );

        return {
          messageId: row.id,
          receipt,
          queue: row.queue,
          message: parsed,
          deliveryCount: row.delivery_count + 1,
          enqueuedAt: new Date(row.created_at),
        };
      }
    });
  }

  async ack(delivery: TaskDelivery): Promise<void> {
    const changes = this.db.execute('DELETE FROM task_messages WHERE id = ? AND receipt = ?', [
      delivery.messageId,
      delivery.receipt,
    ]);

    if (changes === 0) {
      logger.warn('Ack ignored, reservation no longer held', {
        messageId: delivery.messageId,
        jobId: delivery.message.jobId,
      });
    }
  }

  async release(delivery: TaskDelivery, delayMs = 0): Promise<void> {
    const availableAt = new Date(this.clock().getTime() + delayMs).toISOString();
    const changes = this.db.execute(
      `
      UPDATE task_messages
      SET reserved_until = NULL, receipt = NULL, available_at = ?
      WHERE id = ? AND receipt = ?
      `,
      [availableAt, delivery.messageId, delivery.receipt]
    );

    if (changes === 0) {
      logger.warn('Release ignored, reservation no longer held', {
        messageId: delivery.messageId,
        jobId: delivery.message.jobId,
      });
    }
  }

  async depth(queue: string): Promise<number> {
    const row = this.db.queryOne<{ count: number }>(
      'SELECT COUNT(*) AS count FROM task_messages WHERE queue = ?',
      [queue]
    );
    return row?.count ?? 0;
  }

  private parsePayload(payload: string): TaskMessage | null {
    try {
      const result = taskMessageSchema.safeParse(JSON.parse(payload));
      return result.success ? result.data : null;
    } catch (error) {
      if (error instanceof SyntaxError) return null;
      throw error;
    }
  }
}
