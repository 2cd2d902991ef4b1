import { z } from 'zod';

export const taskMessageSchema = z.object({
  jobId: z.string().min(1),
  ownerId: z.string().min(1),
  input: z.string(),
  envContext: z.record(z.string()),
});

/** Request to execute one job, carried from the gateway to a worker */
export type TaskMessage = z.infer<typeof taskMessageSchema>;

export interface TaskDelivery {
  messageId: string;
  /** Identifies this reservation; acking with an expired receipt is a no-op */
  receipt: string;
  queue: string;
  message: TaskMessage;
  deliveryCount: number;
  enqueuedAt: Date;
}

/**
 * At-least-once message channel between the gateway and the worker pool
 *
 * A reserved message stays invisible for the visibility timeout. If it is not
 * acked in that window it is delivered again, so consumers must tolerate
 * duplicates. Ack only once the job reached a terminal state or was handed
 * off; never on reserve.
 */
export interface TaskQueue {
  publish(queue: string, message: TaskMessage): Promise<string>;
  /** Reserves the oldest visible message across `queues`, or null when all are empty */
  reserve(queues: readonly string[]): Promise<TaskDelivery | null>;
  ack(delivery: TaskDelivery): Promise<void>;
  /** Gives the message back so it becomes visible again after `delayMs` */
  release(delivery: TaskDelivery, delayMs?: number): Promise<void>;
  depth(queue: string): Promise<number>;
}

export interface TaskQueueOptions {
  visibilityTimeoutMs: number;
  clock?: () => Date;
}
