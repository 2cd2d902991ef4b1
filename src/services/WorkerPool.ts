import { hostname } from 'node:os';
import { setTimeout as delay } from 'node:timers/promises';
import type { TaskQueue } from '../infra/queue/TaskQueue.js';
import { logger } from '../infra/logger.js';
import type { JobWorker } from './JobWorker.js';

export interface WorkerPoolOptions {
  queues: readonly string[];
  pollIntervalMs: number;
}

export function defaultWorkerId(index: number): string {
  return `${hostname()}:${process.pid}:${index}`;
}

/**
 * WorkerPool - runs one pull loop per JobWorker
 * Each loop reserves from the queues in order, hands the delivery to its worker
 * and sleeps for the poll interval when every queue is empty.
 */
export class WorkerPool {
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];

  constructor(
    private queue: TaskQueue,
    private workers: readonly JobWorker[],
    private options: WorkerPoolOptions
  ) {}

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loops = this.workers.map((worker) => this.loop(worker, controller.signal));

    logger.info('Worker pool started', {
      concurrency: this.workers.length,
      queues: this.options.queues,
    });
  }

  /**
   * Resolves once every loop has finished its current delivery and exited
   */
  async stop(): Promise<void> {
    if (!this.controller) {
      return;
    }
    this.controller.abort();
    await Promise.all(this.loops);
    this.controller = null;
    this.loops = [];
    logger.info('Worker pool stopped');
  }

  private async loop(worker: JobWorker, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let handled = false;
      try {
        const delivery = await this.queue.reserve(this.options.queues);
        if (delivery) {
          handled = true;
          const outcome = await worker.processDelivery(delivery);
          logger.debug('Delivery processed', {
            workerId: worker.workerId,
            jobId: delivery.message.jobId,
            outcome,
          });
        }
      } catch (error) {
        logger.error('Worker loop iteration failed', {
          workerId: worker.workerId,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      if (!handled && !signal.aborted) {
        await this.idle(signal);
      }
    }
  }

  private async idle(signal: AbortSignal): Promise<void> {
    try {
      await delay(this.options.pollIntervalMs, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) {
        throw error;
      }
    }
  }
}
