import { logger } from '../infra/logger.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';

/**
 * JobRetentionService - purge finished jobs past the retention window
 * Pending and running jobs are never deleted, whatever their age.
 */
export class JobRetentionService {
  constructor(
    private jobRepo: JobRepository,
    private clock: () => Date = () => new Date()
  ) {}

  cleanupOlderThan(days: number): number {
    const cutoff = new Date(this.clock().getTime() - days * 24 * 60 * 60 * 1000);
    const jobIds = this.jobRepo.listTerminalIdsOlderThan(cutoff);

    if (jobIds.length === 0) {
      logger.info('No expired jobs to cleanup', { cutoff: cutoff.toISOString() });
      return 0;
    }

    try {
      const deleted = this.jobRepo.deleteByIds(jobIds);
      logger.info('Cleaned up expired jobs', {
        count: deleted,
        cutoff: cutoff.toISOString(),
      });
      return deleted;
    } catch (error) {
      logger.error('Failed to cleanup expired jobs', { error });
      throw error;
    }
  }
}
