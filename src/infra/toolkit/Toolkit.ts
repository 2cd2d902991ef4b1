import type { EnvContext, UsageMetrics } from '../../domain/entities/Job.js';
import type { CredentialData } from '../../domain/entities/Session.js';

export interface ToolkitOutcome {
  result: string;
  usageMetrics: UsageMetrics | null;
}

/**
 * Content-generation routine a worker invokes for one job
 * Implementations throw RetriableExecutionError or FatalExecutionError; any other
 * thrown value is treated as non-retriable.
 */
export interface Toolkit {
  execute(
    input: string,
    envContext: EnvContext,
    credentials: CredentialData
  ): Promise<ToolkitOutcome>;
}
