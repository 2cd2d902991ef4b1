import { APICallError, generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { z } from 'zod';
import { FatalExecutionError, RetriableExecutionError, isToolkitError } from '../../domain/errors.js';
import { isCredentialExpired } from '../../domain/entities/Session.js';
import type { CredentialData } from '../../domain/entities/Session.js';
import type { EnvContext } from '../../domain/entities/Job.js';
import { AVAILABLE_SCOPES, resolveScopeId } from '../../domain/scopes.js';
import type { Env } from '../env.js';
import { logger } from '../logger.js';
import type { Toolkit, ToolkitOutcome } from './Toolkit.js';

type ModelFactory = (modelId: string) => LanguageModel;

interface AgentToolkitOptions {
  modelId: string;
  modelFactory: ModelFactory;
  isConfigured: () => boolean;
  clock?: () => Date;
}

const authorizedScopesSchema = z.array(z.string());

function truncateValue(value: string, limit = 200): string {
  if (value.length <= limit) return value;
  return `${value.slice(0, limit)}…`;
}

/**
 * Lists the Google capabilities the user granted, from the AUTHORIZED_SCOPES entry
 */
export function describeAuthorizedScopes(envContext: EnvContext): string[] {
  const raw = envContext.AUTHORIZED_SCOPES;
  if (!raw) return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn('Ignoring unparseable AUTHORIZED_SCOPES', { error });
    return [];
  }

  const result = authorizedScopesSchema.safeParse(parsed);
  if (!result.success) return [];

  return result.data.flatMap((value) => {
    const id = resolveScopeId(value);
    return id ? [AVAILABLE_SCOPES[id].description] : [];
  });
}

function buildSystemPrompt(envContext: EnvContext): string {
  const capabilities = describeAuthorizedScopes(envContext);
  const lines = [
    'You are an assistant acting on behalf of a signed-in user.',
    'Answer in markdown.',
  ];
  if (capabilities.length > 0) {
    lines.push('The user granted these capabilities:');
    lines.push(...capabilities.map((capability) => `- ${capability}`));
  } else {
    lines.push('The user granted no Google capabilities; do not claim to access their data.');
  }
  return lines.join('\n');
}

/**
 * Maps provider failures onto the retry taxonomy
 */
export function classifyToolkitFailure(error: unknown): Error {
  if (isToolkitError(error)) {
    return error;
  }

  if (APICallError.isInstance(error)) {
    const details = { statusCode: error.statusCode ?? null, url: error.url };
    return error.isRetryable
      ? new RetriableExecutionError(`Model provider unavailable: ${error.message}`, 'TOOLKIT_UNAVAILABLE', details)
      : new FatalExecutionError(`Model provider rejected the request: ${error.message}`, 'TOOLKIT_REJECTED', details);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new FatalExecutionError(`Toolkit failed: ${message}`, 'TOOLKIT_ERROR');
}

/**
 * Toolkit that runs the user's message through a language model
 * Retries are disabled in the SDK so the worker's retry policy is the only one.
 */
export class AgentToolkit implements Toolkit {
  private modelId: string;
  private modelFactory: ModelFactory;
  private configured: () => boolean;
  private clock: () => Date;

  constructor(options: AgentToolkitOptions) {
    this.modelId = options.modelId;
    this.modelFactory = options.modelFactory;
    this.configured = options.isConfigured;
    this.clock = options.clock ?? (() => new Date());
  }

  async execute(
    input: string,
    envContext: EnvContext,
    credentials: CredentialData
  ): Promise<ToolkitOutcome> {
    if (!this.configured()) {
      throw new FatalExecutionError('Model provider is not configured', 'TOOLKIT_NOT_CONFIGURED');
    }

    if (isCredentialExpired(credentials, this.clock().getTime())) {
      throw new RetriableExecutionError('User credential expired', 'CREDENTIAL_EXPIRED');
    }

    logger.info('Toolkit request', {
      model: this.modelId,
      inputLength: input.length,
      inputPreview: truncateValue(input),
    });

    try {
      const response = await generateText({
        model: this.modelFactory(this.modelId),
        system: buildSystemPrompt(envContext),
        prompt: input,
        maxRetries: 0,
      });

      const inputTokens = response.usage.inputTokens ?? 0;
      const outputTokens = response.usage.outputTokens ?? 0;

      logger.info('Toolkit response', {
        model: this.modelId,
        responseLength: response.text.length,
        inputTokens,
        outputTokens,
      });

      return {
        result: response.text,
        usageMetrics: {
          inputTokens,
          outputTokens,
          totalTokens: response.usage.totalTokens ?? inputTokens + outputTokens,
        },
      };
    } catch (error) {
      logger.error('Toolkit request failed', {
        model: this.modelId,
        message: error instanceof Error ? error.message : String(error),
      });
      throw classifyToolkitFailure(error);
    }
  }
}

export function createAgentToolkit(env: Pick<Env, 'OPENAI_API_KEY' | 'OPENAI_MODEL'>): AgentToolkit {
  const openai = createOpenAI({ apiKey: env.OPENAI_API_KEY });
  return new AgentToolkit({
    modelId: env.OPENAI_MODEL,
    modelFactory: (modelId) => openai(modelId),
    isConfigured: () => Boolean(env.OPENAI_API_KEY),
  });
}
