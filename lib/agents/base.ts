/**
 * Base Agent class - Foundation for all pipeline stages
 */

import { Logger, retry, errorMessage } from '../utils';
import { AgentMessage } from '../types';
import { ExternalServiceError, StoryError } from '../errors';

export interface AgentConfig {
  name: string;
  /** Attempts per execution, the first one included. */
  retries?: number;
  /** First retry delay; doubles on each further attempt. */
  retryDelayMs?: number;
}

export type RetryPolicy = Pick<AgentConfig, 'retries' | 'retryDelayMs'>;

export type CompletedMessage<TInput, TOutput> = AgentMessage<TInput, TOutput> & { output: TOutput };

/**
 * Retry only failures that may succeed on a second attempt: unexpected
 * errors and retryable upstream responses. Validation and content problems
 * are final.
 */
function isTransient(error: unknown): boolean {
  if (error instanceof ExternalServiceError) {
    return error.isRetryable;
  }
  return !(error instanceof StoryError);
}

export abstract class BaseAgent<TInput, TOutput> {
  protected config: AgentConfig & { retries: number; retryDelayMs: number };

  constructor(config: AgentConfig) {
    this.config = {
      ...config,
      retries: config.retries ?? 1,
      retryDelayMs: config.retryDelayMs ?? 1000,
    };
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Main execution method - implements retry logic and error handling
   */
  async execute(runId: string, input: TInput): Promise<CompletedMessage<TInput, TOutput>> {
    const startTime = Date.now();

    const message: AgentMessage<TInput, TOutput> = {
      agent: this.config.name,
      run_id: runId,
      timestamp: new Date().toISOString(),
      input,
      errors: [],
    };

    try {
      Logger.info(`${this.config.name} starting`, { runId });

      const output = await retry(
        () => this.process(input),
        {
          maxRetries: this.config.retries,
          delayMs: this.config.retryDelayMs,
          backoff: true,
          shouldRetry: isTransient,
          onError: (error, attempt) => {
            message.errors.push(error.message);
            Logger.warn(`${this.config.name} attempt ${attempt} failed`, { runId, error: error.message });
          },
        }
      );

      const completed: CompletedMessage<TInput, TOutput> = {
        ...message,
        output,
        duration_ms: Date.now() - startTime,
      };

      Logger.info(`${this.config.name} completed`, {
        runId,
        duration_ms: completed.duration_ms,
      });

      return completed;
    } catch (error) {
      message.duration_ms = Date.now() - startTime;

      Logger.error(`${this.config.name} failed`, {
        runId,
        error: errorMessage(error),
        duration_ms: message.duration_ms,
        errors: message.errors.length,
      });

      throw error;
    }
  }

  protected abstract process(input: TInput): Promise<TOutput>;
}
