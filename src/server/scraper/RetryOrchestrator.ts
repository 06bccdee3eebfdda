// ============================================================================
// RETRY ORCHESTRATOR
// ============================================================================
// Runs whole scrape attempts with bounded retries and exponential backoff

import type { RunResult } from '../../shared/types.js';
import {
  DEFAULT_RETRY_CONFIG,
  ScrapeErrorType,
  calculateRetryDelay,
  isRetriable,
  wrapError,
  type RetryConfig,
} from './types/errors.js';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryFailure {
  error: string;
  errorType: ScrapeErrorType;
  attempts: number;
}

export interface RetryOptions {
  maxAttempts: number;
  backoffUnitMs: number;
  sleep?: Sleep;
  /** Builds the terminal result when no attempt produced one to return */
  fallback: (failure: RetryFailure) => RunResult;
}

export type AttemptFn = (attempt: number) => Promise<RunResult>;

export class RetryOrchestrator {
  private config: RetryConfig;
  private sleep: Sleep;
  private fallback: (failure: RetryFailure) => RunResult;

  constructor(options: RetryOptions) {
    this.config = {
      ...DEFAULT_RETRY_CONFIG,
      maxAttempts: options.maxAttempts,
      backoffUnitMs: options.backoffUnitMs,
    };
    this.sleep = options.sleep ?? defaultSleep;
    this.fallback = options.fallback;
  }

  /**
   * Run `attemptFn` until it succeeds, fails terminally, or attempts run out.
   * A thrown error and a retryable failed result are treated alike.
   */
  async attemptWithRetries(attemptFn: AttemptFn): Promise<RunResult> {
    const { maxAttempts } = this.config;
    let lastError = 'Unknown error';
    let lastType = ScrapeErrorType.UNKNOWN;
    let attempt = 0;

    while (attempt < maxAttempts) {
      attempt++;
      console.log(`[RetryOrchestrator] Attempt ${attempt}/${maxAttempts}`);

      try {
        const result = await attemptFn(attempt);
        if (result.success) {
          return { ...result, attempts: attempt };
        }
        lastError = result.error ?? lastError;
        lastType = result.errorType ?? ScrapeErrorType.UNKNOWN;
        if (!isRetriable(lastType, this.config)) {
          console.log(`[RetryOrchestrator] Terminal result (${lastType}): ${lastError}`);
          return { ...result, attempts: attempt };
        }
      } catch (error) {
        const scrapeError = wrapError(error);
        lastError = scrapeError.message;
        lastType = scrapeError.type;
        console.error(`[RetryOrchestrator] Attempt ${attempt} threw (${lastType}):`, scrapeError.message);
        if (!isRetriable(lastType, this.config)) {
          return this.fallback({ error: lastError, errorType: lastType, attempts: attempt });
        }
      }

      if (attempt < maxAttempts) {
        const delay = calculateRetryDelay(attempt - 1, this.config);
        console.log(`[RetryOrchestrator] Retrying in ${delay}ms (last error: ${lastError})`);
        await this.sleep(delay);
      }
    }

    return this.fallback({
      error: `All ${maxAttempts} attempts failed: ${lastError}`,
      errorType: lastType,
      attempts: maxAttempts,
    });
  }
}
