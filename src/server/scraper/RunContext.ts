// ============================================================================
// RUN CONTEXT
// ============================================================================
// Per-attempt state threaded through every stage: seen URLs, accepted items
// and the warnings that end up on the result

import { v4 as uuidv4 } from 'uuid';
import type { NormalizedScrapeRequest, RunResult } from '../../shared/types.js';
import { DedupRegistry } from './DedupRegistry.js';
import { ResultAggregator } from './ResultAggregator.js';
import { ScrapeErrorType, type ScrapeError } from './types/errors.js';

export const NO_ITEMS_ERROR = 'No items collected';

export function elapsedSecondsSince(startedAt: number, now: number): number {
  return Math.round(Math.max(0, now - startedAt)) / 1000;
}

export class RunContext {
  readonly runId = uuidv4();
  readonly dedup: DedupRegistry;
  readonly results: ResultAggregator;
  readonly warnings: string[] = [];
  stoppedEarly = false;

  constructor(
    readonly request: NormalizedScrapeRequest,
    baseUrl: string,
    /** Epoch ms when the run (not this attempt) started */
    readonly startedAt: number,
    private readonly now: () => number = Date.now
  ) {
    this.dedup = new DedupRegistry(baseUrl);
    this.results = new ResultAggregator(request.perPage);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  /**
   * Build the attempt's result. A fault after items were collected keeps the
   * items and is reported as a warning.
   */
  finalize(attempt: number, fault?: ScrapeError): RunResult {
    const items = this.results.getItems();
    const base = {
      query: this.request.query,
      pagesRequested: this.request.pages,
      perPageRequested: this.request.perPage,
      count: items.length,
      items,
      elapsedSeconds: elapsedSecondsSince(this.startedAt, this.now()),
      attempts: attempt,
    };

    if (items.length > 0) {
      if (fault) {
        this.stoppedEarly = true;
        this.warn(`Stopped early (${fault.type}): ${fault.message}`);
      }
      return {
        ...base,
        success: true,
        ...(this.stoppedEarly ? { stoppedEarly: true } : {}),
        ...(this.warnings.length > 0 ? { warnings: [...this.warnings] } : {}),
      };
    }

    return {
      ...base,
      success: false,
      error: fault ? fault.message : NO_ITEMS_ERROR,
      errorType: fault ? fault.type : ScrapeErrorType.EMPTY_RESULT,
      ...(this.warnings.length > 0 ? { warnings: [...this.warnings] } : {}),
    };
  }
}
