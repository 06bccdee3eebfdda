// ============================================================================
// SCRAPER ERROR TYPES
// ============================================================================
// Categorized errors for retry and skip decisions

/**
 * Categories of scraping errors with different handling strategies
 */
export enum ScrapeErrorType {
  /** Network-related errors (connection, DNS, etc.) - recoverable per page/item */
  NETWORK = 'network',
  /** Timeout errors (navigation, loading) - recoverable per page/item */
  TIMEOUT = 'timeout',
  /** Selector errors (element not found, invalid selector) - treated as a miss */
  SELECTOR = 'selector',
  /** Extraction errors (data parsing, missing data) - partial recovery possible */
  EXTRACTION = 'extraction',
  /** Navigation errors (page load, redirect issues) - recoverable per page/item */
  NAVIGATION = 'navigation',
  /** Configuration errors (invalid config) - fatal, never retried */
  CONFIG = 'config',
  /** Run completed cleanly but collected nothing - terminal, never retried */
  EMPTY_RESULT = 'empty_result',
  /** Unknown/unexpected errors */
  UNKNOWN = 'unknown',
}

/**
 * Structured error with metadata for handling decisions
 */
export interface ScrapeError {
  /** Error category */
  type: ScrapeErrorType;
  /** Human-readable error message */
  message: string;
}

/**
 * Thrown for invalid settings or request values before any browser work starts.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay before the first retry in ms; doubles per retry */
  backoffUnitMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Error types that end the run without another attempt */
  terminalTypes: ScrapeErrorType[];
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 2,
  backoffUnitMs: 1000,
  backoffMultiplier: 2,
  terminalTypes: [ScrapeErrorType.CONFIG, ScrapeErrorType.EMPTY_RESULT],
};

/**
 * Error types a navigation can recover from by skipping the page or item
 */
const RECOVERABLE_NAVIGATION_TYPES: ReadonlySet<ScrapeErrorType> = new Set([
  ScrapeErrorType.NETWORK,
  ScrapeErrorType.TIMEOUT,
  ScrapeErrorType.NAVIGATION,
]);

/**
 * Check if an error type allows another attempt based on config
 */
export function isRetriable(errorType: ScrapeErrorType, config: RetryConfig = DEFAULT_RETRY_CONFIG): boolean {
  return !config.terminalTypes.includes(errorType);
}

export function isRecoverableNavigation(errorType: ScrapeErrorType): boolean {
  return RECOVERABLE_NAVIGATION_TYPES.has(errorType);
}

/**
 * Calculate delay for retry number `retry` (0 = first retry) with exponential backoff
 */
export function calculateRetryDelay(retry: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  return config.backoffUnitMs * Math.pow(config.backoffMultiplier, retry);
}

/**
 * Create a ScrapeError from an unknown error
 */
export function createScrapeError(
  error: unknown,
  type: ScrapeErrorType = ScrapeErrorType.UNKNOWN
): ScrapeError {
  const message = error instanceof Error ? error.message : String(error);
  return { type, message };
}

/**
 * Classify an error into a ScrapeErrorType based on its message/type
 */
export function classifyError(error: unknown): ScrapeErrorType {
  if (error instanceof ConfigurationError) {
    return ScrapeErrorType.CONFIG;
  }

  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

  // Network errors
  if (
    message.includes('net::') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enotfound') ||
    message.includes('network') ||
    message.includes('connection')
  ) {
    return ScrapeErrorType.NETWORK;
  }

  // Timeout errors
  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('exceeded')
  ) {
    return ScrapeErrorType.TIMEOUT;
  }

  // Navigation errors
  if (
    message.includes('navigation') ||
    message.includes('navigate') ||
    message.includes('page.goto')
  ) {
    return ScrapeErrorType.NAVIGATION;
  }

  // Selector errors
  if (
    message.includes('selector') ||
    message.includes('queryselector') ||
    message.includes('element not found') ||
    message.includes('no element')
  ) {
    return ScrapeErrorType.SELECTOR;
  }

  // Extraction errors
  if (
    message.includes('extract') ||
    message.includes('parse')
  ) {
    return ScrapeErrorType.EXTRACTION;
  }

  return ScrapeErrorType.UNKNOWN;
}

/**
 * Create a ScrapeError with automatic classification
 */
export function wrapError(error: unknown): ScrapeError {
  return createScrapeError(error, classifyError(error));
}
