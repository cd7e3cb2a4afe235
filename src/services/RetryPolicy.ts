import { isRetryableError } from "../types/errors.js";

export interface RetryPolicyConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Pause between attempts; 0 retries immediately */
  delayMs: number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryPolicyMetrics {
  executions: number;
  retries: number;
  failures: number;
  lastFailureTime?: Date;
}

export type RetryListener = (error: unknown, attempt: number) => void;

const DEFAULT_CONFIG: RetryPolicyConfig = {
  maxAttempts: 2,
  delayMs: 0,
  isRetryable: isRetryableError,
};

/**
 * Bounded retry around a single operation. Only errors the classifier accepts
 * are retried; everything else is rethrown on the first failure.
 */
export class RetryPolicy {
  private readonly config: RetryPolicyConfig;
  private executions = 0;
  private retries = 0;
  private failures = 0;
  private lastFailureTime?: Date;

  constructor(config: Partial<RetryPolicyConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new RangeError("maxAttempts must be a positive integer");
    }
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    onRetry?: RetryListener,
  ): Promise<T> {
    this.executions++;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        const canRetry =
          attempt < this.config.maxAttempts && this.config.isRetryable(error);
        if (!canRetry) {
          this.onFailure();
          throw error;
        }

        this.retries++;
        onRetry?.(error, attempt);
        if (this.config.delayMs > 0) {
          await new Promise((resolve) => setTimeout(resolve, this.config.delayMs));
        }
      }
    }
  }

  private onFailure(): void {
    this.failures++;
    this.lastFailureTime = new Date();
  }

  getMetrics(): RetryPolicyMetrics {
    return {
      executions: this.executions,
      retries: this.retries,
      failures: this.failures,
      lastFailureTime: this.lastFailureTime,
    };
  }
}
