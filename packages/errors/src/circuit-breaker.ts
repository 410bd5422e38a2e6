import CircuitBreaker from "opossum";
import type { Logger } from "@docrelay/logger";

export interface CircuitBreakerOptions {
  /**
   * Timeout in milliseconds after which the call is considered failed; false leaves
   * timing out to the wrapped call. Default: 10000
   */
  timeout?: number | false;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Minimum number of calls in the rolling window before the circuit may open. Default: 5 */
  volumeThreshold?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  logger?: Pick<Logger, "warn" | "info">;
}

const DEFAULT_OPTIONS = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

export function createCircuitBreaker<TI extends unknown[], TR>(
  name: string,
  fn: (...args: TI) => Promise<TR>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TI, TR> {
  const { logger, ...breakerOptions } = options ?? {};
  const breaker = new CircuitBreaker(fn, { ...DEFAULT_OPTIONS, ...breakerOptions, name });

  breaker.on("open", () => {
    logger?.warn({ breaker: name }, "circuit opened, requests will be short-circuited");
  });

  breaker.on("halfOpen", () => {
    logger?.warn({ breaker: name }, "circuit half-open, next request is a trial call");
  });

  breaker.on("close", () => {
    logger?.info({ breaker: name }, "circuit closed");
  });

  return breaker;
}
