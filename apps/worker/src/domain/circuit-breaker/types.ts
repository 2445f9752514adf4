/**
 * Circuit breaker types.
 */

export type CircuitState = "closed" | "open" | "half-open";

export interface CallRecord {
  /** Completion timestamp */
  at: number;
  failed: boolean;
}

export interface CircuitBreakerState {
  /** Current state of the circuit */
  state: CircuitState;
  /** Completed calls within the sliding window, oldest first */
  calls: CallRecord[];
  /** Timestamp when circuit was last opened */
  circuitOpenedAt: number;
  /** Timestamp of the last failure */
  lastFailureTime: number;
  /** Half-open probes admitted and not yet reported */
  probesInFlight: number;
}

export interface CircuitBreakerConfig {
  /** Failure rate (0-1] within the window that trips the circuit */
  failureRateThreshold: number;
  /** Calls the window must hold before the rate is evaluated */
  minimumCalls: number;
  /** Sliding window size in ms */
  windowMs: number;
  /** Time in ms before attempting reset from open state */
  resetMs: number;
  /** Concurrent probes allowed while half-open */
  halfOpenMaxProbes: number;
}

export interface CircuitBreakerStatus {
  state: CircuitState;
  calls: number;
  failures: number;
  failureRate: number;
  lastFailure: number;
  windowMs: number;
  isAvailable: boolean;
}
