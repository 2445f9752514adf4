/**
 * Circuit breaker pure functions.
 * All state transitions are pure - no side effects.
 */

import type {
  CallRecord,
  CircuitState,
  CircuitBreakerState,
  CircuitBreakerConfig,
  CircuitBreakerStatus,
} from "./types.js";

/**
 * Create initial circuit breaker state.
 */
export function createInitialState(): CircuitBreakerState {
  return {
    state: "closed",
    calls: [],
    circuitOpenedAt: 0,
    lastFailureTime: 0,
    probesInFlight: 0,
  };
}

/**
 * Drop call records outside the sliding window.
 */
export function pruneOldCalls(calls: CallRecord[], windowMs: number, now: number): CallRecord[] {
  const windowStart = now - windowMs;
  return calls.filter((call) => call.at >= windowStart);
}

/**
 * Failure rate of a set of calls, 0 when empty.
 */
export function failureRate(calls: CallRecord[]): number {
  if (calls.length === 0) return 0;
  const failures = calls.filter((call) => call.failed).length;
  return failures / calls.length;
}

/**
 * Check if circuit should allow operation.
 *
 * Open circuits become half-open once resetMs has elapsed. A half-open
 * circuit admits at most halfOpenMaxProbes calls until one of them reports.
 */
export function checkCircuit(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number
): { canProceed: boolean; newState?: CircuitBreakerState } {
  if (state.state === "closed") {
    return { canProceed: true };
  }

  if (state.state === "half-open") {
    if (state.probesInFlight < config.halfOpenMaxProbes) {
      return {
        canProceed: true,
        newState: { ...state, probesInFlight: state.probesInFlight + 1 },
      };
    }
    return { canProceed: false };
  }

  if (now - state.circuitOpenedAt >= config.resetMs) {
    return {
      canProceed: true,
      newState: { ...state, state: "half-open", probesInFlight: 1 },
    };
  }

  return { canProceed: false };
}

/**
 * Record a successful operation.
 */
export function recordSuccess(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number
): CircuitBreakerState {
  if (state.state === "half-open") {
    // Probe succeeded - close circuit and start a fresh window
    return {
      ...state,
      state: "closed",
      calls: [],
      probesInFlight: 0,
    };
  }

  if (state.state === "open") {
    // A call admitted before the circuit opened; the cooldown stands
    return state;
  }

  return {
    ...state,
    calls: pruneOldCalls([...state.calls, { at: now, failed: false }], config.windowMs, now),
  };
}

/**
 * Record a failed operation.
 */
export function recordFailure(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number
): CircuitBreakerState {
  const calls = pruneOldCalls([...state.calls, { at: now, failed: true }], config.windowMs, now);

  if (state.state === "half-open") {
    // Probe failed - reopen and restart the cooldown
    return {
      state: "open",
      calls,
      circuitOpenedAt: now,
      lastFailureTime: now,
      probesInFlight: 0,
    };
  }

  if (state.state === "open") {
    return { ...state, calls, lastFailureTime: now };
  }

  if (calls.length >= config.minimumCalls && failureRate(calls) >= config.failureRateThreshold) {
    return {
      state: "open",
      calls,
      circuitOpenedAt: now,
      lastFailureTime: now,
      probesInFlight: 0,
    };
  }

  return {
    ...state,
    calls,
    lastFailureTime: now,
  };
}

/**
 * Release an admitted call whose outcome says nothing about downstream health.
 */
export function recordIgnored(state: CircuitBreakerState): CircuitBreakerState {
  if (state.state === "half-open" && state.probesInFlight > 0) {
    return { ...state, probesInFlight: state.probesInFlight - 1 };
  }
  return state;
}

/**
 * Get circuit breaker status for monitoring.
 */
export function getCircuitStatus(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number
): CircuitBreakerStatus {
  const calls = pruneOldCalls(state.calls, config.windowMs, now);

  const isAvailable =
    state.state === "closed" ||
    (state.state === "half-open" && state.probesInFlight < config.halfOpenMaxProbes) ||
    (state.state === "open" && now - state.circuitOpenedAt >= config.resetMs);

  return {
    state: state.state,
    calls: calls.length,
    failures: calls.filter((call) => call.failed).length,
    failureRate: failureRate(calls),
    lastFailure: state.lastFailureTime,
    windowMs: config.windowMs,
    isAvailable,
  };
}

/**
 * Force circuit to specific state (for testing/admin).
 */
export function forceState(
  state: CircuitBreakerState,
  newCircuitState: CircuitState,
  now: number
): CircuitBreakerState {
  if (newCircuitState === "open") {
    return {
      ...state,
      state: "open",
      circuitOpenedAt: now,
      probesInFlight: 0,
    };
  }

  if (newCircuitState === "closed") {
    return {
      state: "closed",
      calls: [],
      circuitOpenedAt: 0,
      lastFailureTime: state.lastFailureTime,
      probesInFlight: 0,
    };
  }

  return {
    ...state,
    state: newCircuitState,
    probesInFlight: 0,
  };
}
