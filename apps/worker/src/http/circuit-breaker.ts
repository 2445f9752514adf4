import { log } from "../logger.js";
import { circuitBreakerState } from "../metrics.js";
import {
  checkCircuit,
  createInitialState,
  forceState,
  getCircuitStatus,
  recordFailure,
  recordIgnored,
  recordSuccess,
} from "../domain/circuit-breaker/functions.js";
import type {
  CircuitBreakerConfig,
  CircuitBreakerState,
  CircuitBreakerStatus,
  CircuitState,
} from "../domain/circuit-breaker/types.js";

const STATE_GAUGE: Record<CircuitState, number> = {
  closed: 0,
  "half-open": 1,
  open: 2,
};

/**
 * In-process circuit breaker for one downstream endpoint.
 *
 * Holds the state produced by the pure transition functions and swaps it
 * synchronously, so concurrent callers never interleave inside a transition.
 */
export class CircuitBreaker {
  private state: CircuitBreakerState = createInitialState();

  constructor(
    readonly endpoint: string,
    private readonly config: CircuitBreakerConfig,
    private readonly now: () => number = Date.now
  ) {
    circuitBreakerState.set({ endpoint }, STATE_GAUGE.closed);
  }

  /**
   * Ask for permission to call. Every admitted call must report back through
   * onSuccess, onFailure or onIgnored.
   */
  tryAcquire(): boolean {
    const { canProceed, newState } = checkCircuit(this.state, this.config, this.now());
    if (newState) this.transition(newState);
    return canProceed;
  }

  onSuccess(): void {
    this.transition(recordSuccess(this.state, this.config, this.now()));
  }

  onFailure(): void {
    this.transition(recordFailure(this.state, this.config, this.now()));
  }

  /** The call finished with an outcome that says nothing about endpoint health */
  onIgnored(): void {
    this.transition(recordIgnored(this.state));
  }

  getState(): CircuitState {
    return this.state.state;
  }

  status(): CircuitBreakerStatus {
    return getCircuitStatus(this.state, this.config, this.now());
  }

  /** Force a state (operators and tests) */
  force(state: CircuitState): void {
    this.transition(forceState(this.state, state, this.now()));
  }

  private transition(next: CircuitBreakerState): void {
    const previous = this.state.state;
    this.state = next;

    if (previous !== next.state) {
      circuitBreakerState.set({ endpoint: this.endpoint }, STATE_GAUGE[next.state]);
      const status = getCircuitStatus(next, this.config, this.now());
      const context = {
        endpoint: this.endpoint,
        from: previous,
        to: next.state,
        failures: status.failures,
        calls: status.calls,
      };
      if (next.state === "open") {
        log.circuit.warn(context, "circuit opened");
      } else {
        log.circuit.info(context, "circuit state changed");
      }
    }
  }
}
