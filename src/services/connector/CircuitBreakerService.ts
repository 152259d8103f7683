/**
 * Circuit Breaker Service
 *
 * In-process breaker for the upstream panel. Failure window: N failures in T
 * seconds opens the circuit. After the cool-down exactly one probe is admitted
 * in HALF_OPEN; its outcome closes or reopens the circuit.
 *
 * Every admission hands out a permit stamped with the current generation.
 * Outcomes are only counted for permits of the generation still in force, so a
 * call admitted before a trip cannot close or reopen the circuit later.
 *
 * Every method is synchronous, so each transition is a single critical section
 * on the event loop and concurrent failures are never lost.
 */

import { Logger } from '../core/Logger';
import { Clock, MS_PER_SECOND, systemClock } from '../../types/CommonTypes';
import type { CircuitBreakerStateV1, CircuitState, CircuitBreakerConfig } from '../../types/CircuitBreakerTypes';
import { DEFAULT_CIRCUIT_BREAKER_CONFIG } from '../../types/CircuitBreakerTypes';

export interface CircuitPermit {
  /** True when this caller holds the single HALF_OPEN probe slot */
  probe: boolean;
  generation: number;
}

export interface AllowRequestResult extends CircuitPermit {
  allowed: boolean;
  state: CircuitState;
  retryAfterSeconds?: number;
}

export class CircuitBreakerService {
  private current: CircuitBreakerStateV1;

  constructor(
    private readonly logger: Logger,
    private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    private readonly clock: Clock = systemClock
  ) {
    this.current = this.closedState(this.clock(), 0);
  }

  /**
   * Check if a request is allowed (circuit CLOSED or this caller won the HALF_OPEN probe).
   */
  allowRequest(): AllowRequestResult {
    const nowMs = this.clock();
    const state = this.current;

    if (state.state === 'CLOSED') {
      return { allowed: true, state: 'CLOSED', probe: false, generation: state.generation };
    }

    if (state.state === 'OPEN') {
      const openUntil = state.open_until_epoch_ms ?? 0;
      if (nowMs < openUntil) {
        return {
          allowed: false,
          state: 'OPEN',
          probe: false,
          generation: state.generation,
          retryAfterSeconds: Math.max(1, Math.ceil((openUntil - nowMs) / MS_PER_SECOND)),
        };
      }
      const generation = state.generation + 1;
      this.current = {
        state: 'HALF_OPEN',
        failure_count: state.failure_count,
        window_start_epoch_ms: state.window_start_epoch_ms,
        half_open_probe_in_flight: true,
        generation,
      };
      this.logger.info('Circuit half-open, admitting probe');
      return { allowed: true, state: 'HALF_OPEN', probe: true, generation };
    }

    if (state.half_open_probe_in_flight) {
      return {
        allowed: false,
        state: 'HALF_OPEN',
        probe: false,
        generation: state.generation,
        retryAfterSeconds: this.config.cooldownSeconds,
      };
    }

    // Previous probe ended without a verdict (non-retryable response); next caller probes
    this.current = { ...state, half_open_probe_in_flight: true };
    return { allowed: true, state: 'HALF_OPEN', probe: true, generation: state.generation };
  }

  /**
   * Record success: the current probe closes the circuit; a CLOSED-state call
   * resets the failure window. Anything else is stale and ignored.
   */
  recordSuccess(permit: CircuitPermit): void {
    const nowMs = this.clock();
    const state = this.current;

    if (this.holdsProbe(permit)) {
      this.current = this.closedState(nowMs, state.generation + 1);
      this.logger.info('Circuit closed after successful probe');
      return;
    }

    if (this.isCurrentClosed(permit) && state.failure_count > 0) {
      this.current = this.closedState(nowMs, state.generation);
      return;
    }

    if (!this.isCurrentClosed(permit)) {
      this.logger.debug('Ignoring stale success', { permitGeneration: permit.generation, state: state.state });
    }
  }

  /**
   * Record failure: the current probe reopens the circuit; a CLOSED-state call
   * counts toward the window and opens the circuit at the threshold.
   */
  recordFailure(permit: CircuitPermit): void {
    const nowMs = this.clock();
    const state = this.current;

    if (this.holdsProbe(permit)) {
      this.openCircuit(nowMs, state.failure_count, state.window_start_epoch_ms);
      this.logger.warn('Circuit reopened after probe failure');
      return;
    }

    if (!this.isCurrentClosed(permit)) {
      this.logger.debug('Ignoring stale failure', { permitGeneration: permit.generation, state: state.state });
      return;
    }

    const windowStart = state.window_start_epoch_ms;
    const inWindow = nowMs - windowStart <= this.config.windowSeconds * MS_PER_SECOND;
    const newCount = inWindow ? state.failure_count + 1 : 1;
    const newWindowStart = inWindow ? windowStart : nowMs;

    if (newCount >= this.config.failureThreshold) {
      this.openCircuit(nowMs, newCount, newWindowStart);
      this.logger.warn('Circuit opened', { failureCount: newCount });
    } else {
      this.current = {
        ...state,
        failure_count: newCount,
        window_start_epoch_ms: newWindowStart,
      };
    }
  }

  /**
   * Give back a probe slot without a verdict (the probe hit a non-retryable response).
   */
  releaseProbe(permit: CircuitPermit): void {
    if (this.holdsProbe(permit)) {
      this.current = { ...this.current, half_open_probe_in_flight: false };
    }
  }

  getState(): Readonly<CircuitBreakerStateV1> {
    return { ...this.current };
  }

  private holdsProbe(permit: CircuitPermit): boolean {
    const state = this.current;
    return (
      permit.probe &&
      state.state === 'HALF_OPEN' &&
      state.half_open_probe_in_flight &&
      state.generation === permit.generation
    );
  }

  private isCurrentClosed(permit: CircuitPermit): boolean {
    return !permit.probe && this.current.state === 'CLOSED' && this.current.generation === permit.generation;
  }

  private openCircuit(nowMs: number, failureCount: number, windowStart: number): void {
    this.current = {
      state: 'OPEN',
      failure_count: failureCount,
      window_start_epoch_ms: windowStart,
      open_until_epoch_ms: nowMs + this.config.cooldownSeconds * MS_PER_SECOND,
      half_open_probe_in_flight: false,
      generation: this.current.generation + 1,
    };
  }

  private closedState(nowMs: number, generation: number): CircuitBreakerStateV1 {
    return {
      state: 'CLOSED',
      failure_count: 0,
      window_start_epoch_ms: nowMs,
      half_open_probe_in_flight: false,
      generation,
    };
  }
}
