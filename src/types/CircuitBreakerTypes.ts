/**
 * Circuit breaker state and configuration for the upstream panel.
 */

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerStateV1 {
  state: CircuitState;
  failure_count: number;
  window_start_epoch_ms: number;
  open_until_epoch_ms?: number;
  half_open_probe_in_flight: boolean;
  /** Bumped on every state transition; permits from an older generation carry no verdict */
  generation: number;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  windowSeconds: number;
  cooldownSeconds: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  windowSeconds: 60,
  cooldownSeconds: 60,
};
