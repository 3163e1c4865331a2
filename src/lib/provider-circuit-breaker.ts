/**
 * Generation Provider Circuit Breaker
 *
 * Tracks provider health and prevents cascading failures.
 * When a provider fails repeatedly, its circuit "opens" and calls fail fast
 * until the reset timeout elapses.
 *
 * States:
 * - CLOSED: Normal operation, provider is healthy
 * - OPEN: Provider is failing, fail fast
 * - HALF_OPEN: One probe call allowed to test recovery
 *
 * @module provider-circuit-breaker
 */

export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerConfig {
  enabled: boolean;
  failureThreshold: number; // Consecutive failures before opening
  resetTimeoutSec: number; // Seconds before a probe is allowed
}

interface ProviderCircuitState {
  state: CircuitState;
  failures: number;
  lastFailureTime: number | null;
  lastSuccessTime: number | null;
  totalRequests: number;
  totalFailures: number;
  totalSuccesses: number;
  halfOpenProbeInFlight: boolean;
}

// ============================================================================
// CIRCUIT BREAKER STATE
// ============================================================================

const circuitStates = new Map<string, ProviderCircuitState>();

const DEFAULT_CIRCUIT_CONFIG: CircuitBreakerConfig = {
  enabled: true,
  failureThreshold: 3,
  resetTimeoutSec: 60,
};

function getCircuitState(provider: string): ProviderCircuitState {
  let state = circuitStates.get(provider);
  if (!state) {
    state = {
      state: "closed",
      failures: 0,
      lastFailureTime: null,
      lastSuccessTime: null,
      totalRequests: 0,
      totalFailures: 0,
      totalSuccesses: 0,
      halfOpenProbeInFlight: false,
    };
    circuitStates.set(provider, state);
  }
  return state;
}

// ============================================================================
// CIRCUIT OPERATIONS
// ============================================================================

/**
 * Check if a provider may be called. A half-open circuit admits exactly
 * one probe at a time.
 */
export function isProviderAvailable(
  provider: string,
  cfg: CircuitBreakerConfig = DEFAULT_CIRCUIT_CONFIG,
  now: number = Date.now(),
): boolean {
  if (!cfg.enabled) return true;

  const state = getCircuitState(provider);

  if (state.state === "closed") return true;

  if (state.state === "half_open") {
    if (state.halfOpenProbeInFlight) {
      console.log(`[Circuit-Breaker] ${provider}: HALF_OPEN probe already in flight, rejecting concurrent call`);
      return false;
    }
    state.halfOpenProbeInFlight = true;
    return true;
  }

  const timeSinceFailure = state.lastFailureTime !== null ? now - state.lastFailureTime : Infinity;
  const resetTimeoutMs = cfg.resetTimeoutSec * 1000;

  if (timeSinceFailure >= resetTimeoutMs) {
    state.state = "half_open";
    state.halfOpenProbeInFlight = true;
    console.log(`[Circuit-Breaker] ${provider}: OPEN → HALF_OPEN (timeout elapsed, attempting recovery)`);
    return true;
  }

  const remainingSec = Math.ceil((resetTimeoutMs - timeSinceFailure) / 1000);
  console.log(`[Circuit-Breaker] ${provider}: Circuit OPEN, failing fast (retry in ${remainingSec}s)`);
  return false;
}

export function recordSuccess(
  provider: string,
  cfg: CircuitBreakerConfig = DEFAULT_CIRCUIT_CONFIG,
  now: number = Date.now(),
): void {
  if (!cfg.enabled) return;

  const state = getCircuitState(provider);
  state.totalRequests++;
  state.totalSuccesses++;
  state.lastSuccessTime = now;
  state.failures = 0;

  if (state.state === "half_open") {
    state.state = "closed";
    state.halfOpenProbeInFlight = false;
    console.log(
      `[Circuit-Breaker] ${provider}: HALF_OPEN → CLOSED (recovery successful, ${state.totalSuccesses}/${state.totalRequests} success rate)`,
    );
  }
}

export function recordFailure(
  provider: string,
  error?: string,
  cfg: CircuitBreakerConfig = DEFAULT_CIRCUIT_CONFIG,
  now: number = Date.now(),
): void {
  if (!cfg.enabled) return;

  const state = getCircuitState(provider);
  state.totalRequests++;
  state.totalFailures++;
  state.failures++;
  state.lastFailureTime = now;

  console.warn(
    `[Circuit-Breaker] ${provider}: Failure recorded (${state.failures}/${cfg.failureThreshold}, error: ${error || "unknown"})`,
  );

  if (state.state === "half_open") {
    state.state = "open";
    state.halfOpenProbeInFlight = false;
    console.error(`[Circuit-Breaker] ${provider}: HALF_OPEN → OPEN (recovery failed, circuit reopened)`);
    return;
  }

  if (state.state === "closed" && state.failures >= cfg.failureThreshold) {
    state.state = "open";
    console.error(
      `[Circuit-Breaker] ${provider}: CLOSED → OPEN (threshold reached: ${state.failures} consecutive failures)`,
    );
  }
}

/**
 * Release a half-open probe slot without judging the provider (e.g. the
 * call failed for a reason that says nothing about provider health).
 */
export function releaseProbe(provider: string): void {
  const state = circuitStates.get(provider);
  if (state) state.halfOpenProbeInFlight = false;
}

export function resetAllCircuits(): void {
  circuitStates.clear();
}

// ============================================================================
// STATISTICS
// ============================================================================

export interface ProviderStats {
  provider: string;
  state: CircuitState;
  consecutiveFailures: number;
  totalRequests: number;
  totalFailures: number;
  totalSuccesses: number;
  successRate: number;
}

export function getProviderStats(provider: string): ProviderStats | null {
  const state = circuitStates.get(provider);
  if (!state) return null;

  return {
    provider,
    state: state.state,
    consecutiveFailures: state.failures,
    totalRequests: state.totalRequests,
    totalFailures: state.totalFailures,
    totalSuccesses: state.totalSuccesses,
    successRate: state.totalRequests > 0 ? state.totalSuccesses / state.totalRequests : 0,
  };
}
