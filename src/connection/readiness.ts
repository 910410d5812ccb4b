/**
 * Worker readiness polling with a layered timeout budget.
 *
 * A freshly attached GPU worker can take minutes before its server answers.
 * Readiness is the one place the client polls: each probe gets its own
 * timeout, probes are spaced by an interval, and the whole wait is bounded
 * by a wall-clock budget. Execution progress is never polled.
 */

import { sleep } from './retry';

/** Progress info emitted while waiting for a worker. */
export interface ReadinessProgress {
  /** Number of probes so far. */
  probeCount: number;
  /** Elapsed time in milliseconds since waiting started. */
  elapsedMs: number;
  /** Remaining budget in milliseconds. */
  remainingBudgetMs: number;
  /** Message from the last failed probe, if any. */
  lastError?: string;
}

export type ReadinessProgressCallback = (progress: ReadinessProgress) => void;

export interface ReadinessConfig {
  /** Maximum time (ms) for a single probe. Default: 10_000. */
  probeTimeoutMs: number;
  /** Interval (ms) between probes. Default: 5_000. */
  probeIntervalMs: number;
  /** Total wall-clock budget (ms). Default: 300_000 (5 min). */
  readinessBudgetMs: number;
  onProgress?: ReadinessProgressCallback;
}

export const DEFAULT_READINESS_CONFIG: Readonly<ReadinessConfig> = {
  probeTimeoutMs: 10_000,
  probeIntervalMs: 5_000,
  readinessBudgetMs: 300_000,
};

/** Merge a partial config with the defaults. */
export function mergeReadinessConfig(override?: Partial<ReadinessConfig>): ReadinessConfig {
  if (!override) return { ...DEFAULT_READINESS_CONFIG };
  return { ...DEFAULT_READINESS_CONFIG, ...override };
}

export interface ReadinessResult {
  ready: boolean;
  probeCount: number;
  totalElapsedMs: number;
  /** Message from the last failed probe when not ready. */
  lastError?: string;
}

/**
 * Probe until `probe` resolves true or the budget runs out. The first probe
 * runs immediately; probe errors count as "not ready yet".
 */
export async function waitUntilReady(
  probe: (signal: AbortSignal) => Promise<boolean>,
  config: ReadinessConfig = DEFAULT_READINESS_CONFIG,
): Promise<ReadinessResult> {
  const startTime = Date.now();
  const deadline = startTime + config.readinessBudgetMs;
  let probeCount = 0;
  let lastError: string | undefined;

  while (true) {
    probeCount++;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), config.probeTimeoutMs);
    try {
      if (await probe(controller.signal)) {
        return { ready: true, probeCount, totalElapsedMs: Date.now() - startTime };
      }
      lastError = undefined;
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err);
    } finally {
      clearTimeout(timer);
    }

    const remaining = deadline - Date.now();
    config.onProgress?.({
      probeCount,
      elapsedMs: Date.now() - startTime,
      remainingBudgetMs: Math.max(0, remaining),
      lastError,
    });
    if (remaining <= 0) break;
    await sleep(Math.min(config.probeIntervalMs, remaining));
  }

  return { ready: false, probeCount, totalElapsedMs: Date.now() - startTime, lastError };
}
