/**
 * Transport Stats
 *
 * Per-child latency and success/failure counts for the fallback transport,
 * plus the weighted score used to rank children.
 *
 * @module transport/fallback/TransportStats
 */

export interface RankWeights {
  /** Weight of the normalized latency score (0-1) */
  latency: number;
  /** Weight of the success ratio (0-1) */
  stability: number;
}

export const DEFAULT_RANK_WEIGHTS: RankWeights = { latency: 0.3, stability: 0.7 };

/** Latency used for normalization before any latency has been observed (ms) */
export const DEFAULT_MAX_LATENCY = 1_000;

export interface TransportStatsSnapshot {
  index: number;
  /** Smoothed latency (ms) */
  latency: number;
  successes: number;
  failures: number;
  /** successes / (successes + failures), 0 before the first call */
  stability: number;
}

interface StatsEntry {
  latency: number;
  successes: number;
  failures: number;
}

export class TransportStats {
  private entries: StatsEntry[];

  constructor(size: number) {
    this.entries = Array.from({ length: size }, () => ({ latency: 0, successes: 0, failures: 0 }));
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Folds a latency sample into the running average: `(old + new) / 2`
   */
  recordSuccess(index: number, latencyMs: number): void {
    const entry = this.entry(index);
    entry.latency = (entry.latency + latencyMs) / 2;
    entry.successes++;
  }

  recordFailure(index: number): void {
    this.entry(index).failures++;
  }

  getSnapshot(index: number): TransportStatsSnapshot {
    const { latency, successes, failures } = this.entry(index);
    const total = successes + failures;
    return {
      index,
      latency,
      successes,
      failures,
      stability: total > 0 ? successes / total : 0,
    };
  }

  getAllSnapshots(): TransportStatsSnapshot[] {
    return this.entries.map((_, index) => this.getSnapshot(index));
  }

  /**
   * Score per child: `latency * (1 - latency / maxLatency) + stability * successRatio`.
   * The latency term is clamped at 0.
   */
  scores(weights: RankWeights = DEFAULT_RANK_WEIGHTS): number[] {
    const snapshots = this.getAllSnapshots();
    const observed = Math.max(0, ...snapshots.map((s) => s.latency));
    const maxLatency = observed > 0 ? observed : DEFAULT_MAX_LATENCY;

    return snapshots.map((s) => {
      const latencyScore = Math.max(0, 1 - s.latency / maxLatency);
      return weights.latency * latencyScore + weights.stability * s.stability;
    });
  }

  /**
   * Child indices by descending score. Ties keep their index order.
   */
  rankedOrder(weights: RankWeights = DEFAULT_RANK_WEIGHTS): number[] {
    const scores = this.scores(weights);
    return scores.map((_, index) => index).sort((a, b) => scores[b] - scores[a]);
  }

  reset(): void {
    for (const entry of this.entries) {
      entry.latency = 0;
      entry.successes = 0;
      entry.failures = 0;
    }
  }

  private entry(index: number): StatsEntry {
    const entry = this.entries[index];
    if (!entry) {
      throw new RangeError(`No stats for transport #${index}`);
    }
    return entry;
  }
}
