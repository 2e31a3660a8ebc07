/**
 * Gate rejection analytics for a single run.
 *
 * Records every blocking reason per symbol and, where a gate has a numeric
 * threshold, how far the value missed it. A gate that rejects at least
 * `thresholdPct` of the batch is reported as a bottleneck.
 */

import { round } from "../utils/validation.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("GateTracker");

export interface GateDetails {
  value: number;
  threshold: number;
}

export interface GateStats {
  count: number;
  uniqueSymbols: number;
  avgDeficit: number | null;
  minDeficit: number | null;
  maxDeficit: number | null;
}

export interface GateBottleneck {
  gate: string;
  rejectionRate: number;
  rejectionCount: number;
  avgDeficit: number | null;
  recommendation: string;
}

export interface GateSummary {
  totalRejections: number;
  byGate: Record<string, GateStats>;
  bottlenecks: GateBottleneck[];
}

interface Rejection {
  symbol: string;
  gate: string;
  deficit: number | null;
}

export class GateTracker {
  private readonly rejections: Rejection[] = [];

  reject(symbol: string, gate: string, details?: GateDetails): void {
    const deficit = details ? round(Math.abs(details.threshold - details.value), 4) : null;
    this.rejections.push({ symbol, gate, deficit });
    log.debug(`Gate rejected: ${symbol}`, { gate, ...details });
  }

  private group(): Map<string, Rejection[]> {
    const byGate = new Map<string, Rejection[]>();
    for (const rejection of this.rejections) {
      const list = byGate.get(rejection.gate) ?? [];
      list.push(rejection);
      byGate.set(rejection.gate, list);
    }
    return byGate;
  }

  private static stats(entries: Rejection[]): GateStats {
    const deficits = entries
      .map((entry) => entry.deficit)
      .filter((deficit): deficit is number => deficit !== null);
    return {
      count: entries.length,
      uniqueSymbols: new Set(entries.map((entry) => entry.symbol)).size,
      avgDeficit: deficits.length
        ? round(deficits.reduce((sum, d) => sum + d, 0) / deficits.length, 4)
        : null,
      minDeficit: deficits.length ? Math.min(...deficits) : null,
      maxDeficit: deficits.length ? Math.max(...deficits) : null,
    };
  }

  /**
   * Gates rejecting at least `thresholdPct` of `totalCandidates`, most frequent first
   */
  bottleneckReport(totalCandidates: number, thresholdPct = 0.25): GateBottleneck[] {
    if (totalCandidates <= 0) return [];

    const bottlenecks: GateBottleneck[] = [];
    for (const [gate, entries] of this.group()) {
      const rate = entries.length / totalCandidates;
      if (rate < thresholdPct) continue;

      const { avgDeficit } = GateTracker.stats(entries);
      let recommendation = `Gate '${gate}' rejected ${Math.round(rate * 100)}% of candidates.`;
      if (avgDeficit !== null) {
        recommendation += ` Avg deficit: ${avgDeficit}. Consider relaxing threshold.`;
      }
      bottlenecks.push({
        gate,
        rejectionRate: round(rate, 4),
        rejectionCount: entries.length,
        avgDeficit,
        recommendation,
      });
    }

    return bottlenecks.sort((a, b) => b.rejectionCount - a.rejectionCount || a.gate.localeCompare(b.gate));
  }

  summary(totalCandidates: number): GateSummary {
    const byGate: Record<string, GateStats> = {};
    const gates = [...this.group().entries()].sort(([a], [b]) => a.localeCompare(b));
    for (const [gate, entries] of gates) {
      byGate[gate] = GateTracker.stats(entries);
    }
    return {
      totalRejections: this.rejections.length,
      byGate,
      bottlenecks: this.bottleneckReport(totalCandidates),
    };
  }
}
