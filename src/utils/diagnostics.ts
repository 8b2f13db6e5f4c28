// src/utils/diagnostics.ts

import { rootLogger } from '../logger.js';
import type { EtherlinkStats, LoggerInstance } from '../types/etherlink-types.js';

const U32 = 0x1_0000_0000;

export interface DiagnosticsOptions {
  /** Reject rate (%) above which a sample is unhealthy, default 10 */
  errorRateThreshold?: number;
  loggerName?: string;
}

export interface StatsSource {
  getStats(): Readonly<EtherlinkStats>;
  /** Changes whenever the source zeroes its counters */
  readonly statsGeneration?: number;
}

export interface AnalysisResult {
  /** rxErrors / (rxFrames + rxErrors) in percent, 0 when nothing was received */
  rejectRate: number;
  healthy: boolean;
}

export interface DiagnosticsSample extends AnalysisResult {
  delta: EtherlinkStats;
  totals: EtherlinkStats;
  /** Milliseconds since the previous sample (or since construction/reset) */
  intervalMs: number;
}

/** Difference between two readings of a counter that wraps at 2^32 */
function counterDelta(current: number, previous: number): number {
  return (current - previous + U32) % U32;
}

function rejectRateOf(frames: number, errors: number): number {
  const total = frames + errors;
  return total === 0 ? 0 : (errors * 100) / total;
}

/**
 * Pure health check of one set of counters.
 */
export function analyze(stats: EtherlinkStats, errorRateThreshold: number = 10): AnalysisResult {
  const rejectRate = rejectRateOf(stats.rxFrames, stats.rxErrors);
  return { rejectRate, healthy: rejectRate <= errorRateThreshold };
}

/**
 * Polls a protocol's counters and reports link quality per interval.
 */
export class LinkDiagnostics {
  private readonly source: StatsSource;
  private readonly errorRateThreshold: number;
  private readonly logger: LoggerInstance;
  private previous: EtherlinkStats | null = null;
  private previousGeneration: number | undefined;
  private previousAt: number;

  constructor(source: StatsSource, options: DiagnosticsOptions = {}) {
    this.source = source;
    this.errorRateThreshold = options.errorRateThreshold ?? 10;
    this.logger = rootLogger.createLogger(options.loggerName ?? 'LinkDiagnostics');
    this.previousAt = Date.now();
  }

  public sample(): DiagnosticsSample {
    const now = Date.now();
    const stats = this.source.getStats();
    const generation = this.source.statsGeneration;
    const totals: EtherlinkStats = {
      rxFrames: stats.rxFrames,
      rxErrors: stats.rxErrors,
      txFrames: stats.txFrames,
    };
    // Counters zeroed since the last sample count up from zero, not as a wrap
    const base =
      this.previous && generation === this.previousGeneration
        ? this.previous
        : { rxFrames: 0, rxErrors: 0, txFrames: 0 };
    const delta: EtherlinkStats = {
      rxFrames: counterDelta(totals.rxFrames, base.rxFrames),
      rxErrors: counterDelta(totals.rxErrors, base.rxErrors),
      txFrames: counterDelta(totals.txFrames, base.txFrames),
    };
    const intervalMs = now - this.previousAt;

    this.previous = totals;
    this.previousGeneration = generation;
    this.previousAt = now;

    const { rejectRate, healthy } = analyze(delta, this.errorRateThreshold);
    if (!healthy) {
      this.logger.warn(
        `Reject rate ${rejectRate.toFixed(1)}% exceeds ${this.errorRateThreshold}% ` +
          `(${delta.rxErrors} rejected, ${delta.rxFrames} accepted)`
      );
    }

    return { delta, totals, rejectRate, healthy, intervalMs };
  }

  public reset(): void {
    this.previous = null;
    this.previousAt = Date.now();
  }
}

export default LinkDiagnostics;
