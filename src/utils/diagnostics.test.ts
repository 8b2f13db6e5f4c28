import { describe, it, expect, vi, afterEach } from 'vitest';
import { LinkDiagnostics, analyze } from './diagnostics.js';
import { rootLogger } from '../logger.js';
import { EtherlinkProtocol } from '../framers/etherlink-protocol.js';
import type { EtherlinkStats, LogRecord } from '../types/etherlink-types.js';

function createSource(initial: EtherlinkStats = { rxFrames: 0, rxErrors: 0, txFrames: 0 }) {
  let stats = { ...initial };
  return {
    set(next: EtherlinkStats): void {
      stats = { ...next };
    },
    getStats: (): Readonly<EtherlinkStats> => Object.freeze({ ...stats }),
  };
}

describe('analyze', () => {
  it('computes the reject rate', () => {
    expect(analyze({ rxFrames: 90, rxErrors: 10, txFrames: 0 })).toEqual({
      rejectRate: 10,
      healthy: true,
    });
    expect(analyze({ rxFrames: 3, rxErrors: 1, txFrames: 0 })).toEqual({
      rejectRate: 25,
      healthy: false,
    });
    expect(analyze({ rxFrames: 3, rxErrors: 1, txFrames: 0 }, 30).healthy).toBe(true);
  });

  it('treats silence as healthy', () => {
    expect(analyze({ rxFrames: 0, rxErrors: 0, txFrames: 5 })).toEqual({ rejectRate: 0, healthy: true });
  });
});

describe('LinkDiagnostics', () => {
  afterEach(() => {
    rootLogger.clearWatch();
    vi.useRealTimers();
  });

  it('reports deltas between samples', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const source = createSource({ rxFrames: 10, rxErrors: 0, txFrames: 4 });
    const diagnostics = new LinkDiagnostics(source);

    expect(diagnostics.sample()).toEqual({
      delta: { rxFrames: 10, rxErrors: 0, txFrames: 4 },
      totals: { rxFrames: 10, rxErrors: 0, txFrames: 4 },
      rejectRate: 0,
      healthy: true,
      intervalMs: 0,
    });

    vi.setSystemTime(new Date('2026-01-01T00:00:05Z'));
    source.set({ rxFrames: 29, rxErrors: 1, txFrames: 6 });
    expect(diagnostics.sample()).toEqual({
      delta: { rxFrames: 19, rxErrors: 1, txFrames: 2 },
      totals: { rxFrames: 29, rxErrors: 1, txFrames: 6 },
      rejectRate: 5,
      healthy: true,
      intervalMs: 5000,
    });
  });

  it('handles counter wrap-around', () => {
    const source = createSource({ rxFrames: 0xffff_fffe, rxErrors: 0, txFrames: 0 });
    const diagnostics = new LinkDiagnostics(source);
    diagnostics.sample();
    source.set({ rxFrames: 2, rxErrors: 0, txFrames: 0 });
    expect(diagnostics.sample().delta.rxFrames).toBe(4);
  });

  it('warns when the threshold is exceeded', () => {
    const records: LogRecord[] = [];
    rootLogger.watch(record => records.push(record));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const source = createSource();
    const diagnostics = new LinkDiagnostics(source, { errorRateThreshold: 20, loggerName: 'Uplink' });

    source.set({ rxFrames: 6, rxErrors: 2, txFrames: 0 });
    const sample = diagnostics.sample();
    expect(sample.rejectRate).toBe(25);
    expect(sample.healthy).toBe(false);
    expect(records).toEqual([
      {
        level: 'warn',
        args: ['Reject rate 25.0% exceeds 20% (2 rejected, 6 accepted)'],
        context: { logger: 'Uplink' },
      },
    ]);
  });

  it('counts from zero after the protocol resets its stats', () => {
    const protocol = new EtherlinkProtocol({ onMessage: () => {}, sendBytes: () => {} });
    const diagnostics = new LinkDiagnostics(protocol);
    const frame = [0xa5, 0x10, 0x00, 0x57];

    protocol.processBytes([...frame, ...frame, ...frame]);
    expect(diagnostics.sample().delta).toEqual({ rxFrames: 3, rxErrors: 0, txFrames: 0 });

    protocol.resetStats();
    protocol.processBytes(frame);
    const sample = diagnostics.sample();
    expect(sample.delta).toEqual({ rxFrames: 1, rxErrors: 0, txFrames: 0 });
    expect(sample.totals).toEqual({ rxFrames: 1, rxErrors: 0, txFrames: 0 });
    expect(sample.healthy).toBe(true);
  });

  it('reset measures from zero again', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const source = createSource({ rxFrames: 5, rxErrors: 5, txFrames: 5 });
    const diagnostics = new LinkDiagnostics(source);
    diagnostics.sample();
    diagnostics.reset();
    expect(diagnostics.sample().delta).toEqual({ rxFrames: 5, rxErrors: 5, txFrames: 5 });
  });
});
