import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PortConnectionTracker } from './PortConnectionTracker.js';
import { ConnectionErrorType } from '../../types/etherlink-types.js';

describe('PortConnectionTracker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('reports the current state when the handler is set', async () => {
    const tracker = new PortConnectionTracker();
    const handler = vi.fn();
    await tracker.setHandler(handler);
    expect(handler).toHaveBeenCalledWith(false);
  });

  it('reports a connect immediately', async () => {
    const tracker = new PortConnectionTracker();
    const handler = vi.fn();
    await tracker.setHandler(handler);
    handler.mockClear();

    await tracker.notifyConnected();
    expect(handler).toHaveBeenCalledWith(true);
    expect(await tracker.isConnected()).toBe(true);

    await tracker.notifyConnected();
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('debounces a disconnect', async () => {
    const tracker = new PortConnectionTracker({ debounceMs: 300 });
    const handler = vi.fn();
    await tracker.setHandler(handler);
    await tracker.notifyConnected();
    handler.mockClear();

    await tracker.notifyDisconnected(ConnectionErrorType.PortClosed, 'Port was closed');
    expect(await tracker.isConnected()).toBe(false);
    vi.advanceTimersByTime(299);
    expect(handler).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(handler).toHaveBeenCalledWith(false, {
      type: ConnectionErrorType.PortClosed,
      message: 'Port was closed',
    });
  });

  it('reports nothing when the link comes back within the debounce', async () => {
    const tracker = new PortConnectionTracker({ debounceMs: 300 });
    const handler = vi.fn();
    await tracker.setHandler(handler);
    await tracker.notifyConnected();
    handler.mockClear();

    await tracker.notifyDisconnected(ConnectionErrorType.ConnectionLost, 'glitch');
    vi.advanceTimersByTime(100);
    await tracker.notifyConnected();
    vi.advanceTimersByTime(1000);
    expect(handler).not.toHaveBeenCalled();
    expect(await tracker.isConnected()).toBe(true);
  });

  it('ignores a disconnect while already disconnected', async () => {
    const tracker = new PortConnectionTracker();
    const handler = vi.fn();
    await tracker.setHandler(handler);
    handler.mockClear();

    await tracker.notifyDisconnected();
    vi.advanceTimersByTime(1000);
    expect(handler).not.toHaveBeenCalled();
  });

  it('replays the last error to a late handler', async () => {
    const tracker = new PortConnectionTracker();
    await tracker.notifyConnected();
    await tracker.notifyDisconnected(ConnectionErrorType.ManualDisconnect, 'Port closed by user');

    const handler = vi.fn();
    await tracker.setHandler(handler);
    expect(handler).toHaveBeenCalledWith(false, {
      type: ConnectionErrorType.ManualDisconnect,
      message: 'Port closed by user',
    });
    const state = await tracker.getState();
    expect(state.errorType).toBe(ConnectionErrorType.ManualDisconnect);
  });

  it('reports a terminal failure at once even while disconnected', async () => {
    const tracker = new PortConnectionTracker({ debounceMs: 300 });
    const handler = vi.fn();
    await tracker.setHandler(handler);
    handler.mockClear();

    await tracker.notifyFailed(ConnectionErrorType.MaxReconnect, 'Max reconnect attempts (3) reached');
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(false, {
      type: ConnectionErrorType.MaxReconnect,
      message: 'Max reconnect attempts (3) reached',
    });
    expect(await tracker.getState()).toMatchObject({
      isConnected: false,
      errorType: ConnectionErrorType.MaxReconnect,
    });
  });

  it('a terminal failure replaces a pending disconnect', async () => {
    const tracker = new PortConnectionTracker({ debounceMs: 300 });
    const handler = vi.fn();
    await tracker.setHandler(handler);
    await tracker.notifyConnected();
    handler.mockClear();

    await tracker.notifyDisconnected(ConnectionErrorType.ConnectionLost, 'reset by peer');
    await tracker.notifyFailed(ConnectionErrorType.MaxReconnect, 'Max reconnect attempts (0) reached');
    vi.advanceTimersByTime(1000);
    expect(handler.mock.calls).toEqual([
      [false, { type: ConnectionErrorType.MaxReconnect, message: 'Max reconnect attempts (0) reached' }],
    ]);
  });

  it('clear cancels a pending notification', async () => {
    const tracker = new PortConnectionTracker();
    const handler = vi.fn();
    await tracker.setHandler(handler);
    await tracker.notifyConnected();
    handler.mockClear();

    await tracker.notifyDisconnected();
    await tracker.clear();
    vi.advanceTimersByTime(1000);
    expect(handler).not.toHaveBeenCalled();
    expect(await tracker.getState()).toMatchObject({ isConnected: false });
  });
});
