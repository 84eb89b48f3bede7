import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Gate } from './Gate';

describe('Gate', () => {
  let gate: Gate;

  beforeEach(() => {
    vi.useFakeTimers();
    gate = new Gate();
  });

  afterEach(() => {
    gate.dispose();
    vi.useRealTimers();
  });

  it('starts open by default', () => {
    expect(gate.isOpen).toBe(true);
    expect(new Gate(false).isOpen).toBe(false);
  });

  it('waitUntilOpen resolves immediately when open', async () => {
    await expect(gate.waitUntilOpen()).resolves.toBeUndefined();
  });

  it('waitUntilOpen blocks until the gate opens', async () => {
    gate.close();
    const resolved = vi.fn();
    const waiting = gate.waitUntilOpen().then(resolved);

    await vi.advanceTimersByTimeAsync(1000);
    expect(resolved).not.toHaveBeenCalled();

    gate.open();
    await waiting;
    expect(resolved).toHaveBeenCalledTimes(1);
  });

  it('waitUntilOpen returns when the signal aborts', async () => {
    gate.close();
    const controller = new AbortController();
    const waiting = gate.waitUntilOpen(controller.signal);

    controller.abort();

    await expect(waiting).resolves.toBeUndefined();
    expect(gate.isOpen).toBe(false);
  });

  it('sleep runs the full interval while open', async () => {
    const sleeping = gate.sleep(40);
    await vi.advanceTimersByTimeAsync(40);

    await expect(sleeping).resolves.toBe(true);
  });

  it('sleep wakes early when the gate closes', async () => {
    const sleeping = gate.sleep(10_000);
    await vi.advanceTimersByTimeAsync(5);

    gate.close();

    await expect(sleeping).resolves.toBe(false);
  });

  it('sleep returns at once when the gate is already closed', async () => {
    gate.close();
    await expect(gate.sleep(10_000)).resolves.toBe(false);
  });

  it('sleep wakes early on abort', async () => {
    const controller = new AbortController();
    const sleeping = gate.sleep(10_000, controller.signal);

    controller.abort();

    await expect(sleeping).resolves.toBe(false);
  });
});
