import { describe, it, expect, vi } from 'vitest';
import { createSilentLogger } from '@streamgate/utils';
import { HeartbeatMonitor } from '../heartbeat/heartbeat-monitor';
import { HeartbeatTimeoutError, TransportClosedError } from '../errors';
import { VirtualClock } from '../testing/fake-transport';

describe('HeartbeatMonitor', () => {
  function monitor(probe: () => Promise<void>) {
    const clock = new VirtualClock();
    const onStall = vi.fn();
    const hb = new HeartbeatMonitor({
      intervalMs: 100,
      timeoutMs: 250,
      probe,
      onStall,
      clock,
      logger: createSilentLogger(),
    });
    return { hb, onStall, clock };
  }

  it('declares a stall after silence longer than the timeout', async () => {
    const probe = vi.fn(async () => undefined);
    const { hb, onStall, clock } = monitor(probe);
    hb.start();

    await clock.sleep(200);
    expect(onStall).not.toHaveBeenCalled();
    expect(probe).toHaveBeenCalledTimes(2);

    await clock.sleep(100);
    expect(onStall).toHaveBeenCalledTimes(1);
    expect(onStall).toHaveBeenCalledWith(new HeartbeatTimeoutError('no inbound traffic for 300ms'));

    // Stopped itself: no further probes or stalls
    await clock.sleep(500);
    expect(probe).toHaveBeenCalledTimes(2);
    expect(onStall).toHaveBeenCalledTimes(1);
    expect(clock.pendingTimers).toBe(0);
  });

  it('declares a stall when probes go unanswered despite traffic', async () => {
    const { hb, onStall, clock } = monitor(async () => undefined);
    hb.start();

    await clock.sleep(150);
    hb.recordActivity();
    await clock.sleep(100);
    hb.recordActivity();
    await clock.sleep(100);
    hb.recordActivity();
    expect(onStall).not.toHaveBeenCalled();

    await clock.sleep(50);
    expect(onStall).toHaveBeenCalledWith(new HeartbeatTimeoutError('no pong for 300ms'));
  });

  it('stays up while pongs arrive', async () => {
    let hb: HeartbeatMonitor | null = null;
    const probe = vi.fn(async () => {
      hb?.recordPong();
    });
    const created = monitor(probe);
    hb = created.hb;
    hb.start();

    await created.clock.sleep(2_000);

    expect(created.onStall).not.toHaveBeenCalled();
    expect(probe).toHaveBeenCalledTimes(20);
    hb.stop();
    expect(created.clock.pendingTimers).toBe(0);
  });

  it('treats a probe on a closed transport as already disconnected', async () => {
    const probe = vi.fn(async () => {
      throw new TransportClosedError();
    });
    const { hb, onStall, clock } = monitor(probe);
    hb.start();

    await clock.sleep(100);
    await clock.sleep(500);

    expect(probe).toHaveBeenCalledTimes(1);
    expect(onStall).not.toHaveBeenCalled();
  });

  it('ticks on the clock it is given', async () => {
    vi.useFakeTimers();
    try {
      const { hb, onStall } = monitor(async () => undefined);
      hb.start();

      await vi.advanceTimersByTimeAsync(10_000);

      expect(onStall).not.toHaveBeenCalled();
      hb.stop();
    } finally {
      vi.useRealTimers();
    }
  });
});
