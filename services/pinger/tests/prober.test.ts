import { describe, it, expect, vi } from 'vitest';
import { Prober, nextCycleDelay, sleep } from '../src/prober';
import type { ProbeOutcome } from '../src/probe';
import type { ProbeResult, Target } from '../src/types';

const target: Target = { name: 'edge', host: '198.51.100.1', intervalMs: 10, timeoutMs: 20 };

/** Collects delivered results and aborts after `limit` of them. */
function collector(controller: AbortController, limit: number) {
  const results: ProbeResult[] = [];
  const deliver = (result: ProbeResult) => {
    results.push(result);
    if (results.length >= limit) controller.abort();
  };
  return { results, deliver };
}

describe('nextCycleDelay', () => {
  it('should wait out the rest of the interval', () => {
    expect(nextCycleDelay(1000, 200, 'immediate')).toBe(800);
    expect(nextCycleDelay(1000, 200, 'skip')).toBe(800);
  });

  it('should start the next cycle at once after an overrun', () => {
    expect(nextCycleDelay(1000, 1500, 'immediate')).toBe(0);
  });

  it('should realign to the interval grid when skipping', () => {
    expect(nextCycleDelay(1000, 1500, 'skip')).toBe(500);
    expect(nextCycleDelay(1000, 2300, 'skip')).toBe(700);
    expect(nextCycleDelay(1000, 2000, 'skip')).toBe(0);
  });
});

describe('sleep', () => {
  it('should resolve early when aborted', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(10000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(1000);
  });
});

describe('Prober', () => {
  it('should deliver one result per cycle', async () => {
    const controller = new AbortController();
    const { results, deliver } = collector(controller, 3);
    const probe = vi.fn(async (): Promise<ProbeOutcome> => ({ success: true, responseTimeMs: 4.2 }));

    const prober = new Prober(target, { probe, deliver });
    await prober.run(controller.signal);

    expect(probe).toHaveBeenCalledTimes(3);
    expect(prober.cycles).toBe(3);
    expect(results).toHaveLength(3);
    expect(results[0]).toEqual({
      targetName: 'edge',
      host: '198.51.100.1',
      timestamp: results[0].timestamp,
      success: true,
      responseTimeMs: 4.2,
    });
  });

  it('should never emit a timestamp older than the previous one', async () => {
    const controller = new AbortController();
    const { results, deliver } = collector(controller, 3);
    let clock = 10000;
    const now = () => (clock -= 1);

    const prober = new Prober(target, {
      probe: async () => ({ success: true, responseTimeMs: 1 }),
      deliver,
      now,
    });
    await prober.run(controller.signal);

    expect(results.map((r) => r.timestamp)).toEqual([9998, 9998, 9998]);
  });

  it('should report a timeout when the probe does not answer in time', async () => {
    const controller = new AbortController();
    const { results, deliver } = collector(controller, 1);
    let probeSignal: AbortSignal | undefined;

    const prober = new Prober(target, {
      probe: (_target, signal) => {
        probeSignal = signal;
        return new Promise<ProbeOutcome>(() => {});
      },
      deliver,
    });
    await prober.run(controller.signal);

    expect(results).toHaveLength(1);
    expect(results[0].success).toBe(false);
    expect(results[0].errorKind).toBe('timeout');
    expect(results[0].message).toBe('No reply within 20ms');
    expect(probeSignal?.aborted).toBe(true);
  });

  it('should turn a rejected probe into an unreachable result', async () => {
    const controller = new AbortController();
    const { results, deliver } = collector(controller, 1);

    const prober = new Prober(target, {
      probe: async () => {
        throw new Error('spawn ping ENOENT');
      },
      deliver,
    });
    await prober.run(controller.signal);

    expect(results[0]).toMatchObject({
      success: false,
      errorKind: 'unreachable',
      message: 'spawn ping ENOENT',
    });
  });

  it('should default the error kind of a failed outcome to unreachable', async () => {
    const controller = new AbortController();
    const { results, deliver } = collector(controller, 1);

    const prober = new Prober(target, {
      probe: async () => ({ success: false }),
      deliver,
    });
    await prober.run(controller.signal);

    expect(results[0].errorKind).toBe('unreachable');
    expect(results[0].responseTimeMs).toBeUndefined();
  });

  it('should keep probing when delivery hangs past the grace period', async () => {
    const controller = new AbortController();
    let deliveries = 0;

    const prober = new Prober(target, {
      probe: async () => ({ success: true, responseTimeMs: 1 }),
      deliver: () => {
        deliveries += 1;
        if (deliveries >= 2) controller.abort();
        return new Promise<void>(() => {});
      },
      deliveryGraceMs: 10,
    });
    await prober.run(controller.signal);

    expect(deliveries).toBe(2);
  });

  it('should keep probing when delivery throws', async () => {
    const controller = new AbortController();
    let deliveries = 0;

    const prober = new Prober(target, {
      probe: async () => ({ success: true, responseTimeMs: 1 }),
      deliver: () => {
        deliveries += 1;
        if (deliveries === 1) throw new Error('sink closed');
        controller.abort();
      },
    });
    await prober.run(controller.signal);

    expect(deliveries).toBe(2);
  });

  it('should not start a cycle once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const probe = vi.fn(async (): Promise<ProbeOutcome> => ({ success: true }));

    const prober = new Prober(target, { probe, deliver: () => {} });
    await prober.run(controller.signal);

    expect(probe).not.toHaveBeenCalled();
    expect(prober.cycles).toBe(0);
  });

  it('should count cycles that overrun the interval', async () => {
    const controller = new AbortController();
    const { deliver } = collector(controller, 2);

    const prober = new Prober(
      { ...target, intervalMs: 5, timeoutMs: 5 },
      {
        probe: () =>
          new Promise<ProbeOutcome>((resolve) => {
            setTimeout(() => resolve({ success: true, responseTimeMs: 1 }), 1);
          }),
        deliver: (result) => {
          deliver(result);
          return new Promise<void>((resolve) => setTimeout(resolve, 15));
        },
        deliveryGraceMs: 50,
      }
    );
    await prober.run(controller.signal);

    expect(prober.overruns).toBe(2);
  });
});
