import { describe, it, expect, vi } from 'vitest';
import { mapBounded, TimeoutError, withTimeout } from '../utils/concurrency';
import { firstSuccess } from '../utils/fallback';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('mapBounded', () => {
  it('conserva el orden de entrada aunque terminen en otro orden', async () => {
    const delays = [30, 0, 15, 5];
    const results = await mapBounded(delays, 4, async (ms, i) => {
      await sleep(ms);
      return `item-${i}`;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 'item-0' },
      { status: 'fulfilled', value: 'item-1' },
      { status: 'fulfilled', value: 'item-2' },
      { status: 'fulfilled', value: 'item-3' },
    ]);
  });

  it('nunca supera el límite de tareas en vuelo', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapBounded([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  it('un fallo queda aislado en su posición', async () => {
    const boom = new Error('boom');
    const results = await mapBounded(['a', 'b', 'c'], 2, async (item) => {
      if (item === 'b') throw boom;
      return item.toUpperCase();
    });

    expect(results[0]).toEqual({ status: 'fulfilled', value: 'A' });
    expect(results[1]).toEqual({ status: 'rejected', reason: boom });
    expect(results[2]).toEqual({ status: 'fulfilled', value: 'C' });
  });

  it('con la señal abortada no arranca ninguna tarea', async () => {
    const controller = new AbortController();
    controller.abort();
    const worker = vi.fn(async (n: number) => n);

    const results = await mapBounded([1, 2], 2, worker, controller.signal);

    expect(worker).not.toHaveBeenCalled();
    expect(results.map((r) => r.status)).toEqual(['rejected', 'rejected']);
  });

  it('una lista vacía devuelve una lista vacía', async () => {
    expect(await mapBounded([], 0, async () => 1)).toEqual([]);
  });
});

describe('withTimeout', () => {
  it('devuelve el valor si llega a tiempo', async () => {
    await expect(withTimeout(Promise.resolve(42), 50)).resolves.toBe(42);
  });

  it('rechaza con TimeoutError si la promesa no termina', async () => {
    const never = new Promise<number>(() => undefined);
    await expect(withTimeout(never, 10, 'ping 10.0.0.1')).rejects.toThrow(TimeoutError);
    await expect(withTimeout(never, 10, 'ping 10.0.0.1')).rejects.toThrow('ping 10.0.0.1: timeout (>10ms)');
  });
});

describe('firstSuccess', () => {
  it('devuelve el primer intento que produce un valor', async () => {
    const third = vi.fn(async () => 'c');
    const outcome = await firstSuccess([
      { label: 'uno',  run: async () => null },
      { label: 'dos',  run: async () => 'b' },
      { label: 'tres', run: third },
    ]);

    expect(outcome).toEqual({ value: 'b', label: 'dos' });
    expect(third).not.toHaveBeenCalled();
  });

  it('reporta los errores y sigue con el próximo intento', async () => {
    const failures: string[] = [];
    const outcome = await firstSuccess(
      [
        { label: 'roto', run: async () => { throw new Error('falla'); } },
        { label: 'ok',   run: async () => 'valor' },
      ],
      (label, err) => failures.push(`${label}: ${err instanceof Error ? err.message : ''}`),
    );

    expect(outcome).toEqual({ value: 'valor', label: 'ok' });
    expect(failures).toEqual(['roto: falla']);
  });

  it('devuelve null si ningún intento sirve', async () => {
    const outcome = await firstSuccess<string>([
      { label: 'a', run: async () => null },
      { label: 'b', run: async () => { throw new Error('x'); } },
    ]);
    expect(outcome).toBeNull();
  });
});
