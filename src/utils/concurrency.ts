// ─── Ejecución concurrente acotada ───────────────────────────────────────────
// Pool de workers: cada fase del ciclo (ping, SSH) reparte una tarea por
// dispositivo y espera a que terminen todas antes de seguir.

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Aplica `worker` a cada item con a lo sumo `limit` tareas en vuelo.
 * El resultado conserva el orden de `items`. Un fallo queda como `rejected`
 * en su posición y no afecta al resto. Si `signal` se aborta, los items que
 * todavía no arrancaron quedan rechazados sin ejecutarse.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<PromiseSettledResult<R>[]> {
  const results = new Array<PromiseSettledResult<R>>(items.length);
  const poolSize = Math.max(1, Math.min(limit, items.length));
  let next = 0;

  const runWorker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      if (signal?.aborted) {
        results[index] = { status: 'rejected', reason: signal.reason };
        continue;
      }
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: poolSize }, runWorker));
  return results;
}

/** Rechaza con TimeoutError si `promise` no termina en `ms` */
export function withTimeout<T>(promise: Promise<T>, ms: number, label = 'operación'): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label}: timeout (>${ms}ms)`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
