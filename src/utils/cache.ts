// ─── Cache en memoria con TTL por entrada ────────────────────────────────────
// Cada cache (resolución DNS, DNS inverso, hostname, modelo) es una instancia
// propia que se crea en el arranque y se inyecta en el componente que la usa.
// Las entradas vencidas no se borran nunca: get() deja de devolverlas, pero
// peek() las sigue entregando como "último valor conocido".

export type Clock = () => number;

export interface CacheEntry<T> {
  data:      T;
  timestamp: number;
}

export class TtlCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();

  constructor(
    readonly ttlMs: number,
    private readonly now: Clock = Date.now,
  ) {}

  /** Valor vigente (edad < TTL) o null */
  get(key: string): T | null {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (this.now() - entry.timestamp >= this.ttlMs) return null;
    return entry.data;
  }

  /** Entrada tal cual, vigente o no */
  peek(key: string): CacheEntry<T> | undefined {
    return this.store.get(key);
  }

  isFresh(key: string): boolean {
    return this.get(key) !== null;
  }

  set(key: string, data: T): void {
    this.store.set(key, { data, timestamp: this.now() });
  }

  /** Reescribe el timestamp sin cambiar el valor */
  touch(key: string): void {
    const entry = this.store.get(key);
    if (entry) this.set(key, entry.data);
  }

  get size(): number {
    return this.store.size;
  }
}
