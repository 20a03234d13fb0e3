// ─── Resolución de nombres de dispositivos ───────────────────────────────────
// Convierte cada línea del archivo de dispositivos (IP o hostname) en una
// dirección utilizable y un nombre "bonito" para mostrar.
// Nunca lanza: si algo falla, la dirección queda vacía y el ciclo pinguea
// la línea original tal cual.

import dns from 'node:dns/promises';
import { isIP } from 'node:net';
import { DeviceSpec } from '../../types';
import { TtlCache } from '../../utils/cache';
import { withTimeout } from '../../utils/concurrency';
import { errorMessage, logger } from '../../utils/logger';

export interface Resolution {
  address:       string;
  canonicalName: string;
}

/** Búsquedas DNS. En producción usa el resolver del sistema. */
export interface NameLookup {
  forward(host: string): Promise<string>;
  reverse(address: string): Promise<string[]>;
}

export const systemLookup: NameLookup = {
  forward: async (host) => (await dns.lookup(host)).address,
  reverse: (address) => dns.reverse(address),
};

export interface ResolverOptions {
  cache:        TtlCache<Resolution>;  // entrada → (dirección, nombre)
  reverseCache: TtlCache<string>;      // dirección → nombre inverso
  lookup?:      NameLookup;
  timeoutMs?:   number;                // por consulta DNS; vencido = sin resultado
}

const DEFAULT_DNS_TIMEOUT_MS = 2_000;

const UNRESOLVED: Resolution = { address: '', canonicalName: '' };

export function isLiteralAddress(entry: string): boolean {
  return isIP(entry) !== 0;
}

export class Resolver {
  private readonly cache: TtlCache<Resolution>;
  private readonly reverseCache: TtlCache<string>;
  private readonly lookup: NameLookup;
  private readonly timeoutMs: number;

  constructor(options: ResolverOptions) {
    this.cache        = options.cache;
    this.reverseCache = options.reverseCache;
    this.lookup       = options.lookup ?? systemLookup;
    this.timeoutMs    = options.timeoutMs ?? DEFAULT_DNS_TIMEOUT_MS;
  }

  /**
   * IP literal → (IP, nombre inverso o '').
   * Hostname  → (primera dirección, FQDN o la entrada misma); ('', '') si no resuelve.
   */
  async resolve(entry: string): Promise<Resolution> {
    const cached = this.cache.get(entry);
    if (cached) return cached;

    let result: Resolution;
    if (isLiteralAddress(entry)) {
      result = { address: entry, canonicalName: await this.reverse(entry) };
    } else {
      result = await this.resolveName(entry);
    }

    this.cache.set(entry, result);
    return result;
  }

  /** Nombre inverso de una dirección, '' si no tiene */
  async reverse(address: string): Promise<string> {
    const cached = this.reverseCache.get(address);
    if (cached !== null) return cached;

    let name = '';
    try {
      const names = await withTimeout(this.lookup.reverse(address), this.timeoutMs, `dns reverse ${address}`);
      name = names[0] ?? '';
    } catch (err) {
      logger.debug('DNS inverso sin resultado', { address, error: errorMessage(err) });
    }

    this.reverseCache.set(address, name);
    return name;
  }

  /** Resuelve la lista completa en paralelo, conservando el orden */
  async resolveAll(entries: readonly string[]): Promise<DeviceSpec[]> {
    return Promise.all(
      entries.map(async (original) => {
        const { address, canonicalName } = await this.resolve(original);
        return { original, resolvedAddress: address, displayNameHint: canonicalName };
      }),
    );
  }

  private async resolveName(entry: string): Promise<Resolution> {
    let address: string;
    try {
      address = await withTimeout(this.lookup.forward(entry), this.timeoutMs, `dns lookup ${entry}`);
    } catch (err) {
      logger.debug('No se pudo resolver el dispositivo', { entry, error: errorMessage(err) });
      return UNRESOLVED;
    }
    if (!address) return UNRESOLVED;

    // FQDN: el primer nombre inverso con dominio; si no hay, la entrada original
    let canonicalName = entry;
    try {
      const names = await withTimeout(this.lookup.reverse(address), this.timeoutMs, `dns reverse ${address}`);
      canonicalName = names.find((n) => n.includes('.')) ?? entry;
    } catch {
      canonicalName = entry;
    }

    return { address, canonicalName };
  }
}
