// ─── Ping concurrente ─────────────────────────────────────────────────────────
// Un único ping por destino y por ciclo, sin reintentos. Timeout y rechazo
// valen lo mismo: el destino queda "caído". Un destino problemático no frena
// ni contamina el resultado de los demás.

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { mapBounded, withTimeout } from '../../utils/concurrency';
import { errorMessage, logger } from '../../utils/logger';

const execFileAsync = promisify(execFile);

/** Margen extra sobre el timeout del ping antes de abandonar el proceso */
const PROBE_GRACE_MS = 500;

export type ProbeFn = (target: string, timeoutMs: number) => Promise<boolean>;

export function buildPingArgs(
  target: string,
  timeoutMs: number,
  platform: NodeJS.Platform = process.platform,
): string[] {
  if (platform === 'win32') {
    return ['-n', '1', '-w', String(timeoutMs), target];
  }
  if (platform === 'darwin') {
    // En macOS -W va en milisegundos
    return ['-c', '1', '-W', String(timeoutMs), target];
  }
  return ['-c', '1', '-W', String(Math.max(1, Math.ceil(timeoutMs / 1000))), target];
}

/** Ping ICMP usando el binario del sistema; exit code 0 = responde */
export const icmpProbe: ProbeFn = async (target, timeoutMs) => {
  // Una línea del archivo que empiece con "-" sería tomada como opción de ping
  if (!target || target.startsWith('-')) return false;

  try {
    await execFileAsync('ping', buildPingArgs(target, timeoutMs), {
      timeout:     timeoutMs + PROBE_GRACE_MS,
      windowsHide: true,
    });
    return true;
  } catch {
    // exit code != 0, timeout o ping inexistente: en todos los casos, no responde
    return false;
  }
};

export interface ProberOptions {
  timeoutMs:      number;
  maxParallelism: number;
  probe?:         ProbeFn;
}

export class Prober {
  private readonly timeoutMs: number;
  private readonly maxParallelism: number;
  private readonly probe: ProbeFn;

  constructor(options: ProberOptions) {
    this.timeoutMs      = options.timeoutMs;
    this.maxParallelism = options.maxParallelism;
    this.probe          = options.probe ?? icmpProbe;
  }

  /**
   * Pinguea todos los destinos (los repetidos una sola vez) y devuelve
   * destino → responde. Termina cuando todos los pings terminaron o vencieron.
   */
  async probeAll(targets: readonly string[]): Promise<Map<string, boolean>> {
    const unique = [...new Set(targets)];
    const limit  = Math.min(this.maxParallelism, unique.length);

    const settled = await mapBounded(unique, limit, (target) =>
      withTimeout(this.probe(target, this.timeoutMs), this.timeoutMs + PROBE_GRACE_MS, `ping ${target}`),
    );

    const results = new Map<string, boolean>();
    settled.forEach((outcome, i) => {
      const target = unique[i];
      if (outcome.status === 'fulfilled') {
        results.set(target, outcome.value === true);
        return;
      }
      logger.debug('Ping fallido', { target, error: errorMessage(outcome.reason) });
      results.set(target, false);
    });

    return results;
  }
}
