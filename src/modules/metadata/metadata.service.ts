// ─── Servicio de metadatos (hostname / modelo por SSH) ───────────────────────

import { DeviceMetadata, UNKNOWN } from '../../types';
import { mapBounded } from '../../utils/concurrency';
import { firstSuccess } from '../../utils/fallback';
import { errorMessage, logger } from '../../utils/logger';
import { CommandResult } from '../ssh/ssh.client';
import { MetadataCache, MetadataField } from './metadata.cache';
import { CommandStep, HOSTNAME_COMMANDS, MODEL_COMMANDS } from './metadata.dialects';

export interface CommandRunner {
  run(address: string, command: string): Promise<CommandResult>;
}

export interface CommandChains {
  hostname: readonly CommandStep[];
  model:    readonly CommandStep[];
}

// ─── Fetcher ─────────────────────────────────────────────────────────────────

/**
 * Obtiene hostname y modelo de un equipo. No sabe nada de caches ni de si
 * el equipo responde al ping: intenta y devuelve 'unknown' si no puede.
 */
export class MetadataFetcher {
  constructor(
    private readonly runner: CommandRunner,
    private readonly chains: CommandChains = { hostname: HOSTNAME_COMMANDS, model: MODEL_COMMANDS },
  ) {}

  fetchHostname(address: string): Promise<string> {
    return this.runChain(address, this.chains.hostname);
  }

  fetchModel(address: string): Promise<string> {
    return this.runChain(address, this.chains.model);
  }

  fetch(address: string, field: MetadataField): Promise<string> {
    return field === 'hostname' ? this.fetchHostname(address) : this.fetchModel(address);
  }

  private async runChain(address: string, chain: readonly CommandStep[]): Promise<string> {
    const outcome = await firstSuccess(
      chain.map((step) => ({
        label: `${step.dialect}: ${step.command}`,
        run:   async () => {
          const result = await this.runner.run(address, step.command);
          if (!result.ok || !result.output) return null;
          return step.parse(result.output) || null;
        },
      })),
      (label, err) => logger.debug('Comando de metadatos fallido', { address, step: label, error: errorMessage(err) }),
    );

    if (outcome) {
      logger.debug('Metadato obtenido', { address, step: outcome.label, value: outcome.value });
    }
    return outcome?.value ?? UNKNOWN;
  }
}

// ─── Refresco con cache ──────────────────────────────────────────────────────

export interface MetadataRefresherOptions {
  cache:          MetadataCache;
  fetcher:        Pick<MetadataFetcher, 'fetch'>;
  maxParallelism: number;
}

export interface RefreshSummary {
  refreshed: number;  // equipos que tenían algún campo vencido
  failed:    number;  // equipos cuyo worker lanzó algo inesperado
}

export class MetadataRefresher {
  private readonly cache: MetadataCache;
  private readonly fetcher: Pick<MetadataFetcher, 'fetch'>;
  private readonly maxParallelism: number;

  constructor(options: MetadataRefresherOptions) {
    this.cache          = options.cache;
    this.fetcher        = options.fetcher;
    this.maxParallelism = options.maxParallelism;
  }

  /**
   * Refresca los campos vencidos de las direcciones dadas. El llamador pasa
   * solo equipos que respondieron al ping en este ciclo.
   */
  async refresh(addresses: readonly string[], signal?: AbortSignal): Promise<RefreshSummary> {
    const pending = [...new Set(addresses)]
      .map((address) => ({ address, fields: this.cache.staleFields(address) }))
      .filter((p) => p.fields.length > 0);

    if (!pending.length) return { refreshed: 0, failed: 0 };

    const settled = await mapBounded(
      pending,
      Math.min(this.maxParallelism, pending.length),
      async ({ address, fields }) => {
        for (const field of fields) {
          this.cache.record(address, field, await this.fetcher.fetch(address, field));
        }
      },
      signal,
    );

    let failed = 0;
    settled.forEach((outcome, i) => {
      // Lo que stop() dejó sin arrancar no es un fallo del equipo
      if (outcome.status === 'rejected' && !(signal?.aborted && outcome.reason === signal.reason)) {
        failed++;
        logger.warn('Error inesperado refrescando metadatos', {
          address: pending[i].address,
          error:   errorMessage(outcome.reason),
        });
      }
    });

    return { refreshed: pending.length, failed };
  }

  lookup(address: string): DeviceMetadata {
    return this.cache.lookup(address);
  }
}
