// ─── Orquestador del ciclo de polling ────────────────────────────────────────
// Cada ciclo: recarga la lista (si toca) → resuelve (con cache) → pinguea todo
// en paralelo → refresca metadatos de los equipos que responden y tienen la
// cache vencida → arma el snapshot → lo entrega al consumidor.
// Entre fases hay una barrera: SSH no arranca hasta que terminaron los pings.

import { CycleState, DeviceMetadata, DeviceSpec, Snapshot, SnapshotEntry, UNKNOWN } from '../../types';
import { Clock } from '../../utils/cache';
import { errorMessage, logger } from '../../utils/logger';
import { DeviceListSource, sameEntries } from '../devices/devices.source';
import { RefreshSummary } from '../metadata/metadata.service';
import { BlinkClock } from './blink.clock';
import { displayName } from './display.name';

// ─── Colaboradores ───────────────────────────────────────────────────────────

export interface DeviceResolver {
  resolveAll(entries: readonly string[]): Promise<DeviceSpec[]>;
}

export interface ReachabilityProber {
  probeAll(targets: readonly string[]): Promise<Map<string, boolean>>;
}

export interface MetadataSource {
  refresh(addresses: readonly string[], signal?: AbortSignal): Promise<RefreshSummary>;
  lookup(address: string): DeviceMetadata;
}

/** Recibe un snapshot por ciclo; no tiene acceso de escritura al motor */
export interface SnapshotSink {
  publish(snapshot: Snapshot): void;
}

export interface CycleOrchestratorOptions {
  source:           DeviceListSource;
  resolver:         DeviceResolver;
  prober:           ReachabilityProber;
  metadata:         MetadataSource;
  blink:            BlinkClock;
  sink:             SnapshotSink;
  pollIntervalMs:   number;
  reloadIntervalMs: number;
  hostnameSuffixes?: readonly string[];
  now?:             Clock;
}

/** Lo que se pinguea: la dirección resuelta o, si no resolvió, la línea original */
export function probeTarget(device: DeviceSpec): string {
  return device.resolvedAddress || device.original;
}

function sameSpecs(a: readonly DeviceSpec[], b: readonly DeviceSpec[]): boolean {
  return a.length === b.length && a.every((d, i) =>
    d.original === b[i].original &&
    d.resolvedAddress === b[i].resolvedAddress &&
    d.displayNameHint === b[i].displayNameHint,
  );
}

const NO_METADATA: DeviceMetadata = { hostname: UNKNOWN, model: UNKNOWN };

// ─── Implementación ──────────────────────────────────────────────────────────

export class CycleOrchestrator {
  private readonly options: CycleOrchestratorOptions;
  private readonly now: Clock;
  private readonly controller = new AbortController();

  private entries: readonly string[] = [];
  private deviceList: readonly DeviceSpec[] = [];
  private lastReloadAt: number | null = null;
  private cycleCount = 0;
  private currentState = CycleState.IDLE;
  private running = false;

  constructor(options: CycleOrchestratorOptions) {
    this.options = options;
    this.now     = options.now ?? Date.now;
  }

  get state(): CycleState {
    return this.currentState;
  }

  get devices(): readonly DeviceSpec[] {
    return this.deviceList;
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  /** Ejecuta un ciclo completo y devuelve el snapshot emitido */
  async runCycle(): Promise<Snapshot> {
    const startedAt = this.now();
    const { prober, metadata, blink, sink } = this.options;
    const signal = this.controller.signal;

    this.transition(CycleState.RELOADING);
    await this.reloadIfDue(startedAt);
    const devices = this.deviceList;

    this.transition(CycleState.PROBING);
    const reachability = await prober.probeAll(devices.map(probeTarget));

    this.transition(CycleState.FETCHING_METADATA);
    const up = devices
      .filter((d) => d.resolvedAddress && reachability.get(probeTarget(d)) === true)
      .map((d) => d.resolvedAddress);
    const summary = up.length ? await metadata.refresh(up, signal) : { refreshed: 0, failed: 0 };

    this.transition(CycleState.COMPOSING);
    const snapshot = this.compose(devices, reachability, blink.tick());

    this.transition(CycleState.EMITTED);
    // Un ciclo abandonado por stop() no publica nada
    if (!signal.aborted) sink.publish(snapshot);

    logger.debug('Ciclo completado', {
      cycle:     snapshot.cycle,
      devices:   devices.length,
      up:        snapshot.devices.filter((d) => d.reachable).length,
      refreshed: summary.refreshed,
      ms:        this.now() - startedAt,
    });

    this.transition(CycleState.IDLE);
    return snapshot;
  }

  /**
   * Corre ciclos hasta que se llame a stop(). Al detenerse no espera al
   * ciclo en curso: lo que quede en vuelo termina por su cuenta.
   */
  async start(): Promise<void> {
    if (this.running) throw new Error('El monitoreo ya está en ejecución');
    this.running = true;

    const signal  = this.controller.signal;
    const aborted = new Promise<void>((resolve) => {
      signal.addEventListener('abort', () => resolve(), { once: true });
    });

    logger.info('Monitoreo iniciado', {
      pollIntervalMs:   this.options.pollIntervalMs,
      reloadIntervalMs: this.options.reloadIntervalMs,
    });

    try {
      while (!signal.aborted) {
        const cycle = this.runCycle().catch((err: unknown) => {
          logger.error('Error inesperado en el ciclo de monitoreo', { error: errorMessage(err) });
        });
        await Promise.race([cycle, aborted]);
        if (signal.aborted) break;
        await this.pause(this.options.pollIntervalMs);
      }
    } finally {
      this.running = false;
      this.currentState = CycleState.IDLE;
      logger.info('Monitoreo detenido', { cycles: this.cycleCount });
    }
  }

  stop(): void {
    if (!this.controller.signal.aborted) this.controller.abort();
  }

  // ─── Fases ─────────────────────────────────────────────────────────────────

  private async reloadIfDue(now: number): Promise<void> {
    if (this.lastReloadAt !== null && now - this.lastReloadAt < this.options.reloadIntervalMs) return;
    this.lastReloadAt = now;

    const entries = await this.options.source.read();
    const changed = !sameEntries(entries, this.entries);

    // Aun sin cambios se vuelve a resolver: la cache DNS decide si hay que consultar
    const specs = await this.options.resolver.resolveAll(entries);
    if (!changed && sameSpecs(specs, this.deviceList)) return;

    this.entries    = entries;
    this.deviceList = Object.freeze(specs.map((s) => Object.freeze({ ...s })));

    if (changed) {
      logger.info('Lista de dispositivos cargada', {
        count:      entries.length,
        unresolved: specs.filter((s) => !s.resolvedAddress).map((s) => s.original),
      });
    }
  }

  private compose(
    devices: readonly DeviceSpec[],
    reachability: Map<string, boolean>,
    blinkOn: boolean,
  ): Snapshot {
    const suffixes = this.options.hostnameSuffixes ?? [];

    const entries: SnapshotEntry[] = devices.map((device) => {
      const target = probeTarget(device);
      const meta   = device.resolvedAddress
        ? this.options.metadata.lookup(device.resolvedAddress)
        : NO_METADATA;

      return Object.freeze({
        original:        device.original,
        address:         device.resolvedAddress,
        target,
        reachable:       reachability.get(target) === true,
        hostname:        meta.hostname,
        model:           meta.model,
        displayNameHint: device.displayNameHint,
        displayName:     displayName(meta.hostname, device.displayNameHint, suffixes),
        blinkOn,
      });
    });

    return Object.freeze({
      cycle:       ++this.cycleCount,
      generatedAt: new Date(this.now()).toISOString(),
      blinkOn,
      devices:     Object.freeze(entries),
    });
  }

  // Detenido, el estado queda en idle aunque un ciclo abandonado siga avanzando
  private transition(next: CycleState): void {
    this.currentState = this.stopped ? CycleState.IDLE : next;
  }

  private pause(ms: number): Promise<void> {
    const signal = this.controller.signal;
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const done = (): void => {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      };
      timer = setTimeout(done, ms);
      signal.addEventListener('abort', done, { once: true });
    });
  }
}
