// ─── Armado del motor de monitoreo ────────────────────────────────────────────
// Crea las caches y los componentes y los conecta. Todo el estado mutable
// vive en estas instancias: no hay caches globales a nivel de módulo.

import { Credential } from './types';
import { Clock, TtlCache } from './utils/cache';
import { DeviceListFile, DeviceListSource } from './modules/devices/devices.source';
import { NameLookup, Resolution, Resolver } from './modules/resolver/resolver.service';
import { ProbeFn, Prober } from './modules/prober/prober.service';
import { SessionFactory, SshCommandRunner } from './modules/ssh/ssh.client';
import { MetadataCache } from './modules/metadata/metadata.cache';
import { MetadataFetcher, MetadataRefresher } from './modules/metadata/metadata.service';
import { BlinkClock } from './modules/engine/blink.clock';
import { CycleOrchestrator, SnapshotSink } from './modules/engine/cycle.orchestrator';

export interface EngineConfig {
  devicesFile:      string;
  pollIntervalMs:   number;
  reloadIntervalMs: number;
  dnsTtlMs:         number;
  dnsTimeoutMs:     number;
  hostnameSuffixes: readonly string[];
  probe: {
    timeoutMs:      number;
    maxParallelism: number;
  };
  ssh: {
    credentials:    readonly Credential[];
    port:           number;
    timeoutMs:      number;
    maxParallelism: number;
    hostnameTtlMs:  number;
    modelTtlMs:     number;
  };
  blinkPeriodMs: number;
}

/** Reemplazos de I/O (tests o integraciones) */
export interface EngineOverrides {
  source?:         DeviceListSource;
  lookup?:         NameLookup;
  probe?:          ProbeFn;
  sessionFactory?: SessionFactory;
  now?:            Clock;
}

export interface Engine {
  orchestrator: CycleOrchestrator;
  resolver:     Resolver;
  prober:       Prober;
  fetcher:      MetadataFetcher;
  metadata:     MetadataRefresher;
}

export function createEngine(config: EngineConfig, sink: SnapshotSink, overrides: EngineOverrides = {}): Engine {
  const now = overrides.now ?? Date.now;

  const resolver = new Resolver({
    cache:        new TtlCache<Resolution>(config.dnsTtlMs, now),
    reverseCache: new TtlCache<string>(config.dnsTtlMs, now),
    lookup:       overrides.lookup,
    timeoutMs:    config.dnsTimeoutMs,
  });

  const prober = new Prober({
    timeoutMs:      config.probe.timeoutMs,
    maxParallelism: config.probe.maxParallelism,
    probe:          overrides.probe,
  });

  const fetcher = new MetadataFetcher(new SshCommandRunner({
    credentials: config.ssh.credentials,
    timeoutMs:   config.ssh.timeoutMs,
    port:        config.ssh.port,
    factory:     overrides.sessionFactory,
  }));

  const metadata = new MetadataRefresher({
    cache: new MetadataCache(
      new TtlCache<string>(config.ssh.hostnameTtlMs, now),
      new TtlCache<string>(config.ssh.modelTtlMs, now),
    ),
    fetcher,
    maxParallelism: config.ssh.maxParallelism,
  });

  const orchestrator = new CycleOrchestrator({
    source:           overrides.source ?? new DeviceListFile(config.devicesFile),
    resolver,
    prober,
    metadata,
    blink:            new BlinkClock(config.blinkPeriodMs, now),
    sink,
    pollIntervalMs:   config.pollIntervalMs,
    reloadIntervalMs: config.reloadIntervalMs,
    hostnameSuffixes: config.hostnameSuffixes,
    now,
  });

  return { orchestrator, resolver, prober, fetcher, metadata };
}
