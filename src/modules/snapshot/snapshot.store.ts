// ─── Último snapshot emitido ──────────────────────────────────────────────────
// Consumidor de los ciclos: guarda el snapshot más reciente para que la API
// lo sirva. Los snapshots vienen congelados, así que se comparten tal cual.

import { Snapshot, SnapshotEntry } from '../../types';
import { SnapshotSink } from '../engine/cycle.orchestrator';

export class SnapshotStore implements SnapshotSink {
  private latest: Snapshot | null = null;

  publish(snapshot: Snapshot): void {
    this.latest = snapshot;
  }

  current(): Snapshot | null {
    return this.latest;
  }

  /** Busca por línea original, dirección resuelta o destino de ping */
  findDevice(key: string): SnapshotEntry | null {
    if (!this.latest) return null;
    return this.latest.devices.find((d) =>
      d.original === key || d.address === key || d.target === key,
    ) ?? null;
  }
}
