// ─── Controller de Snapshot ───────────────────────────────────────────────────
// Expone el último estado calculado por el motor. Solo lectura.

import { Request, Response } from 'express';
import { Snapshot, SnapshotEntry } from '../../types';
import { ApiResult, errorResult, okResult, send } from '../../utils/response';
import { SnapshotStore } from './snapshot.store';

const NOT_READY = 'Todavía no se completó ningún ciclo de monitoreo.';

export function snapshotResult(store: SnapshotStore): ApiResult<Snapshot> | ApiResult {
  const snapshot = store.current();
  if (!snapshot) return errorResult(503, NOT_READY);

  const up = snapshot.devices.filter((d) => d.reachable).length;
  return okResult(snapshot, { total: snapshot.devices.length, up, down: snapshot.devices.length - up });
}

export function deviceResult(store: SnapshotStore, key: string): ApiResult<SnapshotEntry> | ApiResult {
  if (!store.current()) return errorResult(503, NOT_READY);

  const device = store.findDevice(key);
  if (!device) return errorResult(404, `Dispositivo no encontrado: ${key}`);
  return okResult(device);
}

export interface SnapshotController {
  getSnapshot(req: Request, res: Response): void;
  getDevice(req: Request, res: Response): void;
}

export function createSnapshotController(store: SnapshotStore): SnapshotController {
  return {
    /** GET /snapshot: estado completo, en el orden del archivo de dispositivos */
    getSnapshot(_req, res) {
      send(res, snapshotResult(store));
    },

    /** GET /snapshot/devices/:target: un dispositivo por IP, hostname o línea original */
    getDevice(req, res) {
      send(res, deviceResult(store, req.params.target));
    },
  };
}
