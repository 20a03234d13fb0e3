// ─── Rutas de Snapshot ────────────────────────────────────────────────────────

import { Router } from 'express';
import { param } from 'express-validator';
import { validate } from '../../middleware/validate';
import { createSnapshotController } from './snapshot.controller';
import { SnapshotStore } from './snapshot.store';

export function createSnapshotRouter(store: SnapshotStore): Router {
  const router     = Router();
  const controller = createSnapshotController(store);

  router.get('/', controller.getSnapshot);
  router.get(
    '/devices/:target',
    [param('target').trim().notEmpty().withMessage('Indicá una IP o hostname.')],
    validate,
    controller.getDevice,
  );

  return router;
}
