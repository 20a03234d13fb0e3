// ─── Middleware de validación de requests ────────────────────────────────────
// Usa express-validator para validar params/query. Si hay errores,
// responde 400 con el detalle de cada campo.

import { Request, Response, NextFunction } from 'express';
import { validationResult } from 'express-validator';
import { sendError } from '../utils/response';

export function validate(req: Request, res: Response, next: NextFunction): void {
  const errors = validationResult(req);

  if (errors.isEmpty()) {
    next();
    return;
  }

  sendError(res, 400, 'Parámetros inválidos.', {
    fields: errors.array().map((e) => ({ field: 'path' in e ? e.path : e.type, message: String(e.msg) })),
  });
}
