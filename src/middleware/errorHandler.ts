// ─── Middleware global de manejo de errores ──────────────────────────────────
// Captura cualquier error no manejado que llegue con next(err).
// La API es de solo lectura: nunca se expone el detalle del error al cliente.

import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import { sendError } from '../utils/response';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  logger.error('Error no manejado en la API', {
    message: err.message,
    stack:   err.stack,
    method:  req.method,
    url:     req.originalUrl,
  });

  sendError(res, 500, 'Error interno del servidor.');
}

/** Rutas inexistentes (404) */
export function notFoundHandler(req: Request, res: Response): void {
  sendError(res, 404, `Ruta no encontrada: ${req.method} ${req.originalUrl}`);
}
