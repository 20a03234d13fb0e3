// ─── Helpers para respuestas HTTP consistentes ───────────────────────────────
// Toda la API responde con el mismo sobre: { ok, data?, error?, meta? }.
// Los controllers arman un ApiResult (status + body) y lo envían con send().

import { Response } from 'express';

export interface ApiResponse<T = unknown> {
  ok:     boolean;
  data?:  T;
  error?: string;
  meta?:  Record<string, unknown>;
}

export interface ApiResult<T = unknown> {
  status: number;
  body:   ApiResponse<T>;
}

export function okResult<T>(data: T, meta?: Record<string, unknown>): ApiResult<T> {
  const body: ApiResponse<T> = { ok: true, data };
  if (meta) body.meta = meta;
  return { status: 200, body };
}

export function errorResult(status: number, message: string, meta?: Record<string, unknown>): ApiResult {
  const body: ApiResponse = { ok: false, error: message };
  if (meta) body.meta = meta;
  return { status, body };
}

export function send(res: Response, result: ApiResult): void {
  res.status(result.status).json(result.body);
}

/** Error con status explícito (400, 404, 503...) */
export function sendError(res: Response, status: number, message: string, meta?: Record<string, unknown>): void {
  send(res, errorResult(status, message, meta));
}
