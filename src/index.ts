#!/usr/bin/env node
// ─── Device Health Monitor: punto de entrada ──────────────────────────────────

import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { Server } from 'node:http';

import { env } from './config/env';
import { logger, errorMessage } from './utils/logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createEngine } from './engine';
import { SnapshotStore } from './modules/snapshot/snapshot.store';
import { createSnapshotRouter } from './modules/snapshot/snapshot.routes';

// ─── Motor ────────────────────────────────────────────────────────────────────

const store  = new SnapshotStore();
const engine = createEngine({
  devicesFile:      env.devices.file,
  pollIntervalMs:   env.devices.pollIntervalMs,
  reloadIntervalMs: env.devices.reloadIntervalMs,
  dnsTtlMs:         env.devices.dnsTtlMs,
  dnsTimeoutMs:     env.devices.dnsTimeoutMs,
  hostnameSuffixes: env.devices.hostnameSuffixes,
  probe:            env.probe,
  ssh:              env.ssh,
  blinkPeriodMs:    env.blinkPeriodMs,
}, store);

// ─── API de estado ────────────────────────────────────────────────────────────

const app = express();

app.set('trust proxy', 1);
app.use(helmet());
app.use(cors({ origin: env.corsOrigin }));

// La API la consultan pantallas que refrescan seguido: límite generoso
app.use(rateLimit({
  windowMs: 60 * 1000,
  max:      600,
  standardHeaders: true,
  legacyHeaders:   false,
  message: { ok: false, error: 'Demasiadas solicitudes. Intentá de nuevo en un minuto.' },
}));

// Health check del proceso (no del parque de equipos)
app.get('/health', (_req, res) => {
  res.json({ ok: true, version: '1.0.0', timestamp: new Date().toISOString() });
});

app.use('/snapshot', createSnapshotRouter(store));

app.use(notFoundHandler);
app.use(errorHandler);

// ─── Arranque y apagado ───────────────────────────────────────────────────────

function shutdown(signal: string, server: Server): void {
  logger.info(`Señal ${signal} recibida, deteniendo el monitoreo`);
  engine.orchestrator.stop();
  server.close();
}

async function start(): Promise<void> {
  if (!env.ssh.credentials.length) {
    logger.warn('SSH_CREDENTIALS vacío: no se obtendrán hostnames ni modelos por SSH');
  }

  const server = app.listen(env.port, () => {
    logger.info(`API de estado escuchando en puerto ${env.port} [${env.nodeEnv}]`, {
      devicesFile: env.devices.file,
    });
  });

  process.once('SIGINT',  () => shutdown('SIGINT', server));
  process.once('SIGTERM', () => shutdown('SIGTERM', server));

  await engine.orchestrator.start();
}

start().catch((err: unknown) => {
  logger.error('Error al iniciar el monitor', { error: errorMessage(err) });
  process.exit(1);
});
