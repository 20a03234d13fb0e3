// ─── Configuración de variables de entorno ───────────────────────────────────
// Valida y exporta toda la configuración al iniciar la aplicación.
// Ninguna variable es obligatoria: todas tienen un default razonable.
// Un valor inválido (ej: "PROBE_TIMEOUT_MS=abc") sí impide el arranque.

import dotenv from "dotenv";
import { Credential, CredentialSet } from "../types";
dotenv.config();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function optionalEnv(name: string, fallback: string): string {
  return process.env[name] ?? fallback;
}

function positiveIntEnv(name: string, fallback: number): number {
  return parsePositiveInt(name, process.env[name], fallback);
}

function listEnv(name: string): string[] {
  return optionalEnv(name, "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Valor inválido para ${name}: "${raw}" (se espera un entero positivo)`);
  }
  return value;
}

/**
 * Parsea la lista de credenciales SSH.
 * Formato: `usuario:clave1|clave2,otro:clave`. El orden se respeta tal cual
 * porque es el orden en que se prueban contra cada equipo.
 */
export function parseCredentials(raw: string): CredentialSet[] {
  const sets: CredentialSet[] = [];

  for (const chunk of raw.split(",")) {
    const item = chunk.trim();
    if (!item) continue;

    const sep = item.indexOf(":");
    if (sep <= 0) {
      throw new ConfigError(`Credencial SSH mal formada: "${item}" (se espera usuario:clave)`);
    }

    const username  = item.slice(0, sep).trim();
    const passwords = item.slice(sep + 1).split("|").filter((p) => p.length > 0);
    if (!passwords.length) {
      throw new ConfigError(`La credencial SSH de "${username}" no tiene claves`);
    }
    sets.push({ username, passwords });
  }

  return sets;
}

/** Aplana usuario + lista de claves a pares (usuario, clave) en orden */
export function expandCredentials(sets: readonly CredentialSet[]): Credential[] {
  return sets.flatMap((set) => set.passwords.map((password) => ({ username: set.username, password })));
}

const nodeEnv = optionalEnv("NODE_ENV", "development");

export const env = {
  // Servidor
  port:       positiveIntEnv("PORT", 3000),
  nodeEnv,
  isDev:      nodeEnv === "development",
  isTest:     nodeEnv === "test",
  logLevel:   optionalEnv("LOG_LEVEL", nodeEnv === "development" ? "debug" : "info"),
  corsOrigin: optionalEnv("CORS_ORIGIN", "*"),

  // Lista de dispositivos y ciclo de polling
  devices: {
    file:             optionalEnv("DEVICES_FILE", "devices.txt"),
    reloadIntervalMs: positiveIntEnv("DEVICES_RELOAD_MS", 10_000),
    pollIntervalMs:   positiveIntEnv("POLL_INTERVAL_MS", 1_000),
    dnsTtlMs:         positiveIntEnv("DNS_TTL_MS", 300_000),
    dnsTimeoutMs:     positiveIntEnv("DNS_TIMEOUT_MS", 2_000),
    // Sufijos de dominio que se recortan del nombre que se muestra
    hostnameSuffixes: listEnv("HOSTNAME_SUFFIXES"),
  },

  // Ping
  probe: {
    timeoutMs:      positiveIntEnv("PROBE_TIMEOUT_MS", 1_000),
    maxParallelism: positiveIntEnv("PROBE_CONCURRENCY", 32),
  },

  // SSH (hostname y modelo)
  ssh: {
    credentials:    expandCredentials(parseCredentials(optionalEnv("SSH_CREDENTIALS", ""))),
    port:           positiveIntEnv("SSH_PORT", 22),
    timeoutMs:      positiveIntEnv("SSH_TIMEOUT_MS", 3_000),
    maxParallelism: positiveIntEnv("SSH_CONCURRENCY", 16),
    hostnameTtlMs:  positiveIntEnv("HOSTNAME_TTL_MS", 120_000),
    modelTtlMs:     positiveIntEnv("MODEL_TTL_MS", 300_000),
  },

  blinkPeriodMs: positiveIntEnv("BLINK_PERIOD_MS", 1_000),
} as const;
