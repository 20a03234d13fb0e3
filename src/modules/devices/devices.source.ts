// ─── Lista de dispositivos ────────────────────────────────────────────────────
// Una línea por dispositivo (IP o hostname). Las líneas vacías se ignoran.
// Si el archivo no existe, la lista es vacía y el ciclo sigue corriendo.

import { readFile } from 'node:fs/promises';
import { errorMessage, logger } from '../../utils/logger';

export interface DeviceListSource {
  read(): Promise<string[]>;
}

export function parseDeviceList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

/** Igualdad exacta de secuencia (mismo orden, mismas líneas) */
export function sameEntries(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((entry, i) => entry === b[i]);
}

type ReadText = (path: string) => Promise<string>;

const readUtf8: ReadText = (path) => readFile(path, 'utf8');

export class DeviceListFile implements DeviceListSource {
  // Último problema reportado; evita repetir el mismo warning en cada recarga
  private lastProblem: string | null = null;

  constructor(
    readonly path: string,
    private readonly readText: ReadText = readUtf8,
  ) {}

  async read(): Promise<string[]> {
    try {
      const entries = parseDeviceList(await this.readText(this.path));
      if (this.lastProblem) {
        logger.info('Archivo de dispositivos disponible nuevamente', { path: this.path });
        this.lastProblem = null;
      }
      return entries;
    } catch (err) {
      const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
      const problem = missing ? 'no encontrado' : errorMessage(err);
      if (problem !== this.lastProblem) {
        logger.warn(`Archivo de dispositivos ${problem}; se usa una lista vacía`, { path: this.path });
        this.lastProblem = problem;
      }
      return [];
    }
  }
}
