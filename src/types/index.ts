// ─── Tipos globales del monitor ───────────────────────────────────────────────
// Centraliza enums, interfaces y tipos compartidos entre módulos.

/** Valor que se muestra cuando no hay hostname/modelo conocido */
export const UNKNOWN = 'unknown';

// ─── Dialectos de CLI soportados ─────────────────────────────────────────────

export enum Dialect {
  NXOS  = 'nxos',   // Dialecto A
  IOSXE = 'iosxe',  // Dialecto B
}

// ─── Estados del ciclo de polling ────────────────────────────────────────────

export enum CycleState {
  IDLE              = 'idle',
  RELOADING         = 'reloading',
  PROBING           = 'probing',
  FETCHING_METADATA = 'fetching-metadata',
  COMPOSING         = 'composing',
  EMITTED           = 'emitted',
}

// ─── Entidades de dominio ────────────────────────────────────────────────────

export interface DeviceSpec {
  readonly original:        string;  // Línea del archivo de dispositivos, sin espacios
  readonly resolvedAddress: string;  // '' si no resolvió
  readonly displayNameHint: string;  // Nombre DNS (directo o inverso), '' si no hay
}

export interface Credential {
  username: string;
  password: string;
}

/** Un usuario con una o más claves, en el orden en que se prueban */
export interface CredentialSet {
  username:  string;
  passwords: string[];
}

export interface DeviceMetadata {
  hostname: string;
  model:    string;
}

// ─── Snapshot ────────────────────────────────────────────────────────────────

export interface SnapshotEntry {
  readonly original:        string;
  readonly address:         string;   // Dirección resuelta ('' si no resolvió)
  readonly target:          string;   // Lo que efectivamente se pingueó
  readonly reachable:       boolean;
  readonly hostname:        string;   // Hostname por SSH o 'unknown'
  readonly model:           string;   // Modelo por SSH o 'unknown'
  readonly displayNameHint: string;
  readonly displayName:     string;   // Nombre listo para mostrar (sin sufijos de dominio)
  readonly blinkOn:         boolean;
}

export interface Snapshot {
  readonly cycle:       number;
  readonly generatedAt: string;
  readonly blinkOn:     boolean;
  readonly devices:     readonly SnapshotEntry[];
}
