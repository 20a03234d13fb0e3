import { UNKNOWN } from '../../types';

/** Quita el primer sufijo de dominio que coincida (sin distinguir mayúsculas) */
export function cleanHostname(name: string, suffixes: readonly string[]): string {
  const trimmed = name.trim();
  if (!trimmed) return UNKNOWN;

  const lower = trimmed.toLowerCase();
  const suffix = suffixes.find((s) => s && lower.endsWith(s.toLowerCase()));
  const cleaned = suffix ? trimmed.slice(0, trimmed.length - suffix.length) : trimmed;
  return cleaned || UNKNOWN;
}

/** Hostname por SSH si se conoce; si no, el nombre DNS; si no, 'unknown' */
export function displayName(hostname: string, dnsName: string, suffixes: readonly string[]): string {
  if (hostname && hostname !== UNKNOWN) return cleanHostname(hostname, suffixes);
  return dnsName ? cleanHostname(dnsName, suffixes) : UNKNOWN;
}
