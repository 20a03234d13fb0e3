// ─── Cache de hostname y modelo por dirección ────────────────────────────────
// Cada campo tiene su propio TTL. Mientras un equipo está caído nadie escribe
// en esta cache, así que se sigue mostrando el último valor conocido en lugar
// de volver a "unknown" ante un corte momentáneo.

import { DeviceMetadata, UNKNOWN } from '../../types';
import { TtlCache } from '../../utils/cache';

export type MetadataField = keyof DeviceMetadata;

export const METADATA_FIELDS: readonly MetadataField[] = ['hostname', 'model'];

export class MetadataCache {
  private readonly fields: Record<MetadataField, TtlCache<string>>;

  constructor(hostnames: TtlCache<string>, models: TtlCache<string>) {
    this.fields = { hostname: hostnames, model: models };
  }

  /** Último valor conocido de cada campo, vigente o no; 'unknown' si nunca se obtuvo */
  lookup(address: string): DeviceMetadata {
    return {
      hostname: this.fields.hostname.peek(address)?.data ?? UNKNOWN,
      model:    this.fields.model.peek(address)?.data ?? UNKNOWN,
    };
  }

  /** Campos sin valor o con TTL vencido */
  staleFields(address: string): MetadataField[] {
    return METADATA_FIELDS.filter((field) => !this.fields[field].isFresh(address));
  }

  /**
   * Guarda el resultado de un fetch. Si el fetch no obtuvo nada y ya había
   * un valor conocido, se conserva ese valor y solo se renueva el timestamp
   * (así no se reintenta SSH en cada ciclo).
   */
  record(address: string, field: MetadataField, value: string): void {
    const cache    = this.fields[field];
    const previous = cache.peek(address);

    if (value === UNKNOWN && previous && previous.data !== UNKNOWN) {
      cache.touch(address);
      return;
    }
    cache.set(address, value);
  }
}
