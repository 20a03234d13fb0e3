// ─── Cadena de intentos "gana el primero que funciona" ───────────────────────
// Credenciales SSH y comandos por dialecto se expresan como listas ordenadas
// de intentos; agregar un dialecto o una credencial es agregar un elemento.

export interface Attempt<T> {
  label: string;
  /** null = el intento no sirvió (sin error); un throw también cuenta como fallo */
  run: () => Promise<T | null>;
}

export interface AttemptOutcome<T> {
  value: T;
  label: string;
}

export type AttemptFailureHandler = (label: string, error: unknown) => void;

/**
 * Ejecuta los intentos en orden y devuelve el primero que produce un valor.
 * Los errores de cada intento se reportan a `onFailure` y no se propagan.
 */
export async function firstSuccess<T>(
  attempts: readonly Attempt<T>[],
  onFailure?: AttemptFailureHandler,
): Promise<AttemptOutcome<T> | null> {
  for (const attempt of attempts) {
    try {
      const value = await attempt.run();
      if (value !== null) return { value, label: attempt.label };
    } catch (err) {
      onFailure?.(attempt.label, err);
    }
  }
  return null;
}
