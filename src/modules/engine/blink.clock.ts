// ─── Reloj de parpadeo ───────────────────────────────────────────────────────
// Alterna entre fase "llena" y "atenuada" para los equipos caídos.
// Se avanza una vez por ciclo: como mucho un cambio por llamada, aunque el
// ciclo haya durado varios intervalos. Es cosmético, no hace falta precisión.

import { Clock } from '../../utils/cache';

export class BlinkClock {
  private on = true;
  private lastFlip: number;

  constructor(
    private readonly intervalMs: number,
    private readonly now: Clock = Date.now,
  ) {
    this.lastFlip = now();
  }

  get phase(): boolean {
    return this.on;
  }

  tick(): boolean {
    const current = this.now();
    if (current - this.lastFlip >= this.intervalMs) {
      this.on = !this.on;
      this.lastFlip = current;
    }
    return this.on;
  }
}
