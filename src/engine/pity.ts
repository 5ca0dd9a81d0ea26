import type { RandomSource } from "../common/random";
import { defaultRandomSource } from "../common/random";
import { draw } from "./draw";

export type PityOptions = {
  source?: RandomSource;
  /** Miss streak to start from, clamped into `[0, pity - 1]`. */
  initialMissStreak?: number;
};

/** Clamp a carried-over miss streak into the range a pity counter can hold. */
export function clampMissStreak(streak: number, pity: number): number {
  if (pity <= 0 || !Number.isFinite(streak) || streak < 0) return 0;
  return Math.min(Math.floor(streak), pity - 1);
}

/**
 * Hard pity: the draw that would make the miss streak reach `pity` is a
 * guaranteed hit. A threshold of zero or less disables pity entirely.
 */
export class PitySystem {
  readonly pity: number;
  readonly source: RandomSource;
  protected streak: number;

  constructor(pity: number, options: PityOptions = {}) {
    this.pity = pity;
    this.source = options.source ?? defaultRandomSource();
    this.streak = clampMissStreak(options.initialMissStreak ?? 0, pity);
  }

  /** Draws since the last hit. */
  get missStreak(): number {
    return this.streak;
  }

  get enabled(): boolean {
    return this.pity > 0;
  }

  /** Whether the next draw is forced by the hard cap. */
  protected atHardCap(): boolean {
    return this.enabled && this.streak + 1 >= this.pity;
  }

  reset(): void {
    this.streak = 0;
  }

  draw(p: number): boolean {
    if (!this.enabled) return draw(p, this.source);

    if (this.atHardCap()) {
      this.streak = 0;
      return true;
    }

    return this.record(draw(p, this.source));
  }

  protected record(hit: boolean): boolean {
    this.streak = hit ? 0 : this.streak + 1;
    return hit;
  }
}
