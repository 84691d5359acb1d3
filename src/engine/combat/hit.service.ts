// Hit / graze / miss and critical-hit rolls

import { Injectable } from '@nestjs/common';
import type { RandomSource } from '../rng/rng.service.js';
import type { HitOutcome } from '../../types/index.js';

export interface HitResult {
  outcome: HitOutcome;
  damageMultiplier: number;
  pHit: number;
}

export const GRAZE_MULTIPLIER = 0.6;

export function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x));
}

/** Nearest integer, exact halves to the even neighbour (2.5 → 2, 3.5 → 4). */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

@Injectable()
export class HitService {
  /**
   * pHit = clamp(acc / (acc + max(1, eva)), 0.05, 0.95), one draw r:
   * r <= pHit * (1 - grazeWindow) → hit, r <= pHit → graze, else miss.
   */
  hitRoll(
    rng: RandomSource,
    accuracy: number,
    evasion: number,
    grazeWindow: number = 0.1,
  ): HitResult {
    const pHit = clamp(accuracy / (accuracy + Math.max(1, evasion)), 0.05, 0.95);
    const roll = rng.next();
    if (roll <= pHit * (1 - grazeWindow)) {
      return { outcome: 'hit', damageMultiplier: 1.0, pHit };
    }
    if (roll <= pHit) {
      return { outcome: 'graze', damageMultiplier: GRAZE_MULTIPLIER, pHit };
    }
    return { outcome: 'miss', damageMultiplier: 0.0, pHit };
  }

  /** Succeeds with probability clamp(base + luck * luckCoefficient, 0, cap). */
  critRoll(
    rng: RandomSource,
    base: number,
    luck: number,
    luckCoefficient: number = 0.002,
    cap: number = 0.75,
  ): boolean {
    return rng.next() < clamp(base + luck * luckCoefficient, 0, cap);
  }
}
