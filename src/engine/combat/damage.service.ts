// Physical / magical damage scaling

import { Injectable } from '@nestjs/common';
import type { RandomSource } from '../rng/rng.service.js';
import { roundHalfEven } from './hit.service.js';

export interface DamageOptions {
  alpha?: number;
  varianceFraction?: number;
}

@Injectable()
export class DamageService {
  /**
   * effDef = max(0, def - max(0, pen))
   * base = power * (atk / (atk + max(1, effDef)))^alpha
   * final = roundHalfEven(base * U(1 - variance, 1 + variance)), at least 1
   */
  physicalDamage(
    rng: RandomSource,
    power: number,
    attack: number,
    defense: number,
    penetration: number,
    options: DamageOptions = {},
  ): number {
    return this.scaled(rng, power, attack, defense, penetration, options);
  }

  /** Same curve with intelligence against resistance. */
  magicalDamage(
    rng: RandomSource,
    power: number,
    intelligence: number,
    resistance: number,
    penetration: number,
    options: DamageOptions = {},
  ): number {
    return this.scaled(rng, power, intelligence, resistance, penetration, options);
  }

  private scaled(
    rng: RandomSource,
    power: number,
    offense: number,
    mitigation: number,
    penetration: number,
    { alpha = 1.2, varianceFraction = 0.05 }: DamageOptions,
  ): number {
    const effective = Math.max(0, mitigation - Math.max(0, penetration));
    const off = Math.max(0, offense);
    const scale = Math.pow(off / (off + Math.max(1, effective)), alpha);
    const base = power * scale;
    const variance = rng.uniform(1 - varianceFraction, 1 + varianceFraction);
    return Math.max(1, roundHalfEven(base * variance));
  }
}
