import { DamageService } from './damage.service.js';
import { Rng } from '../rng/rng.service.js';
import { ScriptedRandom } from '../rng/testing/scripted-random.js';

describe('DamageService', () => {
  let service: DamageService;

  beforeEach(() => {
    service = new DamageService();
  });

  it('is deterministic for the same stream', () => {
    const a = service.physicalDamage(new Rng('det'), 100, 30, 12, 0);
    const b = service.physicalDamage(new Rng('det'), 100, 30, 12, 0);
    expect(a).toBe(b);
  });

  it('scales power by (atk / (atk + def))^1.2', () => {
    // 100 * (50/51)^1.2 = 97.65, variance draw 0.5 → x1.0
    expect(service.physicalDamage(new ScriptedRandom([0.5]), 100, 50, 0, 0)).toBe(98);
    // 100 * (20/30)^1.2 = 61.47
    expect(service.physicalDamage(new ScriptedRandom([0.5]), 100, 20, 10, 0)).toBe(61);
  });

  it('applies the ±5% variance band', () => {
    expect(service.physicalDamage(new ScriptedRandom([1]), 100, 20, 10, 0)).toBe(65);
    expect(service.physicalDamage(new ScriptedRandom([0]), 100, 20, 10, 0)).toBe(58);
  });

  it('penetration removes defense, never below zero', () => {
    const pierced = service.physicalDamage(new ScriptedRandom([0.5]), 100, 50, 20, 20);
    const overPierced = service.physicalDamage(new ScriptedRandom([0.5]), 100, 50, 20, 500);
    expect(pierced).toBe(98);
    expect(overPierced).toBe(98);
  });

  it('negative penetration is ignored', () => {
    const a = service.physicalDamage(new ScriptedRandom([0.5]), 100, 20, 10, -50);
    expect(a).toBe(61);
  });

  it('rounds an exact half to the even value', () => {
    // alpha 1, atk 1 vs def 0 → scale 0.5
    expect(service.physicalDamage(new ScriptedRandom([0.5]), 5, 1, 0, 0, { alpha: 1 })).toBe(2);
    expect(service.physicalDamage(new ScriptedRandom([0.5]), 7, 1, 0, 0, { alpha: 1 })).toBe(4);
  });

  it('never returns less than 1', () => {
    expect(service.physicalDamage(new ScriptedRandom([0]), 1, 1, 10_000, 0)).toBe(1);
    expect(service.physicalDamage(new ScriptedRandom([0]), 100, 0, 10, 0)).toBe(1);
    expect(service.physicalDamage(new ScriptedRandom([0]), 100, -7, 10, 0)).toBe(1);
  });

  it('magicalDamage follows the same curve with intelligence', () => {
    expect(service.magicalDamage(new ScriptedRandom([0.5]), 100, 50, 0, 0)).toBe(98);
    expect(service.magicalDamage(new ScriptedRandom([0.5]), 100, 20, 30, 20)).toBe(61);
  });

  it('draws exactly once', () => {
    const rng = new ScriptedRandom([0.5, 0.5]);
    service.physicalDamage(rng, 100, 10, 10, 0);
    expect(rng.consumed).toBe(1);
  });
});
