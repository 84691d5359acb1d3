// Battle state machine: action handlers, turn advance, termination

import { Inject, Injectable, Logger } from '@nestjs/common';
import { BattleConfigService } from '../config/battle-config.service.js';
import { BattleErrorFilter, type ActionFailure } from '../common/filters/battle-error.filter.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  CollaboratorFailure,
  InternalInconsistency,
  ValidationFailure,
} from '../common/errors/battle-errors.js';
import { MonsterDefinitionSchema } from '../content/content.types.js';
import { RngService } from '../engine/rng/rng.service.js';
import { HitService, roundHalfEven, type HitResult } from '../engine/combat/hit.service.js';
import { DamageService } from '../engine/combat/damage.service.js';
import { MonsterAiService } from '../engine/combat/monster-ai.service.js';
import { StatsService, type EffectiveStats } from '../engine/stats/stats.service.js';
import { StatusService } from '../engine/status/status.service.js';
import {
  COMBAT_STAT,
  type BattleActionType,
  type BattleSession,
  type CombatantSnapshot,
  type Winner,
} from '../types/index.js';
import { BattleActionSchema, type BattleAction } from './dto/battle-action.dto.js';
import { toSnapshot, type BattleSnapshot } from './battle-snapshot.js';
import { buildMonsterSnapshot, buildPlayerSnapshot } from './combatant.factory.js';
import type { BattlePresenter, MonsterIntent } from './battle-presenter.js';
import { SessionRegistryService } from './session-registry.service.js';
import {
  BATTLE_PRESENTER,
  CHARACTER_STORE,
  INVENTORY_STORE,
  type CharacterStore,
  type InventoryStore,
} from './collaborators.js';

export interface ActionSuccess {
  success: true;
  action: BattleActionType | 'start';
  /** log lines appended by this call */
  events: string[];
  battle: BattleSnapshot;
}

export type ActionOutcome = ActionSuccess | ActionFailure;

export interface ActionOptions {
  /** cancels the presenter pause only; outcomes do not change */
  signal?: AbortSignal;
}

export interface StartOptions {
  seed?: number;
  now?: Date;
}

type FinalWinner = Exclude<Winner, 'none'>;

const ATTACK_POWER = 100;
const ULTIMATE_ATTACK_FACTOR = 3;
const ULTIMATE_CRIT_MULTIPLIER = 1.5;
const SKILL_CRIT_MULTIPLIER = 2;

@Injectable()
export class BattleService {
  private readonly logger = new Logger(BattleService.name);
  private readonly actionPipe = new ZodValidationPipe(BattleActionSchema, 'INVALID_ACTION');
  private readonly monsterPipe = new ZodValidationPipe(MonsterDefinitionSchema, 'INVALID_MONSTER');

  constructor(
    private readonly config: BattleConfigService,
    private readonly registry: SessionRegistryService,
    private readonly errorFilter: BattleErrorFilter,
    private readonly rng: RngService,
    private readonly hit: HitService,
    private readonly damage: DamageService,
    private readonly stats: StatsService,
    private readonly status: StatusService,
    private readonly ai: MonsterAiService,
    @Inject(CHARACTER_STORE) private readonly characters: CharacterStore,
    @Inject(INVENTORY_STORE) private readonly inventory: InventoryStore,
    @Inject(BATTLE_PRESENTER) private readonly presenter: BattlePresenter,
  ) {}

  // --- lifecycle ---

  async startBattle(
    actorId: string,
    monster: unknown,
    options: StartOptions = {},
  ): Promise<ActionOutcome> {
    return this.registry.runExclusive(`actor:${actorId}`, async () => {
      try {
        if (this.registry.isInBattle(actorId)) {
          throw new ValidationFailure('ALREADY_IN_BATTLE', "You're already in battle!", { actorId });
        }
        const def = this.monsterPipe.transform(monster);

        const character = await this.collaborate('Character store', () =>
          this.characters.getPlayer(actorId),
        );
        if (!character) {
          throw new CollaboratorFailure('CHARACTER_NOT_FOUND', 'Character not found', { actorId });
        }
        const derived = await this.collaborate('Character store', () =>
          this.characters.getDerivedStats(character),
        );

        const now = options.now ?? new Date();
        const battleId = this.nextBattleId(actorId, now);
        const rngSeed = options.seed ?? this.rng.seedFor(actorId, def.name, battleId);

        const session: BattleSession = {
          battleId,
          actorId,
          turn: 1,
          rngSeed,
          status: 'active',
          winner: 'none',
          battleLog: [],
          rewards: { xp: 0, gold: 0 },
          player: buildPlayerSnapshot(character, derived),
          monster: buildMonsterSnapshot(def),
          startedAt: now.toISOString(),
          endedAt: null,
        };
        session.battleLog.push(
          `Battle started (seed ${String(rngSeed).slice(0, 4)})! ${session.player.name} vs ${session.monster.name}`,
        );
        this.registry.register(session);
        this.logger.log(`Battle ${battleId} started: ${actorId} vs ${def.name}`);

        return this.success(session, 'start', 0);
      } catch (err) {
        return this.errorFilter.catch(err);
      }
    });
  }

  async performAction(
    battleId: string,
    actorId: string,
    input: unknown,
    options: ActionOptions = {},
  ): Promise<ActionOutcome> {
    return this.registry.runExclusive(`battle:${battleId}`, async () => {
      try {
        const action = this.actionPipe.transform(input);
        const session = this.requireActive(battleId, actorId);
        const mark = session.battleLog.length;

        await this.dispatch(session, action, options.signal);
        this.assertConsistent(session);

        return this.success(session, action.action, mark);
      } catch (err) {
        return this.errorFilter.catch(err);
      }
    });
  }

  attack(battleId: string, actorId: string, options?: ActionOptions): Promise<ActionOutcome> {
    return this.performAction(battleId, actorId, { action: 'attack' }, options);
  }

  defend(battleId: string, actorId: string, options?: ActionOptions): Promise<ActionOutcome> {
    return this.performAction(battleId, actorId, { action: 'defend' }, options);
  }

  flee(battleId: string, actorId: string, options?: ActionOptions): Promise<ActionOutcome> {
    return this.performAction(battleId, actorId, { action: 'flee' }, options);
  }

  useSkill(
    battleId: string,
    actorId: string,
    skillId: string,
    options?: ActionOptions,
  ): Promise<ActionOutcome> {
    return this.performAction(battleId, actorId, { action: 'skill', skillId }, options);
  }

  useItem(
    battleId: string,
    actorId: string,
    itemId: string,
    options?: ActionOptions,
  ): Promise<ActionOutcome> {
    return this.performAction(battleId, actorId, { action: 'item', itemId }, options);
  }

  ultimate(battleId: string, actorId: string, options?: ActionOptions): Promise<ActionOutcome> {
    return this.performAction(battleId, actorId, { action: 'ultimate' }, options);
  }

  getSnapshot(battleId: string): BattleSnapshot | undefined {
    const session = this.registry.get(battleId);
    return session ? toSnapshot(session, this.config.get().logTail) : undefined;
  }

  getActiveBattle(actorId: string): BattleSnapshot | undefined {
    const session = this.registry.findActiveByActor(actorId);
    return session ? toSnapshot(session, this.config.get().logTail) : undefined;
  }

  isInBattle(actorId: string): boolean {
    return this.registry.isInBattle(actorId);
  }

  /** Waits for any in-flight action on the battle before removing it. */
  async cleanup(battleId: string): Promise<boolean> {
    return this.registry.runExclusive(`battle:${battleId}`, async () =>
      this.registry.cleanup(battleId),
    );
  }

  purgeCompleted(): number {
    return this.registry.purgeCompleted();
  }

  // --- dispatch ---

  private async dispatch(
    session: BattleSession,
    action: BattleAction,
    signal?: AbortSignal,
  ): Promise<void> {
    switch (action.action) {
      case 'attack':
        return this.playerAttack(session, signal);
      case 'defend':
        return this.playerDefend(session, signal);
      case 'flee':
        return this.playerFlee(session, signal);
      case 'skill':
        return this.playerSkill(session, action.skillId, signal);
      case 'item':
        return this.playerItem(session, action.itemId, signal);
      case 'ultimate':
        return this.playerUltimate(session, signal);
    }
  }

  private requireActive(battleId: string, actorId: string): BattleSession {
    const session = this.registry.get(battleId);
    if (!session) {
      throw new ValidationFailure('BATTLE_NOT_FOUND', 'Battle not found', { battleId });
    }
    if (session.actorId !== actorId) {
      throw new ValidationFailure('NOT_YOUR_BATTLE', 'Not your battle', { battleId });
    }
    if (session.status !== 'active') {
      throw new ValidationFailure('BATTLE_NOT_ACTIVE', 'Battle is not active', {
        battleId,
        winner: session.winner,
      });
    }
    return session;
  }

  // --- player actions ---

  private async playerAttack(session: BattleSession, signal?: AbortSignal): Promise<void> {
    const { player, monster } = session;
    const rng = this.rng.forTurn(session.rngSeed, session.turn, 'ATTACK');
    const p = this.effective(player);
    const m = this.effective(monster);

    const hit = this.hit.hitRoll(rng, p.accuracy, m.evasion);
    let damage = 0;
    let crit = false;
    if (hit.outcome !== 'miss') {
      let base = this.damage.physicalDamage(rng, ATTACK_POWER, p.attack, m.defense, player.penetration);
      crit = this.hit.critRoll(rng, player.critBase, player.luck);
      if (crit) base = roundHalfEven(base * player.critDamageMultiplier);
      damage = roundHalfEven(base * hit.damageMultiplier);
    }

    const absorbed = this.applyDamage(monster, damage);
    player.currentSP = Math.min(player.maxSP, player.currentSP + this.config.get().attackSpRegen);
    session.battleLog.push(strikeLine(player.name, monster.name, damage - absorbed, absorbed, crit, hit));

    if (monster.currentHP <= 0) {
      return this.endBattle(session, 'player');
    }
    await this.endOfTurn(session, signal);
  }

  private async playerDefend(session: BattleSession, signal?: AbortSignal): Promise<void> {
    const { player } = session;
    const regen = this.config.get().defendSpRegen;
    const gain = Math.max(5, Math.floor(player.defense * 0.6));

    player.shield += gain;
    player.currentSP = Math.min(player.maxSP, player.currentSP + regen);
    session.battleLog.push(`${player.name} Defend: +${gain} GP, +${regen} SP`);

    await this.endOfTurn(session, signal);
  }

  private async playerFlee(session: BattleSession, signal?: AbortSignal): Promise<void> {
    const { player, monster } = session;
    const rng = this.rng.forTurn(session.rngSeed, session.turn, 'FLEE');

    if (rng.next() < this.config.get().fleeChance) {
      const hpPenalty = Math.max(1, Math.floor(player.currentHP / 4));
      const taken = await this.applyFleePenalty(session, hpPenalty);
      session.battleLog.push(fleeLine(taken));
      return this.endBattle(session, 'fled');
    }

    // failed attempt: the monster acts, statuses do not tick
    session.battleLog.push(`Failed to flee! ${monster.name} gets a free attack!`);
    await this.monsterTurn(session, signal);
    if (session.status === 'active') session.turn++;
  }

  private async playerSkill(
    session: BattleSession,
    skillId: string,
    signal?: AbortSignal,
  ): Promise<void> {
    const { player, monster } = session;

    if (!player.skills.includes(skillId)) {
      throw new ValidationFailure('SKILL_UNKNOWN', `Unknown skill: ${skillId}`, { skillId });
    }
    const cooldown = player.cooldowns[skillId] ?? 0;
    if (cooldown > 0) {
      throw new ValidationFailure('SKILL_ON_COOLDOWN', `${skillId} is on cooldown`, {
        skillId,
        turnsLeft: cooldown,
      });
    }
    const skill = await this.collaborate('Character store', () =>
      this.characters.getSkillInfo(skillId),
    );
    if (!skill) {
      throw new CollaboratorFailure('SKILL_NOT_FOUND', 'Skill not found', { skillId });
    }
    if (player.currentSP < skill.spCost) {
      throw new ValidationFailure(
        'INSUFFICIENT_SP',
        `Not enough SP! Need ${skill.spCost}, have ${player.currentSP}`,
        { required: skill.spCost, available: player.currentSP },
      );
    }

    player.currentSP -= skill.spCost;
    await this.bestEffort('SP sync', session.actorId, () =>
      this.characters.restoreSP(session.actorId, -skill.spCost),
    );

    const rng = this.rng.forTurn(session.rngSeed, session.turn, 'SKILL');
    const p = this.effective(player);
    const multiplier = skill.multiplier + (skill.type === 'magic' ? player.intelligence * 0.1 : 0);
    let damage = Math.trunc(skill.power * multiplier);

    if (rng.range(1, 100) > p.accuracy) {
      session.battleLog.push(`${player.name} uses ${skill.name} but misses!`);
    } else {
      const crit = rng.range(1, 100) <= player.luck * 0.5;
      if (crit) damage = Math.trunc(damage * SKILL_CRIT_MULTIPLIER);
      const absorbed = this.applyDamage(monster, damage);
      session.battleLog.push(
        (crit ? 'Critical Hit! ' : '') +
          `${player.name} uses ${skill.name} for ${damage} damage!` +
          (absorbed > 0 ? ` (${absorbed} absorbed by shield)` : ''),
      );

      for (const effect of skill.effects) {
        const applied = this.status.applyEffect(
          player,
          monster,
          effect.statusId,
          effect.duration ?? this.config.get().statusDuration,
          skill.name,
        );
        if (!applied) {
          this.logger.warn(`Skill ${skillId} names unknown status ${effect.statusId}`);
          continue;
        }
        session.battleLog.push(`${applied.target.name} is affected by ${applied.definition.displayName}!`);
      }

      if (monster.currentHP <= 0) {
        return this.endBattle(session, 'player');
      }
    }

    await this.endOfTurn(session, signal);
    if (session.status === 'active' && skill.cooldown > 0) {
      player.cooldowns[skillId] = skill.cooldown;
    }
  }

  private async playerItem(
    session: BattleSession,
    itemId: string,
    signal?: AbortSignal,
  ): Promise<void> {
    const { player } = session;
    const result = await this.collaborate('Inventory', () =>
      this.inventory.useItem(session.actorId, itemId, 1),
    );
    if (!result.success) {
      throw new CollaboratorFailure('ITEM_USE_FAILED', result.reason, { itemId });
    }

    const { effects } = result;
    const applied: string[] = [];
    if (effects.healHP !== undefined && effects.healHP > 0) {
      const before = player.currentHP;
      player.currentHP = Math.min(player.maxHP, player.currentHP + effects.healHP);
      applied.push(`Restored ${player.currentHP - before} HP`);
    }
    if (effects.restoreSP !== undefined && effects.restoreSP > 0) {
      const before = player.currentSP;
      player.currentSP = Math.min(player.maxSP, player.currentSP + effects.restoreSP);
      applied.push(`Restored ${player.currentSP - before} SP`);
    }
    if (effects.shield !== undefined && effects.shield > 0) {
      player.shield += effects.shield;
      applied.push(`Gained ${effects.shield} shield`);
    }
    for (const stat of COMBAT_STAT) {
      const boost = Math.trunc(effects.statBoosts?.[stat] ?? 0);
      if (boost === 0) continue;
      player[stat] += boost;
      applied.push(`${boost > 0 ? '+' : ''}${boost} ${stat}`);
    }

    session.battleLog.push(
      `${player.name} used ${result.itemName}!` + (applied.length ? ` ${applied.join(' | ')}` : ''),
    );
    await this.endOfTurn(session, signal);
  }

  private async playerUltimate(session: BattleSession, signal?: AbortSignal): Promise<void> {
    const { player, monster } = session;
    const cost = this.config.get().ultimateSpCost;

    if (player.currentSP < cost) {
      throw new ValidationFailure(
        'INSUFFICIENT_SP',
        `Not enough SP! Need ${cost}, have ${player.currentSP}`,
        { required: cost, available: player.currentSP },
      );
    }
    const ultimate = await this.collaborate('Character store', () =>
      this.characters.getUltimateInfo(session.actorId),
    );
    if (!ultimate) {
      throw new ValidationFailure('NO_ULTIMATE', 'No ultimate ability available');
    }

    const spent = player.currentSP;
    player.currentSP = 0;

    const rng = this.rng.forTurn(session.rngSeed, session.turn, 'ULTIMATE');
    const base = this.effective(player).attack * ULTIMATE_ATTACK_FACTOR;
    const crit = rng.next() < player.luck / 100;
    const damage = crit ? Math.trunc(base * ULTIMATE_CRIT_MULTIPLIER) : base;

    const absorbed = this.applyDamage(monster, damage);
    session.battleLog.push(
      `${player.name} uses ${ultimate.name}!` +
        (crit ? ' CRITICAL HIT!' : '') +
        ` ${damage} damage!` +
        (absorbed > 0 ? ` (${absorbed} absorbed by shield)` : ''),
    );
    await this.bestEffort('SP sync', session.actorId, () =>
      this.characters.restoreSP(session.actorId, -spent),
    );

    if (monster.currentHP <= 0) {
      return this.endBattle(session, 'player');
    }
    await this.endOfTurn(session, signal);
  }

  // --- turn advance ---

  /** Cooldowns, status tick, DoT deaths, monster counter, turn increment. */
  private async endOfTurn(session: BattleSession, signal?: AbortSignal): Promise<void> {
    const { player, monster } = session;

    for (const [skillId, left] of Object.entries(player.cooldowns)) {
      if (left > 0) player.cooldowns[skillId] = left - 1;
    }

    this.status.tickStatuses(session);
    if (player.currentHP <= 0) {
      return this.endBattle(session, 'monster');
    }
    if (monster.currentHP <= 0) {
      return this.endBattle(session, 'player');
    }

    await this.monsterTurn(session, signal);
    if (session.status === 'active') session.turn++;
  }

  /**
   * Style, hit, damage and crit are drawn before the presenter pause, so
   * cancelling or skipping the pause cannot change the result.
   */
  private async monsterTurn(session: BattleSession, signal?: AbortSignal): Promise<void> {
    const { player, monster } = session;

    if (this.status.isStunned(monster.statuses)) {
      session.battleLog.push(`${monster.name} is stunned and cannot act!`);
      return;
    }

    const rng = this.rng.forTurn(session.rngSeed, session.turn, 'MONSTER');
    const p = this.effective(player);
    const m = this.effective(monster);

    const style = this.ai.chooseAttackStyle(monster, player, rng);
    const { power, accuracy } = this.ai.styleModifier(style, m.accuracy);
    const hit = this.hit.hitRoll(rng, accuracy, p.evasion);
    let damage = 0;
    let crit = false;
    if (hit.outcome !== 'miss') {
      let base = this.damage.physicalDamage(rng, power, m.attack, p.defense, 0);
      crit = this.hit.critRoll(rng, monster.critBase, monster.luck);
      if (crit) base = roundHalfEven(base * monster.critDamageMultiplier);
      damage = roundHalfEven(base * hit.damageMultiplier);
    }

    const narration = this.ai.narrate(
      monster,
      player,
      session.turn,
      this.rng.forTurn(session.rngSeed, session.turn, 'NARRATION'),
    );
    session.battleLog.push(...narration);
    await this.present(session, { style, narration }, signal);

    const styleLine = this.ai.styleLine(style, monster.name);
    if (styleLine) session.battleLog.push(styleLine);

    const absorbed = this.applyDamage(player, damage);
    session.battleLog.push(strikeLine(monster.name, player.name, damage - absorbed, absorbed, crit, hit));

    if (player.currentHP <= 0) {
      await this.endBattle(session, 'monster');
    }
  }

  // --- termination ---

  private async endBattle(session: BattleSession, winner: FinalWinner): Promise<void> {
    if (session.status === 'completed') {
      throw new InternalInconsistency('Battle already completed', { battleId: session.battleId });
    }
    session.status = 'completed';
    session.winner = winner;
    session.endedAt = new Date().toISOString();

    switch (winner) {
      case 'player': {
        const { xpReward: xp, goldReward: gold } = session.monster;
        session.rewards = { xp, gold };
        session.battleLog.push(`Victory! +${xp} XP, +${gold} Gold`);
        await this.bestEffort('XP grant', session.actorId, () =>
          this.characters.addXP(session.actorId, xp),
        );
        await this.bestEffort('Gold grant', session.actorId, () =>
          this.characters.addGold(session.actorId, gold),
        );
        await this.bestEffort('Companion loot', session.actorId, () => this.companionLoot(session));
        break;
      }
      case 'monster':
        session.battleLog.push('Defeat! Better luck next time.');
        break;
      case 'fled':
        session.battleLog.push('You escaped the battle.');
        break;
    }

    this.logger.log(`Battle ${session.battleId} ended: ${winner} on turn ${session.turn}`);
  }

  /** chance = min(0.35, 0.05 * hunting points) of one random catalogue item */
  private async companionLoot(session: BattleSession): Promise<void> {
    const character = await this.characters.getPlayer(session.actorId);
    const hunting = Math.trunc(character?.companionSkills?.hunting ?? 0);
    if (hunting <= 0) return;

    const rng = this.rng.forTurn(session.rngSeed, session.turn, 'LOOT');
    if (rng.next() >= Math.min(0.35, 0.05 * hunting)) return;

    const catalogue = await this.inventory.loadItemCatalogue();
    const itemId = rng.pick(Object.keys(catalogue));
    if (itemId === undefined) return;

    await this.inventory.addItem(session.actorId, itemId, 1);
    session.battleLog.push(`Companion found extra loot: ${catalogue[itemId]?.name ?? itemId}`);
  }

  /** Persists the flee penalty; resolves to what was actually taken, or null when nothing was saved. */
  private async applyFleePenalty(
    session: BattleSession,
    hpPenalty: number,
  ): Promise<{ gold: number; hp: number } | null> {
    let taken: { gold: number; hp: number } | null = null;
    await this.bestEffort('Flee penalty', session.actorId, async () => {
      const character = await this.characters.getPlayer(session.actorId);
      if (!character) {
        throw new Error('character not found');
      }
      const gold = Math.min(Math.max(0, character.gold), Math.max(1, Math.floor(character.gold / 20)));
      const currentHP = Math.max(1, session.player.currentHP - hpPenalty);
      await this.characters.saveCharacter(session.actorId, {
        ...character,
        gold: Math.max(0, character.gold - gold),
        currentHP,
      });
      taken = { gold, hp: session.player.currentHP - currentHP };
    });
    return taken;
  }

  // --- helpers ---

  private effective(entity: CombatantSnapshot): EffectiveStats {
    return this.stats.effectiveStats(entity, this.status.getModifiers(entity.statuses)).stats;
  }

  /** Shield first, remainder to HP (floor 0). Returns the absorbed amount. */
  private applyDamage(target: CombatantSnapshot, raw: number): number {
    const absorbed = Math.min(target.shield, raw);
    target.shield -= absorbed;
    target.currentHP = Math.max(0, target.currentHP - (raw - absorbed));
    return absorbed;
  }

  private async present(
    session: BattleSession,
    intent: MonsterIntent,
    signal?: AbortSignal,
  ): Promise<void> {
    try {
      await this.presenter.beforeMonsterAction(session, intent, signal);
    } catch (err) {
      this.logger.warn(`Presenter hook failed for ${session.battleId}: ${describe(err)}`);
    }
  }

  private async collaborate<T>(what: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw new CollaboratorFailure('COLLABORATOR_UNAVAILABLE', `${what} unavailable`, {
        cause: describe(err),
      });
    }
  }

  /** Combat state is never rolled back for a persistence error. */
  private async bestEffort(what: string, actorId: string, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (err) {
      this.logger.warn(`${what} failed for ${actorId}: ${describe(err)}`);
    }
  }

  private assertConsistent(session: BattleSession): void {
    for (const entity of [session.player, session.monster]) {
      const ok =
        entity.currentHP >= 0 &&
        entity.currentHP <= entity.maxHP &&
        entity.currentSP >= 0 &&
        entity.currentSP <= entity.maxSP &&
        entity.shield >= 0;
      if (!ok) {
        throw new InternalInconsistency(`${entity.name} left an out-of-range resource`, {
          battleId: session.battleId,
          hp: entity.currentHP,
          sp: entity.currentSP,
          shield: entity.shield,
        });
      }
    }
  }

  private nextBattleId(actorId: string, now: Date): string {
    const base = `${actorId}_${Math.floor(now.getTime() / 1000)}`;
    let battleId = base;
    for (let n = 1; this.registry.has(battleId); n++) {
      battleId = `${base}_${n}`;
    }
    return battleId;
  }

  private success(
    session: BattleSession,
    action: ActionSuccess['action'],
    mark: number,
  ): ActionSuccess {
    return {
      success: true,
      action,
      events: session.battleLog.slice(mark),
      battle: toSnapshot(session, this.config.get().logTail),
    };
  }
}

function fleeLine(taken: { gold: number; hp: number } | null): string {
  const losses: string[] = [];
  if (taken && taken.gold > 0) losses.push(`${taken.gold} gold`);
  if (taken && taken.hp > 0) losses.push(`${taken.hp} HP`);
  return losses.length > 0
    ? `You fled successfully! Lost ${losses.join(' and ')} as penalty!`
    : 'You fled successfully!';
}

function strikeLine(
  attacker: string,
  defender: string,
  dealt: number,
  absorbed: number,
  crit: boolean,
  hit: HitResult,
): string {
  const bits = [`${hit.outcome.toUpperCase()} (p=${hit.pHit.toFixed(2)})`];
  if (absorbed > 0) bits.push(`${absorbed} absorbed`);
  return `${attacker} → ${defender}: ${dealt} dmg${crit ? ' (CRIT)' : ''} | ${bits.join('; ')}`;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
