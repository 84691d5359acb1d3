// Contracts the battle core consumes; hosts bind implementations through BattleModule.forRoot

import type { MonsterEntry } from '../content/content.types.js';
import type { CombatStat, SkillType } from '../types/index.js';

export const CHARACTER_STORE = Symbol('CHARACTER_STORE');
export const INVENTORY_STORE = Symbol('INVENTORY_STORE');
export const BATTLE_PRESENTER = Symbol('BATTLE_PRESENTER');

/** Persistent character as the store keeps it. Only the fields the core touches are typed. */
export interface CharacterRecord {
  name: string;
  currentHP: number;
  gold: number;
  skills: string[];
  /** companion skill points by tree (attack, defense, hunting, ...) */
  companionSkills?: Record<string, number>;
}

/** Derived stats map; any missing stat takes the combatant default. */
export type DerivedStats = Partial<{
  maxHP: number;
  maxSP: number;
  currentSP: number;
  attack: number;
  defense: number;
  speed: number;
  intelligence: number;
  luck: number;
  agility: number;
  accuracy: number;
  evasion: number;
  penetration: number;
  critBase: number;
  critDamageMultiplier: number;
}>;

export interface SkillEffect {
  statusId: string;
  duration?: number;
}

export interface SkillInfo {
  name: string;
  spCost: number;
  power: number;
  multiplier: number;
  type: SkillType;
  /** turns before the skill can be used again */
  cooldown: number;
  effects: SkillEffect[];
}

export interface UltimateInfo {
  name: string;
}

export interface CharacterStore {
  getPlayer(actorId: string): Promise<CharacterRecord | null>;
  saveCharacter(actorId: string, record: CharacterRecord): Promise<void>;
  addXP(actorId: string, amount: number): Promise<void>;
  addGold(actorId: string, amount: number): Promise<void>;
  getDerivedStats(character: CharacterRecord): Promise<DerivedStats>;
  getSkillInfo(skillId: string): Promise<SkillInfo | null>;
  restoreSP(actorId: string, delta: number): Promise<void>;
  getUltimateInfo(actorId: string): Promise<UltimateInfo | null>;
}

export interface ItemEffects {
  healHP?: number;
  restoreSP?: number;
  shield?: number;
  /** flat additions to the in-battle snapshot */
  statBoosts?: Partial<Record<CombatStat, number>>;
}

export type ItemUseResult =
  | { success: true; itemName: string; effects: ItemEffects }
  | { success: false; reason: string };

export interface ItemDefinition {
  name: string;
  rarity?: string;
}

export interface InventoryStore {
  useItem(actorId: string, itemId: string, quantity: number): Promise<ItemUseResult>;
  addItem(actorId: string, itemId: string, quantity: number): Promise<void>;
  loadItemCatalogue(): Promise<Record<string, ItemDefinition>>;
}

export interface MonsterProvider {
  getMonster(monsterId: string): MonsterEntry | undefined;
  listMonsters(): MonsterEntry[];
}
