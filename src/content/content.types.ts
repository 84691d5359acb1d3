// Monster catalogue entries (content/monsters.json)

import { z } from 'zod';

/** Fields a monster definition may omit fall back to these defaults. */
export const MonsterDefinitionSchema = z.object({
  name: z.string().min(1),
  hp: z.number().int().positive().default(10),
  attack: z.number().int().min(0).default(1),
  defense: z.number().int().min(0).default(0),
  level: z.number().int().min(1).default(1),
  xpReward: z.number().int().min(0).default(10),
  goldReward: z.number().int().min(0).default(5),
  accuracy: z.number().int().min(0).default(50),
  evasion: z.number().int().min(0).default(10),
});

export type MonsterDefinition = z.infer<typeof MonsterDefinitionSchema>;
/** What a caller may hand to startBattle before defaults are filled in. */
export type MonsterDefinitionInput = z.input<typeof MonsterDefinitionSchema>;

export const MonsterEntrySchema = MonsterDefinitionSchema.extend({
  monsterId: z.string().min(1),
  description: z.string().default(''),
});

export type MonsterEntry = z.infer<typeof MonsterEntrySchema>;

export const MonsterCatalogueSchema = z.array(MonsterEntrySchema);
