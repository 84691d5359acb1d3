import { z } from 'zod';

export const BattleActionSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('attack') }),
  z.object({ action: z.literal('defend') }),
  z.object({ action: z.literal('flee') }),
  z.object({ action: z.literal('skill'), skillId: z.string().min(1) }),
  z.object({ action: z.literal('item'), itemId: z.string().min(1) }),
  z.object({ action: z.literal('ultimate') }),
]);

export type BattleAction = z.infer<typeof BattleActionSchema>;
