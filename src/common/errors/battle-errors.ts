// Failure taxonomy for battle actions. Handlers throw these before mutating;
// BattleErrorFilter turns them into ActionFailure results.

export const FAILURE_KIND = ['VALIDATION', 'COLLABORATOR', 'INTERNAL'] as const;
export type FailureKind = (typeof FAILURE_KIND)[number];

export type ValidationCode =
  | 'INVALID_ACTION'
  | 'INVALID_MONSTER'
  | 'BATTLE_NOT_FOUND'
  | 'NOT_YOUR_BATTLE'
  | 'BATTLE_NOT_ACTIVE'
  | 'ALREADY_IN_BATTLE'
  | 'SKILL_UNKNOWN'
  | 'SKILL_ON_COOLDOWN'
  | 'INSUFFICIENT_SP'
  | 'NO_ULTIMATE';

export type CollaboratorCode =
  | 'CHARACTER_NOT_FOUND'
  | 'SKILL_NOT_FOUND'
  | 'ITEM_USE_FAILED'
  | 'COLLABORATOR_UNAVAILABLE';

export type FailureCode = ValidationCode | CollaboratorCode | 'INTERNAL';

export class BattleError extends Error {
  constructor(
    public readonly kind: FailureKind,
    public readonly code: FailureCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'BattleError';
  }
}

/** Caller mistake or missing resource; nothing was mutated. */
export class ValidationFailure extends BattleError {
  constructor(
    code: ValidationCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super('VALIDATION', code, message, details);
    this.name = 'ValidationFailure';
  }
}

/** Character, inventory or skill lookup failed or was unavailable. */
export class CollaboratorFailure extends BattleError {
  constructor(
    code: CollaboratorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super('COLLABORATOR', code, message, details);
    this.name = 'CollaboratorFailure';
  }
}

export class InternalInconsistency extends BattleError {
  constructor(message = 'Internal inconsistency', details?: Record<string, unknown>) {
    super('INTERNAL', 'INTERNAL', message, details);
    this.name = 'InternalInconsistency';
  }
}
