import { Injectable, Logger } from '@nestjs/common';
import { BattleError } from '../errors/battle-errors.js';
import type { FailureCode, FailureKind } from '../errors/battle-errors.js';

export interface ActionFailure {
  success: false;
  kind: FailureKind;
  code: FailureCode;
  reason: string;
  details: Record<string, unknown> | null;
}

@Injectable()
export class BattleErrorFilter {
  private readonly logger = new Logger(BattleErrorFilter.name);

  catch(exception: unknown): ActionFailure {
    if (exception instanceof BattleError) {
      if (exception.kind === 'INTERNAL') {
        this.logger.error(`${exception.code}: ${exception.message}`);
      }
      return {
        success: false,
        kind: exception.kind,
        code: exception.code,
        reason: exception.message,
        details: exception.details ?? null,
      };
    }

    this.logger.error(
      `Unhandled exception in battle action: ${String(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );
    return {
      success: false,
      kind: 'INTERNAL',
      code: 'INTERNAL',
      reason: 'Internal battle error',
      details: null,
    };
  }
}
