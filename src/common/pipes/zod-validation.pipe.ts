import type { PipeTransform } from '@nestjs/common';
import type { z, ZodTypeAny } from 'zod';
import { ValidationFailure, type ValidationCode } from '../errors/battle-errors.js';

export class ZodValidationPipe<S extends ZodTypeAny> implements PipeTransform<unknown, z.infer<S>> {
  constructor(
    private readonly schema: S,
    private readonly code: ValidationCode = 'INVALID_ACTION',
  ) {}

  transform(value: unknown): z.infer<S> {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      const formatted = result.error.issues.map(
        (i) => `${i.path.join('.')}: ${i.message}`,
      );
      throw new ValidationFailure(this.code, 'Validation failed', {
        issues: formatted,
      });
    }
    return result.data;
  }
}
