import type { PipeTransform, ArgumentMetadata } from '@nestjs/common';
import { Injectable } from '@nestjs/common';
import type { ZodType, ZodTypeDef } from 'zod';
import { InvalidInputError } from '../errors/router-errors.js';

@Injectable()
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  transform(value: unknown, _metadata?: ArgumentMetadata): T {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      const formatted = result.error.issues.map(
        (i) => `${i.path.join('.')}: ${i.message}`,
      );
      throw new InvalidInputError('Validation failed', {
        issues: formatted,
      });
    }
    return result.data;
  }
}
