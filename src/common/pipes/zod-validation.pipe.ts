import type { PipeTransform, ArgumentMetadata } from '@nestjs/common';
import { Injectable } from '@nestjs/common';
import type { ZodSchema } from 'zod';
import { InvalidInputError } from '../errors/api-errors.js';

@Injectable()
export class ZodValidationPipe implements PipeTransform {
  constructor(private readonly schema: ZodSchema) {}

  transform(value: unknown, metadata: ArgumentMetadata): unknown {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      const formatted = result.error.issues.map((i) =>
        i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message,
      );
      throw new InvalidInputError('Validation failed', {
        in: metadata.type,
        issues: formatted,
      });
    }
    return result.data;
  }
}
