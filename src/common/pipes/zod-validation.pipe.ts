import type { PipeTransform, ArgumentMetadata } from '@nestjs/common';
import { Injectable } from '@nestjs/common';
import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { InvalidInputError } from '../errors/api-errors.js';

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/** Validates the argument against a zod schema and hands on the parsed output. */
@Injectable()
export class ZodValidationPipe<TOutput> implements PipeTransform<unknown, TOutput> {
  constructor(private readonly schema: ZodType<TOutput, ZodTypeDef, unknown>) {}

  transform(value: unknown, metadata: ArgumentMetadata): TOutput {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      throw new InvalidInputError(`Invalid request ${metadata.type}`, {
        issues: result.error.issues.map(formatIssue),
      });
    }
    return result.data;
  }
}
