import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { ValidationException } from '../exceptions/base.exception';

/**
 * Flattens class-validator errors into "field: constraint" lines
 */
export function describeValidationErrors(errors: ValidationError[]): string[] {
  const lines: string[] = [];
  for (const error of errors) {
    for (const message of Object.values(error.constraints ?? {})) {
      lines.push(message);
    }
    if (error.children?.length) {
      lines.push(...describeValidationErrors(error.children));
    }
  }
  return lines;
}

export type DtoResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[]; field?: string };

/**
 * Transforms a plain object into a DTO instance and validates it
 * the way the global ValidationPipe would.
 */
export function transformAndValidate<T extends object>(
  cls: ClassConstructor<T>,
  plain: unknown,
): DtoResult<T> {
  if (typeof plain !== 'object' || plain === null || Array.isArray(plain)) {
    return { ok: false, errors: ['value must be an object'] };
  }
  const instance = plainToInstance(cls, plain);
  const errors = validateSync(instance, {
    whitelist: true,
    forbidUnknownValues: true,
  });
  if (errors.length > 0) {
    return {
      ok: false,
      errors: describeValidationErrors(errors),
      field: errors[0].property,
    };
  }
  return { ok: true, value: instance };
}

/**
 * Like transformAndValidate, but throws a ValidationException on failure
 */
export function validateOrThrow<T extends object>(
  cls: ClassConstructor<T>,
  plain: unknown,
): T {
  const result = transformAndValidate(cls, plain);
  if (!result.ok) {
    throw new ValidationException(result.errors.join('; '), result.field);
  }
  return result.value;
}
