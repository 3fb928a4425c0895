import { ClassConstructor } from 'class-transformer';
import { CorruptStateException } from '../exceptions/base.exception';
import { transformAndValidate } from '../validation/validate-dto';
import { RecordCodec } from './json-record.store';

/**
 * Builds a record codec that validates the stored JSON against a
 * class-validator DTO before mapping it to the in-memory value.
 */
export function createDtoCodec<D extends object, T>(
  dto: ClassConstructor<D>,
  mapping: {
    toValue: (record: D) => T;
    toRecord: (value: T) => D;
  },
): RecordCodec<T> {
  return {
    decode(raw: unknown, record: string): T {
      const result = transformAndValidate(dto, raw);
      if (!result.ok) {
        throw new CorruptStateException(record, result.errors.join('; '));
      }
      return mapping.toValue(result.value);
    },
    encode(value: T): unknown {
      return mapping.toRecord(value);
    },
  };
}
