import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { InconsistentStateError } from '../errors/inconsistent-state.error';

function summarize(errors: ValidationError[]): string {
  return errors
    .map((error) => {
      const constraints = Object.values(error.constraints ?? {});
      return `${error.property}: ${constraints.join(', ') || 'invalid'}`;
    })
    .join('; ');
}

/**
 * Validate raw reference rows against a DTO class.
 * Any invalid row rejects the whole set: reference data is all-or-nothing.
 */
export function validateRecords<T extends object>(
  dto: ClassConstructor<T>,
  rows: unknown[],
  source: string
): T[] {
  return rows.map((row, index) => {
    if (typeof row !== 'object' || row === null) {
      throw new InconsistentStateError(
        `${source}[${index}]: expected an object`,
        'INVALID_REFERENCE_DATA'
      );
    }

    const instance = plainToInstance(dto, row);
    const errors = validateSync(instance, { forbidUnknownValues: true });
    if (errors.length > 0) {
      throw new InconsistentStateError(
        `${source}[${index}]: ${summarize(errors)}`,
        'INVALID_REFERENCE_DATA'
      );
    }

    return instance;
  });
}
