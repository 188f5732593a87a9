import { applyDecorators } from '@nestjs/common';
import { IsDateString, Matches } from 'class-validator';
import { Transform, TransformFnParams } from 'class-transformer';

// Query string -> boolean ('true'/'1' => true, 'false'/'0' => false).
// Se lee el valor crudo: la conversión implícita convertiría 'false' en true.
export const ToBoolean = () =>
  Transform(({ obj, key }: TransformFnParams) => {
    const raw: unknown = Reflect.get(obj, key);
    if (raw === true || raw === 'true' || raw === '1') return true;
    if (raw === false || raw === 'false' || raw === '0') return false;
    return raw;
  });

// Fecha de calendario 'YYYY-MM-DD'
export const IsIsoDate = () =>
  applyDecorators(
    Matches(/^\d{4}-\d{2}-\d{2}$/, { message: ({ property }) => `${property} debe tener formato YYYY-MM-DD` }),
    IsDateString(),
  );
