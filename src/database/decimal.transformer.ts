import { ValueTransformer } from 'typeorm';

// pg devuelve numeric como string; sqlite como number. Normalizamos a number.
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value)),
};
