import { ValueTransformer } from 'typeorm';

/**
 * pg returns bigint columns as strings; amounts are always safe integers
 */
export const bigintTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) =>
    value === null ? null : Number(value),
};
