import type { ValueTransformer } from 'typeorm';

/** pg returns bigint columns as strings; remote ids fit in a JS number. */
export const bigintNumber: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value)),
};
