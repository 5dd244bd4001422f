import { z } from 'zod';

/** Upstreams send numbers as JSON numbers or as numeric strings. */
export const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

/** Missing, null, empty or non-numeric values all become `null`. */
export const nullableNumber = z.unknown().transform((value): number | null => {
  const parsed = numeric.safeParse(value);
  return parsed.success ? parsed.data : null;
});

export const nullableString = z
  .string()
  .nullish()
  .transform((value) => (value ? value : null));
