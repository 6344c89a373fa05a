import { z } from 'zod';

// Blank strings become undefined so downstream code only checks presence.
const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

export const variantFlagSchema = z.enum(['japanese', 'first-edition', 'holo', 'reverse-holo', 'shadowless']);

export const cardIdentitySchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  englishName: optionalText,
  setName: optionalText,
  cardNumber: optionalText,
  rarity: optionalText,
  variants: z
    .array(variantFlagSchema)
    .default([])
    .transform((flags) => [...new Set(flags)]),
});

export const appraisalRequestSchema = z.object({
  identity: cardIdentitySchema,
  forceRefresh: z.boolean().default(false),
});

export const compareRequestSchema = appraisalRequestSchema.extend({
  listedPrice: z.number().nonnegative(),
});
