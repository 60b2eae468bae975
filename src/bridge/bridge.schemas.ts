import { z } from 'zod';

export const variantSchema = z.object({
  fileId: z.string().min(1),
  height: z.number().int().positive().optional(),
  fileSize: z.number().nonnegative().optional(),
});

// Platform message ids arrive as numbers; the pipeline keys on strings
const idSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

export const relocatedSchema = z.object({
  stagingId: idSchema,
  variants: z.array(variantSchema).default([]),
});

export const parkedSchema = z.object({
  parkedHandle: idSchema,
});

export const probeSchema = z.object({
  variants: z.array(variantSchema).default([]),
});

export const deliveredSchema = z.object({
  sent: z.number().int().nonnegative(),
});

export const planSchema = z.object({
  premium: z.boolean(),
});
