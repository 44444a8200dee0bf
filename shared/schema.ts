import { z } from "zod";

export const fieldMappingSchema = z.object({
  x: z.string().min(1),
  y: z.string().min(1),
  z: z.string().min(1),
  group: z.string().min(1).optional(),
});

// NaN is dropped along with the other non-finite thresholds, not rejected
export const breakSetSchema = z.array(z.union([z.number(), z.nan()]));

export const breakGeneratorSchema = z.custom<(range: [number, number], binwidth?: number) => number[]>(
  (value) => typeof value === "function",
  { message: "Expected a break generator function" },
);

export const contourFillOptionsSchema = z.object({
  mapping: fieldMappingSchema,
  // explicit thresholds or a generator called with the field's range
  breaks: z.union([breakSetSchema, breakGeneratorSchema]),
  binwidth: z.number().positive().finite().optional(),
  // resolved separately so an unknown policy surfaces as its own error
  naFill: z.unknown().optional(),
  exclude: z.array(z.number()).optional(),
});

export const tanakaOptionsSchema = z.object({
  lightAngle: z.number().finite().optional(),
  range: z.tuple([z.number().nonnegative(), z.number().nonnegative()]).optional(),
});

export type FieldMappingInput = z.infer<typeof fieldMappingSchema>;
export type ContourFillOptionsInput = z.input<typeof contourFillOptionsSchema>;
export type TanakaOptionsInput = z.infer<typeof tanakaOptionsSchema>;
