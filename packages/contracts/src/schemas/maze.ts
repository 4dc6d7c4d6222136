import { z } from "zod";

const UINT32_MAX = 0xffffffff;

/** Smallest side that still fits a border, a room and one corridor ring. */
export const MIN_MAZE_DIMENSION = 7;

/** Valid sides grow in steps of four so the center stays on the carving lattice. */
export const MAZE_DIMENSION_STEP = 4;

export const EXIT_SIDES = ["left", "right", "top", "bottom"] as const;

export const ExitSideSchema = z.enum(EXIT_SIDES);
export const ExitSideOptionSchema = z.enum([
  "left",
  "right",
  "top",
  "bottom",
  "random",
]);

const FiniteNumber = z
  .number()
  .refine(Number.isFinite, { message: "Must be a finite number" });

/**
 * Loose input accepted by the config builder before normalization.
 */
export const MazeConfigInputSchema = z.object({
  width: FiniteNumber.optional(),
  height: FiniteNumber.optional(),
  roomSize: FiniteNumber.optional(),
  exitSide: ExitSideOptionSchema.optional(),
  fillRatio: z.number().optional(),
  seed: z
    .number()
    .int("Seed must be an integer")
    .min(0, { message: "Seed must be non-negative" })
    .max(UINT32_MAX, { message: "Seed must fit in uint32" })
    .optional(),
});

const DimensionSchema = z
  .number()
  .int("Dimension must be an integer")
  .min(MIN_MAZE_DIMENSION)
  .refine((dim) => (dim - MIN_MAZE_DIMENSION) % MAZE_DIMENSION_STEP === 0, {
    message: "Dimension must be 7 plus a multiple of 4",
  });

/**
 * Fully normalized maze configuration.
 */
export const MazeConfigSchema = z
  .object({
    width: DimensionSchema,
    height: DimensionSchema,
    roomSize: z.number().int().min(1, { message: "Room size must be at least 1" }),
    exitSide: ExitSideOptionSchema,
    fillRatio: z.number().min(0).max(1),
    seed: z.number().int().min(0).max(UINT32_MAX).optional(),
  })
  .superRefine((data, ctx) => {
    const half = Math.floor(data.roomSize / 2);
    const maxHalf =
      Math.min(Math.floor(data.width / 2), Math.floor(data.height / 2)) - 1;
    if (half > maxHalf) {
      ctx.addIssue({
        code: "custom",
        message: "Central room does not fit inside the border",
        path: ["roomSize"],
      });
    }
  });

export type ExitSide = z.infer<typeof ExitSideSchema>;
export type ExitSideOption = z.infer<typeof ExitSideOptionSchema>;
export type MazeConfigInput = z.input<typeof MazeConfigInputSchema>;
export type MazeConfig = z.infer<typeof MazeConfigSchema>;
