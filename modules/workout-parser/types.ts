import { z } from 'zod';

export const strokeSchema = z.enum(['freestyle', 'backstroke', 'breaststroke', 'butterfly', 'im', 'choice']);
export type Stroke = z.infer<typeof strokeSchema>;

export const modeSchema = z.enum(['swim', 'kick', 'pull', 'drill', 'scull', 'technique']);
export type Mode = z.infer<typeof modeSchema>;

export const intervalKindSchema = z.enum(['sendoff', 'rest', 'none']);
export type IntervalKind = z.infer<typeof intervalKindSchema>;

export const effortSchema = z.enum([
  'easy',
  'cruise',
  'moderate',
  'fast',
  'sprint',
  'descend',
  'ascend',
  'build',
  'negativeSplit',
  'evenPace',
  'bestAverage',
  'holdPace',
  'racePace',
  'threshold',
]);
export type Effort = z.infer<typeof effortSchema>;

export const SECTION_LABELS = ['Warmup', 'Pre-Set', 'Main Set', 'Post-Set / Technique', 'Cooldown'] as const;
export type SectionLabel = (typeof SECTION_LABELS)[number];

export const DEFAULT_SECTION_LABEL: SectionLabel = 'Main Set';

export const workoutLineSchema = z
  .object({
    id: z.string().min(1),
    reps: z.number().int().positive().nullable(),
    distance: z.number().int().min(0).nullable(),
    stroke: strokeSchema.nullable(),
    mode: modeSchema.nullable(),
    intervalSeconds: z.number().int().min(0).nullable(),
    intervalKind: intervalKindSchema,
    effort: effortSchema.nullable(),
    text: z.string(),
    yardageOverride: z.number().int().min(0).nullable(),
  })
  .strict();
export type WorkoutLine = z.infer<typeof workoutLineSchema>;

export const workoutSetSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().nullable(),
    repeatCount: z.number().int().min(1),
    lines: z.array(workoutLineSchema),
  })
  .strict();
export type WorkoutSet = z.infer<typeof workoutSetSchema>;

export const workoutSectionSchema = z
  .object({
    id: z.string().min(1),
    label: z.string(),
    sets: z.array(workoutSetSchema),
  })
  .strict();
export type WorkoutSection = z.infer<typeof workoutSectionSchema>;

export type ParseResult = {
  sections: WorkoutSection[];
  title: string | null;
  warnings: string[];
};

export type CreateId = () => string;

/** Fields a caller may leave out when building a line by hand. */
export type WorkoutLineInput = Partial<Omit<WorkoutLine, 'id'>>;

export function buildWorkoutLine(id: string, input: WorkoutLineInput = {}): WorkoutLine {
  return {
    id,
    reps: input.reps ?? null,
    distance: input.distance ?? null,
    stroke: input.stroke ?? null,
    mode: input.mode ?? null,
    intervalSeconds: input.intervalSeconds ?? null,
    intervalKind: input.intervalKind ?? 'none',
    effort: input.effort ?? null,
    text: input.text ?? '',
    yardageOverride: input.yardageOverride ?? null,
  };
}
