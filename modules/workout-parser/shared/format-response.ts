import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import { fromZodError } from '@/lib/errors';

import { summarizeWorkout } from '../lib/yardage';
import { buildWorkoutLine, modeSchema, type CreateId, type Effort, type Stroke, type WorkoutSection, type WorkoutSet } from '../types';

// Shape returned by the text-formatting backend.
const formatStrokeSchema = z.enum(['free', 'back', 'breast', 'fly', 'im', 'choice', 'mixed']);

export const formatBlockSchema = z.object({
  displayText: z.string(),
  section: z.enum(['warmup', 'preset', 'main', 'postset', 'cooldown', 'unknown']),
  reps: z.number().int().min(1),
  distance: z.number().int().min(0).nullish(),
  stroke: formatStrokeSchema.nullish(),
  mode: modeSchema.nullish(),
  interval: z.object({
    kind: z.enum(['sendoff', 'rest', 'none']),
    seconds: z.number().int().min(0).nullish(),
  }),
  pattern: z
    .object({
      type: z.string(),
      start: z.number().int().nullish(),
      end: z.number().int().nullish(),
      raw: z.string().nullish(),
    })
    .nullish(),
  equipment: z.array(z.string()),
  notes: z.string(),
});
export type FormatBlock = z.infer<typeof formatBlockSchema>;

export const formatSectionSchema = z.object({
  name: z.enum(['warmup', 'preset', 'main', 'postset', 'cooldown', 'unknown']),
  title: z.string(),
  blocks: z.array(formatBlockSchema),
});

export const formatIssueSchema = z.object({
  lineNumber: z.number().int(),
  lineText: z.string(),
  reason: z.string(),
});
export type FormatIssue = z.infer<typeof formatIssueSchema>;

export const formatWorkoutResponseSchema = z.object({
  sections: z.array(formatSectionSchema),
  issues: z.array(formatIssueSchema),
  normalizedText: z.string(),
});
export type FormatWorkoutResponse = z.infer<typeof formatWorkoutResponseSchema>;

export type MappedFormatResponse = {
  sections: WorkoutSection[];
  normalizedText: string;
  issues: FormatIssue[];
  totalYards: number;
  totalSets: number;
};

const STROKES: Record<z.infer<typeof formatStrokeSchema>, Stroke> = {
  free: 'freestyle',
  back: 'backstroke',
  breast: 'breaststroke',
  fly: 'butterfly',
  im: 'im',
  choice: 'choice',
  mixed: 'freestyle',
};

export function mapFormatPattern(pattern: FormatBlock['pattern']): Effort | null {
  if (!pattern) return null;

  switch (pattern.type.trim().toLowerCase()) {
    case 'evenpace':
    case 'even':
      return 'evenPace';
    case 'descend':
    case 'desc':
      return 'descend';
    case 'build':
      return 'build';
    case 'easy':
      return 'easy';
    case 'cruise':
    case 'aerobic':
      return 'cruise';
    case 'moderate':
    case 'strong':
      return 'moderate';
    case 'fast':
      return 'fast';
    case 'sprint':
      return 'sprint';
    case 'threshold':
      return 'threshold';
    case 'racepace':
    case 'race':
      return 'racePace';
  }

  const raw = pattern.raw?.toLowerCase() ?? '';
  if (raw.includes('easy')) return 'easy';
  if (raw.includes('aerobic') || raw.includes('cruise')) return 'cruise';
  if (raw.includes('threshold')) return 'threshold';
  if (raw.includes('sprint')) return 'sprint';
  if (raw.includes('fast')) return 'fast';
  return null;
}

function mapBlock(block: FormatBlock, createId: CreateId): WorkoutSet {
  const line = buildWorkoutLine(createId(), {
    reps: block.reps,
    distance: block.distance ?? null,
    stroke: block.stroke ? STROKES[block.stroke] : null,
    mode: block.mode ?? null,
    intervalSeconds: block.interval.kind === 'none' ? null : block.interval.seconds ?? null,
    intervalKind: block.interval.kind,
    effort: mapFormatPattern(block.pattern),
    text: block.notes.trim(),
  });
  return { id: createId(), title: null, repeatCount: 1, lines: [line] };
}

/** Validates a formatter response and maps each block to a one-line set. */
export function mapFormatWorkoutResponse(raw: unknown, options: { createId?: CreateId } = {}): MappedFormatResponse {
  const parsed = formatWorkoutResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw fromZodError('INVALID_FORMAT_RESPONSE', 'Formatter response failed validation.', parsed.error);
  }

  const createId = options.createId ?? randomUUID;
  const sections: WorkoutSection[] = parsed.data.sections.map((section) => ({
    id: createId(),
    label: section.title,
    sets: section.blocks.map((block) => mapBlock(block, createId)),
  }));
  const summary = summarizeWorkout(sections);

  return {
    sections,
    normalizedText: parsed.data.normalizedText,
    issues: parsed.data.issues,
    totalYards: summary.totalYards,
    totalSets: summary.totalSets,
  };
}
