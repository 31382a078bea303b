import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import { workoutSectionSchema, type CreateId, type ParseResult, type WorkoutSection } from '../types';

export const PRACTICE_TEMPLATE_SCHEMA_VERSION = 2;

export const practiceTagSchema = z.enum(['Sprint', 'Distance', 'IM', 'Recovery', 'Threshold', 'Skills']);
export type PracticeTag = z.infer<typeof practiceTagSchema>;

export const practiceTemplateSchema = z
  .object({
    schemaVersion: z.literal(PRACTICE_TEMPLATE_SCHEMA_VERSION),
    id: z.string().min(1),
    title: z.string(),
    notes: z.string().nullable(),
    poolInfo: z.string().nullable(),
    tag: practiceTagSchema.nullable(),
    sections: z.array(workoutSectionSchema),
    rawText: z.string().nullable(),
    createdAt: z.string().datetime(),
    lastEditedAt: z.string().datetime(),
  })
  .strict();
export type PracticeTemplate = z.infer<typeof practiceTemplateSchema>;

export type PracticeTemplateInput = {
  title: string;
  sections: WorkoutSection[];
  notes?: string | null;
  poolInfo?: string | null;
  tag?: PracticeTag | null;
  rawText?: string | null;
};

export function practiceTagFromString(value: string | null | undefined): PracticeTag | null {
  const raw = String(value ?? '').trim();
  if (!raw) return null;

  const exact = practiceTagSchema.safeParse(raw);
  if (exact.success) return exact.data;

  const lower = raw.toLowerCase();
  if (lower.includes('sprint')) return 'Sprint';
  if (lower.includes('distance')) return 'Distance';
  if (lower.includes('im')) return 'IM';
  if (lower.includes('recovery')) return 'Recovery';
  if (lower.includes('threshold')) return 'Threshold';
  if (lower.includes('skills') || lower.includes('drill')) return 'Skills';
  return null;
}

export function createPracticeTemplate(
  input: PracticeTemplateInput,
  options: { createId?: CreateId; now?: Date } = {}
): PracticeTemplate {
  const createId = options.createId ?? randomUUID;
  const timestamp = (options.now ?? new Date()).toISOString();
  return {
    schemaVersion: PRACTICE_TEMPLATE_SCHEMA_VERSION,
    id: createId(),
    title: input.title.trim(),
    notes: input.notes?.trim() || null,
    poolInfo: input.poolInfo?.trim() || null,
    tag: input.tag ?? null,
    sections: input.sections,
    rawText: input.rawText ?? null,
    createdAt: timestamp,
    lastEditedAt: timestamp,
  };
}

/** Text mode: the parsed sections replace the template's, and a parsed title wins. */
export function applyParseResultToTemplate(
  template: PracticeTemplate,
  result: ParseResult,
  rawText: string,
  now: Date = new Date()
): PracticeTemplate {
  return {
    ...template,
    title: result.title ?? template.title,
    sections: result.sections,
    rawText,
    lastEditedAt: now.toISOString(),
  };
}
