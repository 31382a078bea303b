import { z } from 'zod';

import { fromZodError, WorkoutParserError } from '@/lib/errors';

import { parseIntervalString } from '../lib/interval-format';
import {
  PRACTICE_TEMPLATE_SCHEMA_VERSION,
  practiceTagFromString,
  practiceTemplateSchema,
  type PracticeTemplate,
} from '../lib/practice-template';
import {
  effortSchema,
  intervalKindSchema,
  modeSchema,
  strokeSchema,
  type Mode,
  type Stroke,
  type WorkoutLine,
  type WorkoutSection,
} from '../types';

// Seconds between 1970-01-01 and 2001-01-01; older exports stored dates relative to 2001.
const REFERENCE_DATE_OFFSET_SECONDS = 978_307_200;

function fromReferenceSeconds(seconds: number): Date {
  return new Date((seconds + REFERENCE_DATE_OFFSET_SECONDS) * 1000);
}

const legacyTimestampSchema = z.union([
  z.string().datetime({ offset: true }),
  z.number().refine((seconds) => Number.isFinite(fromReferenceSeconds(seconds).getTime()), {
    message: 'Timestamp is out of range',
  }),
]);

// Old builds stored modes (kick, pull, ...) and "other" in the stroke field.
const legacyStrokeSchema = z.union([strokeSchema, modeSchema, z.literal('other')]);

const legacyLineSchema = z.object({
  id: z.string().min(1),
  reps: z.number().int().min(0).nullish(),
  distance: z.number().int().min(0).nullish(),
  stroke: legacyStrokeSchema.nullish(),
  mode: modeSchema.nullish(),
  interval: z.string().nullish(),
  intervalType: z.enum(['interval', 'rest']).nullish(),
  intervalSeconds: z.number().int().min(0).nullish(),
  intervalKind: intervalKindSchema.nullish(),
  effort: effortSchema.nullish(),
  patterns: z.object({ pace: effortSchema.nullish() }).passthrough().nullish(),
  text: z.string(),
  yardageOverride: z.number().int().min(0).nullish(),
});
type LegacyLine = z.infer<typeof legacyLineSchema>;

const legacySetSchema = z.object({
  id: z.string().min(1),
  title: z.string().nullish(),
  repeatCount: z.number().int().min(1).default(1),
  lines: z.array(legacyLineSchema),
});

const legacySectionSchema = z.object({
  id: z.string().min(1),
  label: z.string(),
  sets: z.array(legacySetSchema),
});

const legacyTemplateSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  notes: z.string().nullish(),
  poolInfo: z.string().nullish(),
  tag: z.string().nullish(),
  sections: z.array(legacySectionSchema),
  rawText: z.string().nullish(),
  createdAt: legacyTimestampSchema,
  lastEditedAt: legacyTimestampSchema,
});
type LegacyTemplate = z.infer<typeof legacyTemplateSchema>;

const versionProbeSchema = z.object({ schemaVersion: z.number().int().optional() }).passthrough();

function toIsoTimestamp(value: string | number): string {
  if (typeof value === 'number') return fromReferenceSeconds(value).toISOString();
  return new Date(value).toISOString();
}

function isMode(value: string): value is Mode {
  return modeSchema.safeParse(value).success;
}

function isStroke(value: string): value is Stroke {
  return strokeSchema.safeParse(value).success;
}

/** Most specific keyword first: "drill/swim" is a drill. */
export function inferModeFromText(text: string): Mode | null {
  const lower = text.toLowerCase();
  if (lower.includes('drill')) return 'drill';
  if (lower.includes('kick')) return 'kick';
  if (lower.includes('pull')) return 'pull';
  if (lower.includes('scull')) return 'scull';
  if (lower.includes('technique')) return 'technique';
  if (lower.includes('swim')) return 'swim';
  return null;
}

export function migrateLegacyLine(line: LegacyLine): WorkoutLine {
  const legacyStroke = line.stroke ?? null;
  const stroke = legacyStroke && isStroke(legacyStroke) ? legacyStroke : null;
  const mode = line.mode ?? (legacyStroke && isMode(legacyStroke) ? legacyStroke : inferModeFromText(line.text));

  const intervalSeconds = line.intervalSeconds ?? (line.interval ? parseIntervalString(line.interval) : null);
  const intervalKind =
    line.intervalKind ?? (intervalSeconds != null ? (line.intervalType === 'rest' ? 'rest' : 'sendoff') : 'none');

  return {
    id: line.id,
    reps: line.reps && line.reps > 0 ? line.reps : null,
    distance: line.distance ?? null,
    stroke,
    mode,
    intervalSeconds,
    intervalKind,
    effort: line.effort ?? line.patterns?.pace ?? null,
    text: line.text,
    yardageOverride: line.yardageOverride ?? null,
  };
}

function migrateLegacyTemplate(legacy: LegacyTemplate): PracticeTemplate {
  const sections: WorkoutSection[] = legacy.sections.map((section) => ({
    id: section.id,
    label: section.label,
    sets: section.sets.map((set) => ({
      id: set.id,
      title: set.title ?? null,
      repeatCount: set.repeatCount,
      lines: set.lines.map(migrateLegacyLine),
    })),
  }));

  return {
    schemaVersion: PRACTICE_TEMPLATE_SCHEMA_VERSION,
    id: legacy.id,
    title: legacy.title,
    notes: legacy.notes ?? null,
    poolInfo: legacy.poolInfo ?? null,
    tag: practiceTagFromString(legacy.tag),
    sections,
    rawText: legacy.rawText ?? null,
    createdAt: toIsoTimestamp(legacy.createdAt),
    lastEditedAt: toIsoTimestamp(legacy.lastEditedAt),
  };
}

/**
 * Brings a stored practice template up to the current schema. Documents without
 * a schemaVersion are treated as version 1.
 */
export function migratePracticeTemplate(raw: unknown): PracticeTemplate {
  const probe = versionProbeSchema.safeParse(raw);
  if (!probe.success) throw fromZodError('INVALID_TEMPLATE', 'Practice template is not an object.', probe.error);

  const version = probe.data.schemaVersion ?? 1;
  if (version === PRACTICE_TEMPLATE_SCHEMA_VERSION) {
    const current = practiceTemplateSchema.safeParse(raw);
    if (!current.success) throw fromZodError('INVALID_TEMPLATE', 'Invalid practice template.', current.error);
    return current.data;
  }

  if (version === 1) {
    const legacy = legacyTemplateSchema.safeParse(raw);
    if (!legacy.success) throw fromZodError('INVALID_TEMPLATE', 'Invalid legacy practice template.', legacy.error);
    return migrateLegacyTemplate(legacy.data);
  }

  throw new WorkoutParserError('INVALID_TEMPLATE', `Unsupported practice template version ${version}.`);
}
