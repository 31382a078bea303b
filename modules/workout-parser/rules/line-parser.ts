import { randomUUID } from 'node:crypto';

import { buildWorkoutLine, type CreateId, type WorkoutLine, type WorkoutSet } from '../types';
import {
  cleanRemainder,
  extractEffort,
  extractInterval,
  extractMode,
  extractNestedRepeat,
  extractParentheticalNotes,
  extractRepsAndDistance,
  extractStroke,
  extractTotal,
  stripDashPrefix,
  stripLabel,
  type RepsAndDistance,
} from './extractors';

export type LineParseOutcome =
  | { kind: 'set'; set: WorkoutSet; startedWithDash: boolean }
  | { kind: 'descriptor'; text: string };

export type ParseLineOptions = {
  createId?: CreateId;
};

export function hasNumericData(line: Pick<WorkoutLine, 'reps' | 'distance'>): boolean {
  return line.reps != null || line.distance != null;
}

function withNotes(text: string, notes: string | null): string {
  if (!notes) return text;
  return text ? `${text} ${notes}` : notes;
}


function parseStructuredLine(createId: CreateId, counts: RepsAndDistance, afterCounts: string, notes: string | null): WorkoutLine {
  const stroke = extractStroke(afterCounts);
  const mode = extractMode(stroke.remainder);
  const interval = extractInterval(mode.remainder);
  const effort = extractEffort(interval.remainder);

  return buildWorkoutLine(createId(), {
    reps: counts.reps,
    distance: counts.distance,
    stroke: stroke.value,
    mode: mode.value,
    intervalSeconds: interval.value.seconds,
    intervalKind: interval.value.kind,
    effort: effort.value,
    text: withNotes(cleanRemainder(effort.remainder, stroke.value), notes),
  });
}

function parseLineFields(createId: CreateId, body: string, unlabelled: string): WorkoutLine {
  // Nested repeats go first: their inner group is written in parentheses.
  const nested = extractNestedRepeat(unlabelled);
  if (nested.value) {
    const notes = extractParentheticalNotes(nested.remainder);
    return parseStructuredLine(createId, nested.value, notes.remainder, notes.value);
  }

  const notes = extractParentheticalNotes(unlabelled);
  const counts = extractRepsAndDistance(notes.remainder.trim());
  if (counts.value) return parseStructuredLine(createId, counts.value, counts.remainder, notes.value);

  const total = extractTotal(notes.remainder.trim());
  if (total !== null) {
    return buildWorkoutLine(createId(), {
      reps: 1,
      distance: total,
      text: withNotes(cleanRemainder(notes.remainder, null), notes.value),
    });
  }

  return buildWorkoutLine(createId(), { text: body });
}

/**
 * Turns one physical line into a single-line set (repeatCount 1), or reports a
 * dash-led line without numbers as a descriptor for the previous line.
 * Returns null for blank input.
 */
export function parseLine(rawLine: string, options: ParseLineOptions = {}): LineParseOutcome | null {
  const trimmed = rawLine.trim();
  if (!trimmed) return null;

  const createId = options.createId ?? randomUUID;
  const dash = stripDashPrefix(trimmed);
  const body = dash.remainder.trim();
  const unlabelled = stripLabel(body).remainder;

  const line = parseLineFields(createId, body, unlabelled);
  if (dash.value && !hasNumericData(line)) return { kind: 'descriptor', text: body };

  return {
    kind: 'set',
    set: { id: createId(), title: null, repeatCount: 1, lines: [line] },
    startedWithDash: dash.value,
  };
}
