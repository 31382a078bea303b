import type { Mode, Stroke, WorkoutLine, WorkoutSection, WorkoutSet } from '../types';

export type StrokeOrMode = Stroke | Mode;

export function lineYards(line: WorkoutLine): number {
  if (line.yardageOverride != null) return line.yardageOverride;
  if (line.distance == null) return 0;
  return line.distance * (line.reps ?? 1);
}

export function setYards(set: WorkoutSet): number {
  return set.lines.reduce((sum, line) => sum + lineYards(line), 0) * set.repeatCount;
}

export function sectionYards(section: WorkoutSection): number {
  return section.sets.reduce((sum, set) => sum + setYards(set), 0);
}

export function totalYards(sections: WorkoutSection[]): number {
  return sections.reduce((sum, section) => sum + sectionYards(section), 0);
}

/** "Free drill" counts as drill; "free swim" counts as free. */
function yardageBucket(line: WorkoutLine): StrokeOrMode | null {
  if (line.mode && line.stroke) return line.mode === 'swim' ? line.stroke : line.mode;
  return line.mode ?? line.stroke ?? null;
}

export function strokeYards(sections: WorkoutSection[]): Partial<Record<StrokeOrMode, number>> {
  const totals: Partial<Record<StrokeOrMode, number>> = {};
  for (const section of sections) {
    for (const set of section.sets) {
      for (const line of set.lines) {
        const bucket = yardageBucket(line);
        if (!bucket) continue;
        totals[bucket] = (totals[bucket] ?? 0) + lineYards(line) * set.repeatCount;
      }
    }
  }
  return totals;
}

export type WorkoutSummary = {
  totalYards: number;
  totalSets: number;
  totalLines: number;
};

export function summarizeWorkout(sections: WorkoutSection[]): WorkoutSummary {
  return {
    totalYards: totalYards(sections),
    totalSets: sections.reduce((sum, section) => sum + section.sets.length, 0),
    totalLines: sections.reduce((sum, section) => sum + section.sets.reduce((n, set) => n + set.lines.length, 0), 0),
  };
}
