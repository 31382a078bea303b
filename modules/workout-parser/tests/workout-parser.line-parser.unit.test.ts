import { describe, expect, it } from 'vitest';

import { hasNumericData, parseLine } from '@/modules/workout-parser/rules/line-parser';
import type { WorkoutLine } from '@/modules/workout-parser/types';

import { sequentialIds } from './helpers';

function parsedLine(text: string): WorkoutLine {
  const outcome = parseLine(text, { createId: sequentialIds() });
  if (outcome?.kind !== 'set') throw new Error(`expected a set for "${text}"`);
  expect(outcome.set.lines).toHaveLength(1);
  return outcome.set.lines[0];
}

describe('workout-parser line parser', () => {
  it('parses reps, distance, stroke and sendoff into a single-line set', () => {
    const outcome = parseLine('4x100 free @ 1:30', { createId: sequentialIds() });

    expect(outcome).toEqual({
      kind: 'set',
      startedWithDash: false,
      set: {
        id: 'id-2',
        title: null,
        repeatCount: 1,
        lines: [
          {
            id: 'id-1',
            reps: 4,
            distance: 100,
            stroke: 'freestyle',
            mode: null,
            intervalSeconds: 90,
            intervalKind: 'sendoff',
            effort: null,
            text: '',
            yardageOverride: null,
          },
        ],
      },
    });
  });

  it('multiplies nested repeats out', () => {
    const line = parsedLine('3x (4x25 @ :25)');
    expect(line).toMatchObject({ reps: 12, distance: 25, intervalSeconds: 25, intervalKind: 'sendoff', text: '' });
  });

  it('keeps the first effort and leaves the rest as text', () => {
    const line = parsedLine('8x50 @ :50 easy/fast by 25');
    expect(line).toMatchObject({ reps: 8, distance: 50, intervalSeconds: 50, effort: 'easy', text: '/fast by 25' });
  });

  it('keeps trailing descriptors after the effort keyword', () => {
    const line = parsedLine('4x100 free @ 1:30 descend 1-4');
    expect(line).toMatchObject({ stroke: 'freestyle', effort: 'descend', text: '1-4' });
  });

  it('reads mode, rest and parenthetical notes together', () => {
    const line = parsedLine('200 free drill (light pull) :15 rest');
    expect(line).toMatchObject({
      reps: 1,
      distance: 200,
      stroke: 'freestyle',
      mode: 'drill',
      intervalSeconds: 15,
      intervalKind: 'rest',
      effort: null,
      text: 'light pull',
    });
  });

  it('keeps unstructured lines as text-only lines', () => {
    const line = parsedLine('A. Kick focus – 400');
    expect(line).toMatchObject({ reps: null, distance: null, stroke: null, text: 'A. Kick focus – 400' });
    expect(hasNumericData(line)).toBe(false);
  });

  it('reads total-only lines as one rep of the total', () => {
    const line = parsedLine('Total: 600');
    expect(line).toMatchObject({ reps: 1, distance: 600, text: 'Total: 600' });
    expect(hasNumericData(line)).toBe(true);
  });

  it('reports dash-led lines without numbers as descriptors', () => {
    expect(parseLine('– notes about previous set')).toEqual({ kind: 'descriptor', text: 'notes about previous set' });
  });

  it('parses dash-led lines that carry numbers', () => {
    const outcome = parseLine('– 3x (4x25 @ :25)', { createId: sequentialIds() });
    if (outcome?.kind !== 'set') throw new Error('expected a set');
    expect(outcome.startedWithDash).toBe(true);
    expect(outcome.set.lines[0]).toMatchObject({ reps: 12, distance: 25, intervalSeconds: 25 });
  });

  it('keeps notes nested inside a repeat group', () => {
    expect(parsedLine('2x (3x100 free (fins))')).toMatchObject({ reps: 6, distance: 100, stroke: 'freestyle', text: 'fins' });
  });

  it('treats dash-led totals as sets rather than descriptors', () => {
    const outcome = parseLine('- Total: 600', { createId: sequentialIds() });
    if (outcome?.kind !== 'set') throw new Error('expected a set');
    expect(outcome.startedWithDash).toBe(true);
    expect(outcome.set.lines[0]).toMatchObject({ reps: 1, distance: 600, text: 'Total: 600' });
  });

  it('keeps oversized counts as text', () => {
    expect(parsedLine('99999999999999999999x100')).toMatchObject({
      reps: null,
      distance: null,
      text: '99999999999999999999x100',
    });
  });

  it('returns null for blank lines', () => {
    expect(parseLine('')).toBeNull();
    expect(parseLine('   ')).toBeNull();
  });

  it('drops a stroke name left over in the remainder', () => {
    expect(parsedLine('100 free free')).toMatchObject({ stroke: 'freestyle', text: '' });
  });

  it('matches keywords as whole words', () => {
    expect(parsedLine('100 swimmer drills')).toMatchObject({ stroke: null, mode: null, text: 'swimmer drills' });
  });

  it('accepts abbreviations and the unicode multiply sign', () => {
    expect(parsedLine('4×200 fr @ 2:45')).toMatchObject({ reps: 4, distance: 200, stroke: 'freestyle', intervalSeconds: 165 });
    expect(parsedLine('6x50 bk kick ez')).toMatchObject({ stroke: 'backstroke', mode: 'kick', effort: 'easy', text: '' });
  });
});
