import { describe, expect, it } from 'vitest';

import { isWorkoutParserError } from '@/lib/errors';
import { mapFormatPattern, mapFormatWorkoutResponse } from '@/modules/workout-parser/shared/format-response';

import { sequentialIds } from './helpers';

const RESPONSE = {
  sections: [
    {
      name: 'main',
      title: 'Main Set',
      blocks: [
        {
          displayText: '4x100 free @ 1:30',
          section: 'main',
          reps: 4,
          distance: 100,
          stroke: 'mixed',
          mode: 'pull',
          interval: { kind: 'sendoff', seconds: 90 },
          pattern: { type: 'DESC' },
          equipment: ['paddles'],
          notes: ' hold form ',
        },
        {
          displayText: '200 easy',
          section: 'main',
          reps: 1,
          distance: 200,
          interval: { kind: 'none', seconds: 30 },
          pattern: { type: 'other', raw: 'Aerobic cruise' },
          equipment: [],
          notes: '',
        },
      ],
    },
  ],
  issues: [{ lineNumber: 3, lineText: '???', reason: 'Unrecognized line' }],
  normalizedText: 'Main Set\n4x100 free @ 1:30\n200 easy',
};

describe('workout-parser formatter response mapping', () => {
  it('maps each block to a one-line set', () => {
    const mapped = mapFormatWorkoutResponse(RESPONSE, { createId: sequentialIds() });

    expect(mapped.totalYards).toBe(600);
    expect(mapped.totalSets).toBe(2);
    expect(mapped.issues).toEqual(RESPONSE.issues);
    expect(mapped.normalizedText).toBe(RESPONSE.normalizedText);

    const [section] = mapped.sections;
    expect(section.label).toBe('Main Set');
    expect(section.sets.map((set) => set.repeatCount)).toEqual([1, 1]);
    expect(section.sets[0].lines[0]).toMatchObject({
      reps: 4,
      distance: 100,
      stroke: 'freestyle',
      mode: 'pull',
      intervalSeconds: 90,
      intervalKind: 'sendoff',
      effort: 'descend',
      text: 'hold form',
    });
    expect(section.sets[1].lines[0]).toMatchObject({
      stroke: null,
      mode: null,
      intervalSeconds: null,
      intervalKind: 'none',
      effort: 'cruise',
      text: '',
    });
  });

  it('maps pattern types before falling back to the raw text', () => {
    expect(mapFormatPattern({ type: 'evenPace' })).toBe('evenPace');
    expect(mapFormatPattern({ type: 'RACE' })).toBe('racePace');
    expect(mapFormatPattern({ type: 'other', raw: 'all-out sprint' })).toBe('sprint');
    expect(mapFormatPattern({ type: 'other', raw: 'smooth' })).toBeNull();
    expect(mapFormatPattern(null)).toBeNull();
  });

  it('rejects malformed responses', () => {
    let caught: unknown;
    try {
      mapFormatWorkoutResponse({ sections: 'x', issues: [], normalizedText: '' });
    } catch (error) {
      caught = error;
    }

    if (!isWorkoutParserError(caught)) throw new Error('expected a WorkoutParserError');
    expect(caught.code).toBe('INVALID_FORMAT_RESPONSE');
    expect(caught.issues.map((issue) => issue.path)).toEqual(['sections']);
    expect(caught.message.startsWith('Formatter response failed validation. sections:')).toBe(true);
  });
});
