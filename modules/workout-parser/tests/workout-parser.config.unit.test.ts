import { describe, expect, it, vi } from 'vitest';

import { createDebugLog, isWorkoutParserDebugEnabled } from '@/lib/debug';
import { WorkoutParserError } from '@/lib/errors';
import { getWorkoutParserConfigFromEnv } from '@/modules/workout-parser/config';

describe('workout-parser config', () => {
  it('falls back to defaults', () => {
    expect(getWorkoutParserConfigFromEnv({})).toEqual({ defaultSectionLabel: 'Main Set', debug: false });
  });

  it('reads the default section and debug flag', () => {
    expect(getWorkoutParserConfigFromEnv({ WORKOUT_PARSER_DEFAULT_SECTION: ' Kick Set ', WORKOUT_PARSER_DEBUG: 'TRUE' })).toEqual({
      defaultSectionLabel: 'Kick Set',
      debug: true,
    });
  });

  it('never enables debug output in production', () => {
    expect(isWorkoutParserDebugEnabled({ NODE_ENV: 'production', WORKOUT_PARSER_DEBUG: '1' })).toBe(false);
    expect(isWorkoutParserDebugEnabled({ WORKOUT_PARSER_DEBUG: '1' })).toBe(true);
    expect(isWorkoutParserDebugEnabled({ WORKOUT_PARSER_DEBUG: 'yes' })).toBe(false);
  });
});

describe('workout-parser debug log', () => {
  it('tags events when enabled', () => {
    const sink = { debug: vi.fn() };
    createDebugLog('workout-parser', true, sink)('repeat-block-flushed', { repeatCount: 2 });
    expect(sink.debug).toHaveBeenCalledWith('[workout-parser]', { event: 'repeat-block-flushed', repeatCount: 2 });
  });

  it('stays silent when disabled', () => {
    const sink = { debug: vi.fn() };
    createDebugLog('workout-parser', false, sink)('repeat-block-flushed');
    expect(sink.debug).not.toHaveBeenCalled();
  });
});

describe('workout-parser errors', () => {
  it('carries a code and issues', () => {
    const error = new WorkoutParserError('INVALID_TEMPLATE', 'Bad template.', { issues: [{ path: 'title', message: 'Required' }] });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('WorkoutParserError');
    expect(error.code).toBe('INVALID_TEMPLATE');
    expect(error.issues).toEqual([{ path: 'title', message: 'Required' }]);
  });
});
