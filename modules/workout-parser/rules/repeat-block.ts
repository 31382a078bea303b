import type { CreateId, WorkoutLine, WorkoutSet } from '../types';

export type RepeatBlockState =
  | { status: 'idle' }
  | { status: 'accumulating'; repeatCount: number; lines: WorkoutLine[] };

export const IDLE_REPEAT_BLOCK: RepeatBlockState = { status: 'idle' };

/** A header of "1x thru" repeats nothing, so it leaves the block idle. */
export function openRepeatBlock(repeatCount: number): RepeatBlockState {
  if (!Number.isInteger(repeatCount) || repeatCount <= 1) return IDLE_REPEAT_BLOCK;
  return { status: 'accumulating', repeatCount, lines: [] };
}

export function appendToRepeatBlock(state: RepeatBlockState, lines: WorkoutLine[]): RepeatBlockState {
  if (state.status !== 'accumulating') return state;
  return { ...state, lines: [...state.lines, ...lines] };
}

export function lastRepeatBlockLine(state: RepeatBlockState): WorkoutLine | null {
  if (state.status !== 'accumulating') return null;
  return state.lines[state.lines.length - 1] ?? null;
}

export function replaceLastRepeatBlockLine(state: RepeatBlockState, update: (line: WorkoutLine) => WorkoutLine): RepeatBlockState {
  if (state.status !== 'accumulating' || state.lines.length === 0) return state;
  const lines = state.lines.slice();
  const lastIndex = lines.length - 1;
  lines[lastIndex] = update(lines[lastIndex]);
  return { ...state, lines };
}

export function flushRepeatBlock(state: RepeatBlockState, createId: CreateId): { state: RepeatBlockState; set: WorkoutSet | null } {
  if (state.status !== 'accumulating' || state.lines.length === 0) {
    return { state: IDLE_REPEAT_BLOCK, set: null };
  }
  return {
    state: IDLE_REPEAT_BLOCK,
    set: { id: createId(), title: null, repeatCount: state.repeatCount, lines: state.lines },
  };
}
