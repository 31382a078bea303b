import type { DebugLog } from '@/lib/debug';

import type { CreateId, WorkoutSection, WorkoutSet } from '../types';
import { flushRepeatBlock, IDLE_REPEAT_BLOCK, type RepeatBlockState } from './repeat-block';

/** Carried from line to line; every transition returns a new context. */
export type ParserContext = {
  sections: WorkoutSection[];
  currentSection: WorkoutSection | null;
  pendingGroup: RepeatBlockState;
  title: string | null;
  sawHeader: boolean;
};

export type ParserEnvironment = {
  createId: CreateId;
  defaultSectionLabel: string;
  log: DebugLog;
};

export function createParserContext(): ParserContext {
  return {
    sections: [],
    currentSection: null,
    pendingGroup: IDLE_REPEAT_BLOCK,
    title: null,
    sawHeader: false,
  };
}

export function createSection(env: ParserEnvironment, label: string): WorkoutSection {
  return { id: env.createId(), label, sets: [] };
}

/** Empty sections are never kept. */
export function closeSection(sections: WorkoutSection[], section: WorkoutSection | null): WorkoutSection[] {
  if (!section || section.sets.length === 0) return sections;
  return [...sections, section];
}

export function appendSet(context: ParserContext, set: WorkoutSet, env: ParserEnvironment): ParserContext {
  const section = context.currentSection ?? createSection(env, env.defaultSectionLabel);
  return { ...context, currentSection: { ...section, sets: [...section.sets, set] } };
}

export function flushPendingGroup(context: ParserContext, env: ParserEnvironment): ParserContext {
  const flushed = flushRepeatBlock(context.pendingGroup, env.createId);
  const next = { ...context, pendingGroup: flushed.state };
  if (!flushed.set) return next;

  env.log('repeat-block-flushed', { repeatCount: flushed.set.repeatCount, lines: flushed.set.lines.length });
  return appendSet(next, flushed.set, env);
}
