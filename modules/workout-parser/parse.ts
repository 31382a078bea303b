import { randomUUID } from 'node:crypto';

import { createDebugLog, type DebugSink } from '@/lib/debug';

import { DEFAULT_WORKOUT_PARSER_CONFIG, type WorkoutParserConfig } from './config';
import { mergeDescriptor } from './rules/descriptor';
import { parseLine } from './rules/line-parser';
import {
  appendSet,
  closeSection,
  createParserContext,
  createSection,
  flushPendingGroup,
  type ParserContext,
  type ParserEnvironment,
} from './rules/parser-context';
import { appendToRepeatBlock, openRepeatBlock } from './rules/repeat-block';
import { extractRoundCount } from './rules/round-header';
import { detectSection } from './rules/section-detector';
import type { CreateId, ParseResult } from './types';

export const NO_SECTIONS_WARNING = "No sections found. Try adding 'Main Set' or 'Warmup'.";

export type ParseWorkoutOptions = {
  config?: WorkoutParserConfig;
  createId?: CreateId;
  debugSink?: DebugSink;
};

function isComment(line: string): boolean {
  return line.startsWith('//') || line.startsWith('#');
}

function isIndented(rawLine: string): boolean {
  return /^\s/.test(rawLine);
}

export function createParserEnvironment(options: ParseWorkoutOptions = {}): ParserEnvironment {
  const config = options.config ?? DEFAULT_WORKOUT_PARSER_CONFIG;
  return {
    createId: options.createId ?? randomUUID,
    defaultSectionLabel: config.defaultSectionLabel,
    log: createDebugLog('workout-parser', config.debug, options.debugSink),
  };
}

/** Applies one physical line to the context. */
export function reduceLine(context: ParserContext, rawLine: string, env: ParserEnvironment): ParserContext {
  const line = rawLine.trim();
  if (!line) return flushPendingGroup(context, env);
  if (isComment(line)) return context;

  const label = detectSection(line);
  if (label) {
    const flushed = flushPendingGroup(context, env);
    return {
      ...flushed,
      sections: closeSection(flushed.sections, flushed.currentSection),
      currentSection: createSection(env, label),
      sawHeader: true,
    };
  }

  // Before the first header only the first line counts, as the title.
  if (!context.sawHeader) {
    if (context.title === null) return { ...context, title: line };
    env.log('preamble-line-dropped', { line });
    return context;
  }

  const rounds = extractRoundCount(line);
  if (rounds !== null) {
    const flushed = flushPendingGroup(context, env);
    return { ...flushed, pendingGroup: openRepeatBlock(rounds) };
  }

  const outcome = parseLine(line, { createId: env.createId });
  if (!outcome) return context;
  if (outcome.kind === 'descriptor') return mergeDescriptor(context, outcome.text, env);

  if (context.pendingGroup.status === 'accumulating') {
    if (isIndented(rawLine)) {
      return { ...context, pendingGroup: appendToRepeatBlock(context.pendingGroup, outcome.set.lines) };
    }
    return appendSet(flushPendingGroup(context, env), outcome.set, env);
  }

  return appendSet(context, outcome.set, env);
}

export function finishParse(context: ParserContext, text: string, env: ParserEnvironment): ParseResult {
  const flushed = flushPendingGroup(context, env);
  const sections = closeSection(flushed.sections, flushed.currentSection);
  const warnings: string[] = [];

  if (sections.length === 0 && text.length > 0) {
    env.log('no-sections', { title: flushed.title });
    warnings.push(NO_SECTIONS_WARNING);
  }

  return { sections, title: flushed.title, warnings };
}

/**
 * Parses freeform practice notation into sections, sets and lines. Never throws;
 * lines it cannot structure are kept as text-only lines.
 */
export function parseWorkoutText(text: string, options: ParseWorkoutOptions = {}): ParseResult {
  const env = createParserEnvironment(options);
  const context = text.split(/\r?\n/).reduce((acc, rawLine) => reduceLine(acc, rawLine, env), createParserContext());
  return finishParse(context, text, env);
}
