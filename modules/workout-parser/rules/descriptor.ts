import { buildWorkoutLine, type WorkoutLine } from '../types';
import { appendSet, type ParserContext, type ParserEnvironment } from './parser-context';
import { lastRepeatBlockLine, replaceLastRepeatBlockLine } from './repeat-block';

export function appendDescriptorText(line: WorkoutLine, text: string): WorkoutLine {
  const extra = text.trim();
  if (!extra) return line;
  return { ...line, text: line.text ? `${line.text} ${extra}` : extra };
}

/**
 * Attaches a dash-led note ("– hold turns") to the line it describes: the last
 * line of the open repeat block, else the last line of the current section.
 */
export function mergeDescriptor(context: ParserContext, text: string, env: ParserEnvironment): ParserContext {
  if (lastRepeatBlockLine(context.pendingGroup)) {
    env.log('descriptor-merged', { target: 'repeat-block' });
    return {
      ...context,
      pendingGroup: replaceLastRepeatBlockLine(context.pendingGroup, (line) => appendDescriptorText(line, text)),
    };
  }

  const section = context.currentSection;
  const lastSet = section ? section.sets[section.sets.length - 1] : undefined;
  const lastLine = lastSet ? lastSet.lines[lastSet.lines.length - 1] : undefined;
  if (section && lastSet && lastLine) {
    const lines = [...lastSet.lines.slice(0, -1), appendDescriptorText(lastLine, text)];
    const sets = [...section.sets.slice(0, -1), { ...lastSet, lines }];
    env.log('descriptor-merged', { target: 'section' });
    return { ...context, currentSection: { ...section, sets } };
  }

  // Nothing to describe yet: keep the note as its own text-only line.
  env.log('descriptor-orphaned', { text });
  const line = buildWorkoutLine(env.createId(), { text });
  return appendSet(context, { id: env.createId(), title: null, repeatCount: 1, lines: [line] }, env);
}
