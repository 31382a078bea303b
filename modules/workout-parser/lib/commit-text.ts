import type { WorkoutLine, WorkoutSection, WorkoutSet } from '../types';
import { EFFORT_CODES, MODE_DISPLAY_NAMES, STROKE_DISPLAY_NAMES } from './display';
import { formatIntervalSeconds } from './interval-format';

export type CommitTextSource = {
  title: string;
  notes?: string | null;
  poolInfo?: string | null;
  sections: WorkoutSection[];
};

export type CommitTextOptions = {
  date: Date;
  /** IANA zone for the header date; the runtime zone when omitted. */
  timeZone?: string;
};

const REPEAT_BLOCK_INDENT = '  ';

function dateParts(date: Date, timeZone: string | undefined, options: Intl.DateTimeFormatOptions): Record<string, string> {
  const parts = new Intl.DateTimeFormat('en-US', { ...options, timeZone }).formatToParts(date);
  return Object.fromEntries(parts.map((part) => [part.type, part.value]));
}

/** "Sun Oct 18 '26 · 9:05 AM" */
export function formatCommitDate(date: Date, timeZone?: string): string {
  const day = dateParts(date, timeZone, { weekday: 'short', month: 'short', day: 'numeric', year: '2-digit' });
  const time = dateParts(date, timeZone, { hour: 'numeric', minute: '2-digit', hour12: true });
  return `${day.weekday} ${day.month} ${day.day} '${day.year} · ${time.hour}:${time.minute} ${time.dayPeriod}`;
}

function renderInterval(line: WorkoutLine): string {
  if (line.intervalSeconds == null) return '';
  switch (line.intervalKind) {
    case 'sendoff':
      return ` @ ${formatIntervalSeconds(line.intervalSeconds)}`;
    case 'rest':
      return ` ${formatIntervalSeconds(line.intervalSeconds)} rest`;
    case 'none':
      return '';
  }
}

export function renderCommitLine(line: WorkoutLine): string {
  let prefix = '';
  if (line.reps != null && line.distance != null) prefix = `${line.reps}x${line.distance}`;
  else if (line.distance != null) prefix = String(line.distance);

  let body = [
    line.stroke ? STROKE_DISPLAY_NAMES[line.stroke] : '',
    line.mode ? MODE_DISPLAY_NAMES[line.mode] : '',
    line.text.trim(),
  ]
    .filter(Boolean)
    .join(' ');

  if (line.effort) {
    const code = EFFORT_CODES[line.effort];
    body = body ? `${body} (${code})` : code;
  }

  return [prefix, body].filter(Boolean).join(' ') + renderInterval(line);
}

function renderSet(set: WorkoutSet): string[] {
  const out: string[] = [];
  if (set.title?.trim()) out.push(set.title.trim());

  // Indented so that the block survives a round trip through the parser.
  const grouped = set.repeatCount > 1;
  if (grouped) out.push(`${set.repeatCount} rounds of:`);

  for (const line of set.lines) {
    const rendered = renderCommitLine(line);
    if (!rendered) continue;
    out.push(grouped ? `${REPEAT_BLOCK_INDENT}${rendered}` : rendered);
  }
  return out;
}

/** Plain-text practice sheet: header, then every section followed by a blank line. */
export function renderCommitText(source: CommitTextSource, options: CommitTextOptions): string {
  const lines: string[] = [];

  const notes = source.notes?.trim();
  lines.push(notes ? `${source.title} | ${notes}` : source.title);

  const pool = source.poolInfo?.trim();
  const when = formatCommitDate(options.date, options.timeZone);
  lines.push(pool ? `${when} ${pool}` : when);
  lines.push('');

  for (const section of source.sections) {
    lines.push(section.label);
    for (const set of section.sets) lines.push(...renderSet(set));
    lines.push('');
  }

  return `${lines.join('\n')}\n`;
}
