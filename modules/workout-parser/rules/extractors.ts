import type { Effort, IntervalKind, Mode, Stroke } from '../types';

/**
 * Every extractor takes the text left over by the previous one and returns what
 * it found plus the text with the match removed. Only the first match is taken.
 */
export type Extraction<T> = {
  value: T | null;
  remainder: string;
};

export type RepsAndDistance = {
  reps: number;
  distance: number;
};

export type IntervalValue = {
  seconds: number | null;
  kind: IntervalKind;
};

type KeywordRule<T> = {
  keyword: string;
  value: T;
  pattern: RegExp;
};

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keywordRules<T>(entries: Array<[string, T]>): KeywordRule<T>[] {
  return entries.map(([keyword, value]) => ({
    keyword,
    value,
    pattern: new RegExp(`\\b${escapeRegex(keyword)}\\b`, 'i'),
  }));
}

function removeRange(text: string, index: number, length: number): string {
  return text.slice(0, index) + text.slice(index + length);
}

function extractKeyword<T>(text: string, rules: KeywordRule<T>[]): Extraction<T> {
  for (const rule of rules) {
    const match = rule.pattern.exec(text);
    if (match) {
      return { value: rule.value, remainder: removeRange(text, match.index, match[0].length) };
    }
  }
  return { value: null, remainder: text };
}

function isCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 1;
}

// Index of the ")" that closes a group opened before the start of text.
function closingParenIndex(text: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i += 1) {
    const char = text.charAt(i);
    if (char === '(') depth += 1;
    else if (char === ')') {
      if (depth === 0) return i;
      depth -= 1;
    }
  }
  return -1;
}

function toSeconds(minutes: string | undefined, seconds: string): number {
  return (minutes ? Number(minutes) : 0) * 60 + Number(seconds);
}

// Order matters: earlier entries win when a line mentions several keywords.
const STROKE_RULES = keywordRules<Stroke>([
  ['free', 'freestyle'],
  ['freestyle', 'freestyle'],
  ['fr', 'freestyle'],
  ['back', 'backstroke'],
  ['backstroke', 'backstroke'],
  ['bk', 'backstroke'],
  ['breast', 'breaststroke'],
  ['breaststroke', 'breaststroke'],
  ['br', 'breaststroke'],
  ['fly', 'butterfly'],
  ['butterfly', 'butterfly'],
  ['im', 'im'],
  ['choice', 'choice'],
]);

const MODE_RULES = keywordRules<Mode>([
  ['kick', 'kick'],
  ['pull', 'pull'],
  ['drill', 'drill'],
  ['swim', 'swim'],
  ['scull', 'scull'],
  ['technique', 'technique'],
]);

const EFFORT_RULES = keywordRules<Effort>([
  ['easy', 'easy'],
  ['ez', 'easy'],
  ['aerobic', 'cruise'],
  ['cruise', 'cruise'],
  ['moderate', 'moderate'],
  ['strong', 'moderate'],
  ['threshold', 'threshold'],
  ['race', 'racePace'],
  ['sprint', 'sprint'],
  ['fast', 'fast'],
  ['descend', 'descend'],
  ['desc', 'descend'],
  ['ascend', 'ascend'],
  ['build', 'build'],
]);

const DASH_PREFIX_REGEX = /^[–-]\s*/;
const LABEL_REGEX = /^[A-Z]\.\s*|^\d+[–-]\d+:\s*/;
const PARENTHETICAL_REGEX = /\(([^)]+)\)/g;
const NESTED_REPEAT_REGEX = /^(\d+)\s*[x×]\s*\(?\s*(\d+)\s*[x×]\s*(\d+)/i;
const REPS_DISTANCE_REGEX = /^(\d+)\s*[x×]\s*(\d+)/i;
const DISTANCE_ONLY_REGEX = /^(\d+)(?:\s|$)/;
// "@ 1:30", "@ :50", "@ 90", "@ :55-1:05" (the upper bound of a range is consumed but not kept)
const SENDOFF_REGEX = /@\s*(?:(\d+)?:)?(\d+)(?:\s*[–-]\s*\d*:\d{2})?/;
const REST_REGEX = /(?:(\d+)?:)?(\d+)\s*rest\b/i;
const TOTAL_REGEXES = [/(?:total|preset|warmup|cooldown):\s*(\d+)/i, /^(\d{3,})\s*$/];
const EDGE_SEPARATOR_REGEX = /^[–-]\s*|\s*[–-]$|^,\s*|\s*,$/g;

export function stripDashPrefix(line: string): { value: boolean; remainder: string } {
  const match = DASH_PREFIX_REGEX.exec(line);
  if (!match) return { value: false, remainder: line };
  return { value: true, remainder: line.slice(match[0].length) };
}

/** Drops "A. " or "1-2: " style labels from the front of a line. */
export function stripLabel(line: string): Extraction<string> {
  const match = LABEL_REGEX.exec(line);
  if (!match) return { value: null, remainder: line };
  return { value: match[0].trim(), remainder: line.slice(match[0].length) };
}

export function extractParentheticalNotes(text: string): Extraction<string> {
  const notes: string[] = [];
  const remainder = text.replace(PARENTHETICAL_REGEX, (_whole, inner: string) => {
    notes.push(inner.trim());
    return '';
  });
  const value = notes.filter(Boolean).join(', ');
  return { value: value || null, remainder };
}

/** "3x (4x25 ..." collapses to 12 x 25. */
export function extractNestedRepeat(text: string): Extraction<RepsAndDistance> {
  const match = NESTED_REPEAT_REGEX.exec(text);
  if (!match) return { value: null, remainder: text };

  const reps = Number(match[1]) * Number(match[2]);
  const distance = Number(match[3]);
  if (!isCount(reps) || !Number.isSafeInteger(distance)) return { value: null, remainder: text };

  let remainder = text.slice(match[0].length);
  if (match[0].includes('(')) {
    const close = closingParenIndex(remainder);
    if (close >= 0) remainder = removeRange(remainder, close, 1);
  }
  return { value: { reps, distance }, remainder };
}

export function extractRepsAndDistance(text: string): Extraction<RepsAndDistance> {
  const repsMatch = REPS_DISTANCE_REGEX.exec(text);
  if (repsMatch) {
    const reps = Number(repsMatch[1]);
    const distance = Number(repsMatch[2]);
    if (!isCount(reps) || !Number.isSafeInteger(distance)) return { value: null, remainder: text };
    return {
      value: { reps, distance },
      remainder: text.slice(repsMatch[0].length),
    };
  }

  const distanceMatch = DISTANCE_ONLY_REGEX.exec(text);
  if (distanceMatch && Number.isSafeInteger(Number(distanceMatch[1]))) {
    return {
      value: { reps: 1, distance: Number(distanceMatch[1]) },
      remainder: text.slice(distanceMatch[0].length),
    };
  }

  return { value: null, remainder: text };
}

export function extractStroke(text: string): Extraction<Stroke> {
  return extractKeyword(text, STROKE_RULES);
}

export function extractMode(text: string): Extraction<Mode> {
  return extractKeyword(text, MODE_RULES);
}

export function extractEffort(text: string): Extraction<Effort> {
  return extractKeyword(text, EFFORT_RULES);
}

export function extractInterval(text: string): { value: IntervalValue; remainder: string } {
  const sendoff = SENDOFF_REGEX.exec(text);
  if (sendoff) {
    return {
      value: { seconds: toSeconds(sendoff[1], sendoff[2]), kind: 'sendoff' },
      remainder: removeRange(text, sendoff.index, sendoff[0].length),
    };
  }

  const rest = REST_REGEX.exec(text);
  if (rest) {
    return {
      value: { seconds: toSeconds(rest[1], rest[2]), kind: 'rest' },
      remainder: removeRange(text, rest.index, rest[0].length),
    };
  }

  return { value: { seconds: null, kind: 'none' }, remainder: text };
}

/** "Total: 600", "Preset: 1000", or a lone number of three or more digits. */
export function extractTotal(text: string): number | null {
  for (const pattern of TOTAL_REGEXES) {
    const match = pattern.exec(text);
    if (match && Number.isSafeInteger(Number(match[1]))) return Number(match[1]);
  }
  return null;
}

export function strokeKeywords(stroke: Stroke): string[] {
  return STROKE_RULES.filter((rule) => rule.value === stroke).map((rule) => rule.keyword);
}

export function cleanRemainder(text: string, stroke: Stroke | null): string {
  const cleaned = text.replace(/\s{2,}/g, ' ').trim().replace(EDGE_SEPARATOR_REGEX, '').trim();
  if (stroke && strokeKeywords(stroke).includes(cleaned.toLowerCase())) return '';
  return cleaned;
}
