import type { SectionLabel } from '../types';

const SECTION_ALIASES: Record<string, SectionLabel> = {
  warmup: 'Warmup',
  'warm-up': 'Warmup',
  'warm up': 'Warmup',
  wu: 'Warmup',

  'pre-set': 'Pre-Set',
  preset: 'Pre-Set',
  'pre set': 'Pre-Set',
  ps: 'Pre-Set',

  main: 'Main Set',
  'main set': 'Main Set',
  ms: 'Main Set',

  // Recovery, technique and drill blocks share one bucket on the practice sheet.
  'post-set': 'Post-Set / Technique',
  'post set': 'Post-Set / Technique',
  post: 'Post-Set / Technique',
  reset: 'Post-Set / Technique',
  recovery: 'Post-Set / Technique',
  technique: 'Post-Set / Technique',
  drills: 'Post-Set / Technique',

  cooldown: 'Cooldown',
  'cool-down': 'Cooldown',
  'cool down': 'Cooldown',
  warmdown: 'Cooldown',
  'warm-down': 'Cooldown',
  'warm down': 'Cooldown',
  cd: 'Cooldown',
};

const ALIASES_LONGEST_FIRST = Object.keys(SECTION_ALIASES).sort((a, b) => b.length - a.length);

const HEADER_SEPARATORS = new Set([' ', '-', ':', '–']);

export function detectSection(line: string): SectionLabel | null {
  const normalized = line.trim().toLowerCase();
  if (!normalized) return null;

  const exact = SECTION_ALIASES[normalized];
  if (exact) return exact;

  // "Post Set - Pull" is a header, "mslowly" is not.
  for (const alias of ALIASES_LONGEST_FIRST) {
    if (!normalized.startsWith(alias)) continue;
    const next = normalized.charAt(alias.length);
    if (next === '' || HEADER_SEPARATORS.has(next)) return SECTION_ALIASES[alias];
  }

  return null;
}
