import { isWorkoutParserDebugEnabled } from '@/lib/debug';

import { DEFAULT_SECTION_LABEL } from './types';

export type WorkoutParserConfig = {
  /** Label of the section opened when content arrives before any header. */
  defaultSectionLabel: string;
  debug: boolean;
};

export const DEFAULT_WORKOUT_PARSER_CONFIG: WorkoutParserConfig = {
  defaultSectionLabel: DEFAULT_SECTION_LABEL,
  debug: false,
};

export function getWorkoutParserConfigFromEnv(env: NodeJS.ProcessEnv = process.env): WorkoutParserConfig {
  const label = String(env.WORKOUT_PARSER_DEFAULT_SECTION ?? '').trim();
  return {
    defaultSectionLabel: label || DEFAULT_SECTION_LABEL,
    debug: isWorkoutParserDebugEnabled(env),
  };
}
