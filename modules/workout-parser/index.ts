export * from './types';
export { DEFAULT_WORKOUT_PARSER_CONFIG, getWorkoutParserConfigFromEnv, type WorkoutParserConfig } from './config';
export { NO_SECTIONS_WARNING, parseWorkoutText, type ParseWorkoutOptions } from './parse';
export { hasNumericData, parseLine, type LineParseOutcome } from './rules/line-parser';
export { detectSection } from './rules/section-detector';
export { extractRoundCount } from './rules/round-header';
export { lineYards, setYards, sectionYards, strokeYards, summarizeWorkout, totalYards, type WorkoutSummary } from './lib/yardage';
export { formatIntervalSeconds, parseIntervalDigits, parseIntervalString } from './lib/interval-format';
export { renderCommitText, renderCommitLine, type CommitTextSource } from './lib/commit-text';
export { EFFORT_CODES, MODE_DISPLAY_NAMES, STROKE_DISPLAY_NAMES } from './lib/display';
export {
  applyParseResultToTemplate,
  createPracticeTemplate,
  practiceTagFromString,
  type PracticeTag,
  type PracticeTemplate,
} from './lib/practice-template';
export { migratePracticeTemplate } from './shared/template-migration';
export { mapFormatWorkoutResponse, type MappedFormatResponse } from './shared/format-response';
export { isWorkoutParserError, WorkoutParserError } from '@/lib/errors';
