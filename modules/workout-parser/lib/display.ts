import type { Effort, Mode, Stroke } from '../types';

export const STROKE_DISPLAY_NAMES: Record<Stroke, string> = {
  freestyle: 'Free',
  backstroke: 'Back',
  breaststroke: 'Breast',
  butterfly: 'Fly',
  im: 'IM',
  choice: 'Choice',
};

export const MODE_DISPLAY_NAMES: Record<Mode, string> = {
  swim: 'Swim',
  kick: 'Kick',
  pull: 'Pull',
  drill: 'Drill',
  scull: 'Scull',
  technique: 'Technique',
};

// Short codes printed after a line on the practice sheet.
export const EFFORT_CODES: Record<Effort, string> = {
  easy: 'EZ',
  cruise: 'Cruise',
  moderate: 'Mod',
  fast: 'Fast',
  sprint: 'Sp',
  descend: 'DESC',
  ascend: 'ASC',
  build: 'Bld',
  negativeSplit: 'N/S',
  evenPace: 'Even',
  bestAverage: 'Best avg',
  holdPace: 'Hold',
  racePace: 'Race pace',
  threshold: 'Threshold',
};
