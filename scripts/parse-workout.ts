import { readFile } from 'node:fs/promises';
import path from 'node:path';

import {
  getWorkoutParserConfigFromEnv,
  parseWorkoutText,
  strokeYards,
  summarizeWorkout,
} from '@/modules/workout-parser';

async function main() {
  const file = process.argv[2];
  if (!file) {
    console.error('Usage: npm run parse -- <workout.txt>');
    process.exitCode = 1;
    return;
  }

  const text = await readFile(path.resolve(file), 'utf8');
  const result = parseWorkoutText(text, { config: getWorkoutParserConfigFromEnv() });

  console.log(
    JSON.stringify(
      {
        ...result,
        summary: summarizeWorkout(result.sections),
        strokeYards: strokeYards(result.sections),
      },
      null,
      2
    )
  );
}

main().catch((error) => {
  console.error('[parse-workout] failed', error);
  process.exitCode = 1;
});
