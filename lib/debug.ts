export type DebugSink = Pick<Console, 'debug'>;

export function isWorkoutParserDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  if (String(env.NODE_ENV ?? '').toLowerCase() === 'production') return false;
  const raw = String(env.WORKOUT_PARSER_DEBUG ?? '').trim().toLowerCase();
  return raw === '1' || raw === 'true';
}

export type DebugLog = (event: string, payload?: Record<string, unknown>) => void;

export function createDebugLog(tag: string, enabled: boolean, sink: DebugSink = console): DebugLog {
  if (!enabled) return () => {};
  return (event, payload) => {
    sink.debug(`[${tag}]`, { event, ...payload });
  };
}
