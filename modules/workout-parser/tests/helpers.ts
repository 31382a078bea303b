import type { CreateId } from '../types';

export function sequentialIds(prefix = 'id'): CreateId {
  let n = 0;
  return () => {
    n += 1;
    return `${prefix}-${n}`;
  };
}
