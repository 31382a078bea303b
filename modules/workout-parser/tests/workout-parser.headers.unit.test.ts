import { describe, expect, it } from 'vitest';

import { extractRoundCount } from '@/modules/workout-parser/rules/round-header';
import { detectSection } from '@/modules/workout-parser/rules/section-detector';

describe('workout-parser section detection', () => {
  it('maps aliases to canonical labels', () => {
    expect(detectSection('wu')).toBe('Warmup');
    expect(detectSection('warm up')).toBe('Warmup');
    expect(detectSection('Warm-Up')).toBe('Warmup');
    expect(detectSection('  MS  ')).toBe('Main Set');
    expect(detectSection('Pre-set')).toBe('Pre-Set');
    expect(detectSection('cd')).toBe('Cooldown');
    expect(detectSection('Warm Down')).toBe('Cooldown');
  });

  it('collapses recovery, technique and drill blocks into the post-set bucket', () => {
    expect(detectSection('reset')).toBe('Post-Set / Technique');
    expect(detectSection('Drills')).toBe('Post-Set / Technique');
    expect(detectSection('Recovery')).toBe('Post-Set / Technique');
    expect(detectSection('Post Set - Pull')).toBe('Post-Set / Technique');
  });

  it('accepts an alias followed by a separator', () => {
    expect(detectSection('Cool down:')).toBe('Cooldown');
    expect(detectSection('Main Set – 2000')).toBe('Main Set');
    expect(detectSection('warmup: 600')).toBe('Warmup');
  });

  it('rejects aliases glued to other words', () => {
    expect(detectSection('warmdownstuff')).toBeNull();
    expect(detectSection('mslowly')).toBeNull();
    expect(detectSection('4x100 free')).toBeNull();
    expect(detectSection('')).toBeNull();
  });
});

describe('workout-parser round headers', () => {
  it('reads repeat counts', () => {
    expect(extractRoundCount('2x thru')).toBe(2);
    expect(extractRoundCount('2x thru:')).toBe(2);
    expect(extractRoundCount('3 rounds')).toBe(3);
    expect(extractRoundCount('3 Rounds of:')).toBe(3);
    expect(extractRoundCount('4x:')).toBe(4);
    expect(extractRoundCount('2 x through')).toBe(2);
    expect(extractRoundCount('1 round')).toBe(1);
  });

  it('ignores sets, clock times and zero counts', () => {
    expect(extractRoundCount('4x100 free')).toBeNull();
    expect(extractRoundCount('2:00 easy')).toBeNull();
    expect(extractRoundCount('0 rounds')).toBeNull();
    expect(extractRoundCount('rounds 3')).toBeNull();
  });
});
