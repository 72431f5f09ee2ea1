import { describe, it, expect } from 'vitest';
import { createColors } from './colors';

describe('createColors', () => {
  it('always emits escape codes when forced on', () => {
    expect(createColors('always').yellow('x')).toBe('\u001b[33mx\u001b[39m');
  });

  it('emits plain text when turned off', () => {
    expect(createColors('never').yellow('x')).toBe('x');
  });
});
