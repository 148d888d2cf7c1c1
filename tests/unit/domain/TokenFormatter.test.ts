import { describe, it, expect } from 'vitest';
import { applyFormatter } from '../../../src/domain/value-objects/TokenFormatter.js';

describe('applyFormatter', () => {
  it('should zero-pad numeric values', () => {
    expect(applyFormatter('5', '04')).toBe('0005');
    expect(applyFormatter('10', '3')).toBe('010');
  });

  it('should never truncate a value wider than the pad width', () => {
    expect(applyFormatter('12345', '04')).toBe('12345');
  });

  it('should leave non-numeric values untouched when padding', () => {
    expect(applyFormatter('abc', '04')).toBe('abc');
    expect(applyFormatter('1a', '04')).toBe('1a');
  });

  it('should change case', () => {
    expect(applyFormatter('Demo', 'upper')).toBe('DEMO');
    expect(applyFormatter('Demo', 'lower')).toBe('demo');
    expect(applyFormatter('hello wORLD', 'title')).toBe('Hello World');
  });

  it('should treat default= and unknown formatters as no-ops', () => {
    expect(applyFormatter('comp', 'default=anim')).toBe('comp');
    expect(applyFormatter('comp', 'reverse')).toBe('comp');
  });
});
