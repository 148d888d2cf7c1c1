import { describe, it, expect } from 'vitest';
import { BUILT_IN_NORMALIZERS, buildNormalizers } from '../../../src/config/normalizers.js';

describe('built-in normalizers', () => {
  it('should transform values', () => {
    expect(BUILT_IN_NORMALIZERS['trim']('  demo ')).toBe('demo');
    expect(BUILT_IN_NORMALIZERS['spaces-to-underscores']('big  buck bunny')).toBe('big_buck_bunny');
    expect(BUILT_IN_NORMALIZERS['strip-illegal']('a<b>:c?*d')).toBe('abcd');
    expect(BUILT_IN_NORMALIZERS['alphanumeric']('sh_010-a')).toBe('sh010a');
  });

  it('should chain normalizers in the configured order', () => {
    const map = buildNormalizers({
      show: ['trim', 'spaces-to-underscores', 'upper'],
      seq: [],
    });

    expect(map['show']?.('  big buck ')).toBe('BIG_BUCK');
    expect(map['seq']).toBeUndefined();
  });
});
