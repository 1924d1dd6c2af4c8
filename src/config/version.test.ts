import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import {
  checkConfigVersion,
  compareVersions,
  parseVersion,
  versionWarning,
} from './version.js';
import { CONFIG_VERSION } from './defaults.js';

describe('Config version checking', () => {
  describe('parseVersion', () => {
    it('should parse dotted numeric versions', () => {
      expect(parseVersion('0.2.8')).toEqual([0, 2, 8]);
      expect(parseVersion('v1.10')).toEqual([1, 10]);
      expect(parseVersion(' 3 ')).toEqual([3]);
    });

    it('should reject non-versions', () => {
      expect(parseVersion('not-a-version')).toBeUndefined();
      expect(parseVersion('')).toBeUndefined();
      expect(parseVersion('1..2')).toBeUndefined();
      expect(parseVersion('1.2.')).toBeUndefined();
    });
  });

  describe('compareVersions', () => {
    it('should compare numerically, not lexically', () => {
      expect(compareVersions('0.2.11', '0.2.8')).toBeGreaterThan(0);
      expect(compareVersions('0.10.0', '0.9.9')).toBeGreaterThan(0);
      expect(compareVersions('0.2.7', '0.2.8')).toBeLessThan(0);
    });

    it('should treat missing parts as zero', () => {
      expect(compareVersions('1.0', '1.0.0')).toBe(0);
      expect(compareVersions('1', '1.0.1')).toBeLessThan(0);
    });

    it('should return undefined for invalid versions', () => {
      expect(compareVersions('abc', '0.2.8')).toBeUndefined();
      expect(compareVersions('0.2.8', 'abc')).toBeUndefined();
    });

    it('should be antisymmetric', () => {
      const version = fc
        .array(fc.nat({ max: 50 }), { minLength: 1, maxLength: 4 })
        .map((parts) => parts.join('.'));
      fc.assert(
        fc.property(version, version, (a, b) => {
          const ab = compareVersions(a, b) ?? NaN;
          const ba = compareVersions(b, a) ?? NaN;
          return Math.sign(ab) === -Math.sign(ba);
        })
      );
    });
  });

  describe('checkConfigVersion', () => {
    it('should use 0.2.8 as the default minimum', () => {
      expect(CONFIG_VERSION).toBe('0.2.8');
    });

    it('should report unknown when no version is declared', () => {
      const result = checkConfigVersion(undefined);
      expect(result).toEqual({ status: 'unknown' });
      expect(versionWarning(result)).toBe('Config version unknown, it may be outdated');
    });

    it('should report outdated for an older version', () => {
      const result = checkConfigVersion('0.2.7', '0.2.8');
      expect(result).toEqual({ status: 'outdated', declared: '0.2.7', minimum: '0.2.8' });
      expect(versionWarning(result)).toBe(
        'Config is for older lazymc version, you may need to update it'
      );
    });

    it('should not warn for a newer version', () => {
      const result = checkConfigVersion('0.2.9', '0.2.8');
      expect(result).toEqual({ status: 'ok', declared: '0.2.9' });
      expect(versionWarning(result)).toBeUndefined();
    });

    it('should not warn for the exact minimum version', () => {
      expect(checkConfigVersion('0.2.8').status).toBe('ok');
    });

    it('should report invalid for an unparsable version', () => {
      const result = checkConfigVersion('not-a-version', '0.2.8');
      expect(result).toEqual({ status: 'invalid', declared: 'not-a-version' });
      expect(versionWarning(result)).toBe('Config version is invalid, you may need to update it');
    });
  });
});
