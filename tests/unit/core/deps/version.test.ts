/**
 * Tests for runtime version checks.
 */
import { describe, it, expect } from 'vitest';
import {
  compareVersions,
  describeRange,
  isVersionInRange,
  parseVersion,
} from '../../../../src/core/deps/version.js';
import { DEFAULT_RUNTIME_RANGE } from '../../../../src/core/deps/types.js';

describe('parseVersion', () => {
  it('should parse full and partial versions', () => {
    expect(parseVersion('v20.11.1\n')).toEqual({ major: 20, minor: 11, patch: 1 });
    expect(parseVersion('18.3')).toEqual({ major: 18, minor: 3, patch: 0 });
    expect(parseVersion('22')).toEqual({ major: 22, minor: 0, patch: 0 });
  });

  it('should return null for non-versions', () => {
    expect(parseVersion('command not found')).toBeNull();
  });
});

describe('isVersionInRange', () => {
  const check = (raw: string): boolean => {
    const version = parseVersion(raw);
    if (!version) throw new Error(`unparseable ${raw}`);
    return isVersionInRange(version, DEFAULT_RUNTIME_RANGE);
  };

  it('should accept the minimum and anything up to the max major', () => {
    expect(check('v20.11.1')).toBe(true);
    expect(check('v22.3.0')).toBe(true);
    expect(check('v24.9.9')).toBe(true);
  });

  it('should reject versions below the minimum or above the max major', () => {
    expect(check('v16.2.0')).toBe(false);
    expect(check('v20.11.0')).toBe(false);
    expect(check('v25.0.0')).toBe(false);
  });

  it('should compare component by component', () => {
    expect(compareVersions({ major: 20, minor: 9, patch: 0 }, { major: 20, minor: 11, patch: 1 })).toBeLessThan(0);
  });

  it('should describe the range', () => {
    expect(describeRange(DEFAULT_RUNTIME_RANGE)).toBe('20.11.1 or above, up to 24.x');
    expect(describeRange({ minimum: '18.0.0' })).toBe('18.0.0 or above');
  });
});
