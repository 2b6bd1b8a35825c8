import { describe, it, expect } from 'vitest';
import { SDK_VERSION, isVersionCompatible, getVersionMismatchError, validateManifest } from './index';

describe('version', () => {
  it('exports SDK_VERSION as 1', () => {
    expect(SDK_VERSION).toBe(1);
  });

  it('isVersionCompatible returns true for matching version', () => {
    expect(isVersionCompatible({ minVersion: 1 })).toBe(true);
    expect(isVersionCompatible({ minVersion: 1, maxVersion: 1 })).toBe(true);
    expect(isVersionCompatible({ minVersion: 1, maxVersion: 2 })).toBe(true);
  });

  it('isVersionCompatible returns false for incompatible version', () => {
    expect(isVersionCompatible({ minVersion: 2 })).toBe(false);
    expect(isVersionCompatible({ minVersion: 0, maxVersion: 0 })).toBe(false);
  });

  it('getVersionMismatchError names the app and both versions', () => {
    expect(getVersionMismatchError('calc', { minVersion: 2, maxVersion: 3 })).toBe(
      'App "calc" requires SDK version 2-3, but current SDK version is 1.',
    );
  });
});

describe('validateManifest', () => {
  it('returns true for valid manifest', () => {
    expect(validateManifest({ id: 'launcher', sdkVersion: { minVersion: 1 }, capabilities: ['search', 'action'] })).toBe(
      true,
    );
  });

  it('returns false for invalid manifest', () => {
    expect(validateManifest(null)).toBe(false);
    expect(validateManifest({})).toBe(false);
    expect(validateManifest({ id: 'calc' })).toBe(false);
    expect(validateManifest({ id: 'calc', sdkVersion: { minVersion: 1 }, capabilities: [] })).toBe(false);
    expect(validateManifest({ id: 'calc', sdkVersion: { minVersion: 1 }, capabilities: ['render'] })).toBe(false);
  });
});
