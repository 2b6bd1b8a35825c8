import { describe, it, expect } from 'vitest';
import { applicationDirectories, join, normalizePath, resolveBaseDirectories } from './path';

describe('path utils', () => {
  it('normalizes backslashes', () => {
    expect(normalizePath('a\\b\\c')).toBe('a/b/c');
    expect(join('a', 'b', '..', 'c')).toBe('a/c');
  });

  describe('resolveBaseDirectories', () => {
    it('falls back to the defaults below the home directory', () => {
      const dirs = resolveBaseDirectories({}, '/home/ada');
      expect(dirs).toEqual({
        dataHome: '/home/ada/.local/share',
        dataDirs: ['/usr/local/share', '/usr/share'],
        configHome: '/home/ada/.config',
        cacheHome: '/home/ada/.cache',
        stateHome: '/home/ada/.local/state',
        runtimeDir: undefined,
      });
    });

    it('honours absolute overrides and ignores relative ones', () => {
      const dirs = resolveBaseDirectories(
        {
          XDG_DATA_HOME: '/data',
          XDG_DATA_DIRS: '/opt/share:relative/share::/usr/share',
          XDG_CONFIG_HOME: 'relative-config',
          XDG_RUNTIME_DIR: '/run/user/1000',
        },
        '/home/ada',
      );
      expect(dirs.dataHome).toBe('/data');
      expect(dirs.dataDirs).toEqual(['/opt/share', '/usr/share']);
      expect(dirs.configHome).toBe('/home/ada/.config');
      expect(dirs.runtimeDir).toBe('/run/user/1000');
    });
  });

  it('lists application directories in precedence order without duplicates', () => {
    const dirs = resolveBaseDirectories(
      { XDG_DATA_HOME: '/usr/share', XDG_DATA_DIRS: '/usr/local/share:/usr/share' },
      '/home/ada',
    );
    expect(applicationDirectories(dirs)).toEqual([
      '/usr/share/applications',
      '/usr/local/share/applications',
    ]);
  });
});
