import nodeFs from 'node:fs/promises';
import path from 'node:path';
import { LRUCache } from '@swiftlaunch/shared';

type Fs = Pick<typeof nodeFs, 'access'>;

const FALLBACK_THEME = 'hicolor';
const EXTENSIONS = ['.png', '.svg', '.xpm'];

export interface IconResolverOptions {
  /** Data directories holding `icons/<theme>`, highest precedence first */
  dataDirs: string[];
  theme?: string;
  size?: number;
  pixmapDirs?: string[];
  cacheSize?: number;
  fs?: Fs;
}

/**
 * Resolves icon names from desktop entries to files.
 * Results are memoized, misses included.
 */
export class IconResolver {
  private readonly fs: Fs;
  private readonly cache: LRUCache<string, string | null>;
  private readonly dataDirs: string[];
  private readonly theme: string;
  private readonly size: number;
  private readonly pixmapDirs: string[];

  constructor(options: IconResolverOptions) {
    this.fs = options.fs ?? nodeFs;
    this.cache = new LRUCache(options.cacheSize ?? 512);
    this.dataDirs = options.dataDirs;
    this.theme = options.theme ?? FALLBACK_THEME;
    this.size = options.size ?? 48;
    this.pixmapDirs = options.pixmapDirs ?? ['/usr/share/pixmaps'];
  }

  /** Lookup settings; cached resolutions are only valid for the same settings. */
  settings(): { dataDirs: string[]; theme: string; size: number; pixmapDirs: string[] } {
    return { dataDirs: this.dataDirs, theme: this.theme, size: this.size, pixmapDirs: this.pixmapDirs };
  }

  resolve(icon: string): Promise<string | null> {
    return this.cache.getOrCompute(icon, (key) => this.lookup(key));
  }

  private async lookup(icon: string): Promise<string | null> {
    if (path.isAbsolute(icon)) {
      return (await this.exists(icon)) ? icon : null;
    }
    for (const candidate of this.candidates(icon)) {
      if (await this.exists(candidate)) return candidate;
    }
    return null;
  }

  private *candidates(icon: string): Generator<string> {
    const themes = this.theme === FALLBACK_THEME ? [this.theme] : [this.theme, FALLBACK_THEME];
    const sized = `${this.size}x${this.size}`;
    for (const theme of themes) {
      for (const dataDir of this.dataDirs) {
        const themeDir = path.join(dataDir, 'icons', theme);
        for (const ext of EXTENSIONS) {
          yield path.join(themeDir, sized, 'apps', icon + ext);
        }
        yield path.join(themeDir, 'scalable', 'apps', `${icon}.svg`);
      }
    }
    for (const dir of this.pixmapDirs) {
      for (const ext of EXTENSIONS) {
        yield path.join(dir, icon + ext);
      }
    }
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await this.fs.access(file);
      return true;
    } catch {
      return false;
    }
  }
}
