import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { IconResolver } from './resolver';

describe('IconResolver', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'swiftlaunch-icons-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function touch(relativePath: string) {
    const fullPath = path.join(tmpDir, relativePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, '');
    return fullPath;
  }

  it('prefers the configured theme and size', async () => {
    const themed = await touch('share/icons/Papirus/32x32/apps/firefox.png');
    await touch('share/icons/hicolor/32x32/apps/firefox.png');
    const resolver = new IconResolver({
      dataDirs: [path.join(tmpDir, 'share')],
      theme: 'Papirus',
      size: 32,
      pixmapDirs: [],
    });

    expect(await resolver.resolve('firefox')).toBe(themed);
  });

  it('falls back to hicolor scalable icons, then pixmaps', async () => {
    const scalable = await touch('share/icons/hicolor/scalable/apps/files.svg');
    const pixmap = await touch('pixmaps/terminal.xpm');
    const resolver = new IconResolver({
      dataDirs: [path.join(tmpDir, 'share')],
      theme: 'Papirus',
      pixmapDirs: [path.join(tmpDir, 'pixmaps')],
    });

    expect(await resolver.resolve('files')).toBe(scalable);
    expect(await resolver.resolve('terminal')).toBe(pixmap);
    expect(await resolver.resolve('nothing')).toBeNull();
  });

  it('accepts absolute paths only when they exist', async () => {
    const icon = await touch('custom.png');
    const resolver = new IconResolver({ dataDirs: [], pixmapDirs: [] });

    expect(await resolver.resolve(icon)).toBe(icon);
    expect(await resolver.resolve(path.join(tmpDir, 'gone.png'))).toBeNull();
  });

  it('memoizes misses', async () => {
    const access = vi.fn().mockRejectedValue(new Error('ENOENT'));
    const resolver = new IconResolver({ dataDirs: ['/data'], pixmapDirs: [], fs: { access } });

    await resolver.resolve('ghost');
    const calls = access.mock.calls.length;
    await resolver.resolve('ghost');

    // hicolor: three sized extensions plus scalable
    expect(calls).toBe(4);
    expect(access).toHaveBeenCalledTimes(4);
  });
});
