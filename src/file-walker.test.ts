import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import { listFiles } from './file-walker.js';
import { logger } from './logger.js';
import { FileFilter } from './pattern-matcher.js';

describe('listFiles', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(TEST_DIR, 'walker-'));
    for (const dir of ['.cache', 'sub', 'zdir']) {
      mkdirSync(join(root, dir));
    }
    for (const file of ['a.jpg', 'b.jpg', '.hidden', 'backup~', '.cache/d.jpg', 'sub/c.jpg', 'zdir/e.jpg']) {
      writeFileSync(join(root, file), file);
    }
    logger.clear();
    logger.setMinLevel('warn');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('yields every regular file depth-first in name order', () => {
    expect([...listFiles(root, new FileFilter())]).toEqual([
      join(root, '.hidden'),
      join(root, 'a.jpg'),
      join(root, 'b.jpg'),
      join(root, 'backup~'),
      join(root, '.cache/d.jpg'),
      join(root, 'sub/c.jpg'),
      join(root, 'zdir/e.jpg'),
    ]);
  });

  it('applies exclusions to file names but still descends into matching directories', () => {
    const files = [...listFiles(root, new FileFilter([], ['*~', '.*']))];

    expect(files).toEqual([
      join(root, 'a.jpg'),
      join(root, 'b.jpg'),
      join(root, '.cache/d.jpg'),
      join(root, 'sub/c.jpg'),
      join(root, 'zdir/e.jpg'),
    ]);
  });

  it('is lazy', () => {
    const walk = listFiles(root, new FileFilter(['*.jpg']));
    expect(walk.next().value).toBe(join(root, 'a.jpg'));
    expect(walk.next().value).toBe(join(root, 'b.jpg'));
  });

  it('can be restarted and yields each file once', () => {
    const filter = new FileFilter();
    const first = [...listFiles(root, filter)];
    const second = [...listFiles(root, filter)];

    expect(second).toEqual(first);
    expect(new Set(first).size).toBe(first.length);
  });

  it('skips configured directories', () => {
    const files = [...listFiles(root, new FileFilter(['*.jpg']), { skipDirectories: [join(root, 'sub')] })];
    expect(files).not.toContain(join(root, 'sub/c.jpg'));
    expect(files).toHaveLength(4);
  });

  it('does not follow symbolic links', () => {
    symlinkSync(join(root, 'a.jpg'), join(root, 'link.jpg'));
    symlinkSync(join(root, 'sub'), join(root, 'linked-dir'));

    const files = [...listFiles(root, new FileFilter(['*.jpg']))];
    expect(files).toEqual([
      join(root, 'a.jpg'),
      join(root, 'b.jpg'),
      join(root, '.cache/d.jpg'),
      join(root, 'sub/c.jpg'),
      join(root, 'zdir/e.jpg'),
    ]);
  });

  // Linux filesystems store raw bytes, so a name that is not valid UTF-8 can be created.
  const rawName = (dir: string, bytes: number[], suffix = ''): Buffer =>
    Buffer.concat([Buffer.from(`${dir}/`), Buffer.from(bytes), Buffer.from(suffix)]);

  it.runIf(process.platform === 'linux')('reports names that are not valid UTF-8 instead of yielding them', () => {
    writeFileSync(rawName(root, [0x63, 0x61, 0x66, 0xe9], '.jpg'), 'raw');
    mkdirSync(rawName(root, [0x64, 0xe9]));
    writeFileSync(rawName(root, [0x64, 0xe9], '/inner.jpg'), 'inner');

    const reported: string[] = [];
    const files = [...listFiles(root, new FileFilter(['*.jpg']), { onUnsupportedName: entry => reported.push(entry) })];

    expect(files).toEqual([
      join(root, 'a.jpg'),
      join(root, 'b.jpg'),
      join(root, '.cache/d.jpg'),
      join(root, 'sub/c.jpg'),
      join(root, 'zdir/e.jpg'),
    ]);
    expect(reported).toEqual([join(root, 'caf\uFFFD.jpg'), join(root, 'd\uFFFD')]);
  });

  it.runIf(process.platform === 'linux')('warns about a name that is not valid UTF-8 by default', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    writeFileSync(rawName(root, [0x63, 0x61, 0x66, 0xe9], '.jpg'), 'raw');

    const files = [...listFiles(root, new FileFilter(['caf*']))];

    expect(files).toEqual([]);
    expect(logger.getLogs('warn').map(entry => entry.message)).toEqual([
      `Skipping file name that is not valid UTF-8: ${join(root, 'caf\uFFFD.jpg')}`,
    ]);
  });

  it('warns about an unreadable directory and yields nothing from it', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const files = [...listFiles(join(root, 'missing'), new FileFilter())];

    expect(files).toEqual([]);
    expect(logger.getLogs('warn')).toHaveLength(1);
    expect(logger.getLogs('warn')[0].message).toBe(`Skipping unreadable directory: ${join(root, 'missing')}`);
  });
});
