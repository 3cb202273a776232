import { access, mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../shell.js', () => ({
  isAvailable: vi.fn(),
  runWithSpinner: vi.fn()
}));

import { CommandFailedError, UnknownMethodError } from '../errors.js';
import { descriptionsDir } from '../methods/base.js';
import { CvsStrategy } from '../methods/cvs.js';
import { PointStrategy } from '../methods/point.js';
import { createRegistry, isUpdateMethod, strategyFor } from '../methods/registry.js';
import { RsyncStrategy } from '../methods/rsync.js';
import { isAvailable, runWithSpinner } from '../shell.js';

let basepath: string;

async function exists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}

beforeEach(async () => {
  basepath = await mkdtemp(join(tmpdir(), 'tendril-methods-test-'));
  vi.mocked(isAvailable).mockResolvedValue(true);
  vi.mocked(runWithSpinner).mockResolvedValue(undefined);
});

afterEach(async () => {
  await rm(basepath, { recursive: true, force: true });
  vi.clearAllMocks();
});

describe('registry', () => {
  const options = {
    basepath: '/opt/tendril',
    rsyncMirror: 'rsync://mirror.test/descriptions/',
    cvsRoot: ':pserver:anonymous@cvs.test:/cvsroot',
    pointUrl: 'https://dist.test/descriptions.tar.gz'
  };

  it('registers one strategy per method', () => {
    const registry = createRegistry(options);

    expect(Object.keys(registry)).toEqual(['rsync', 'cvs', 'point']);
    expect(registry.rsync.method).toBe('rsync');
    expect(registry.cvs.method).toBe('cvs');
    expect(registry.point.method).toBe('point');
  });

  it('looks up registered methods and rejects others', () => {
    const registry = createRegistry(options);

    expect(strategyFor(registry, 'cvs')).toBe(registry.cvs);
    expect(() => strategyFor(registry, 'ftp')).toThrow(UnknownMethodError);
    expect(isUpdateMethod('point')).toBe(true);
    expect(isUpdateMethod('Point')).toBe(false);
  });
});

describe('stamps', () => {
  it('sets, reports and clears the stamp file', async () => {
    const strategy = new RsyncStrategy({ basepath }, 'rsync://mirror.test/descriptions/');

    expect(await strategy.isStamped()).toBe(false);
    await strategy.stampSet();
    expect(await strategy.isStamped()).toBe(true);
    expect(strategy.stampPath).toBe(join(basepath, 'var', 'lib', 'tendril', 'stamp-rsync'));

    await strategy.stampClear();
    expect(await strategy.isStamped()).toBe(false);
  });

  it('keeps the stamps of different methods apart', async () => {
    const rsync = new RsyncStrategy({ basepath }, 'rsync://mirror.test/descriptions/');
    const cvs = new CvsStrategy({ basepath }, ':pserver:anonymous@cvs.test:/cvsroot');

    await rsync.stampSet();
    await cvs.stampClear();

    expect(await rsync.isStamped()).toBe(true);
    expect(await cvs.isStamped()).toBe(false);
  });
});

describe('RsyncStrategy', () => {
  it('checks for the rsync binary', async () => {
    vi.mocked(isAvailable).mockResolvedValue(false);
    const strategy = new RsyncStrategy({ basepath }, 'rsync://mirror.test/descriptions');

    expect(await strategy.systemCheck()).toBe(false);
    expect(isAvailable).toHaveBeenCalledWith('rsync');
  });

  it('mirrors into the description tree', async () => {
    const strategy = new RsyncStrategy({ basepath }, 'rsync://mirror.test/descriptions');

    await strategy.doDirect();

    const tree = descriptionsDir(basepath);
    expect(runWithSpinner).toHaveBeenCalledWith(
      'Synchronizing package descriptions (rsync)',
      'rsync',
      ['-rtz', '--delete-after', 'rsync://mirror.test/descriptions/', `${tree}/`],
      { debug: undefined }
    );
  });

  it('removes its timestamp file as metadata', async () => {
    const tree = descriptionsDir(basepath);
    await mkdir(tree, { recursive: true });
    await writeFile(join(tree, 'TIMESTAMP'), '1700000000\n');
    await writeFile(join(tree, 'tendril.info'), 'Package: tendril\n');

    await new RsyncStrategy({ basepath }, 'rsync://mirror.test/').clearMetadata();

    expect(await readdir(tree)).toEqual(['tendril.info']);
  });
});

describe('CvsStrategy', () => {
  const root = ':pserver:anonymous@cvs.test:/cvsroot';

  it('checks out a fresh tree from the parent directory', async () => {
    const strategy = new CvsStrategy({ basepath, debug: true }, root);

    await strategy.doDirect();

    const tree = descriptionsDir(basepath);
    expect(runWithSpinner).toHaveBeenCalledWith(
      'Synchronizing package descriptions (cvs)',
      'cvs',
      ['-z3', '-d', root, 'checkout', '-P', '-d', 'descriptions', 'descriptions'],
      { debug: true, cwd: join(basepath, 'share', 'tendril') }
    );
    expect(tree.endsWith(join('share', 'tendril', 'descriptions'))).toBe(true);
  });

  it('updates an existing checkout in place', async () => {
    const tree = descriptionsDir(basepath);
    await mkdir(join(tree, 'CVS'), { recursive: true });

    await new CvsStrategy({ basepath }, root).doDirect();

    expect(runWithSpinner).toHaveBeenCalledWith(
      'Synchronizing package descriptions (cvs)',
      'cvs',
      ['-z3', 'update', '-d', '-P'],
      { debug: undefined, cwd: tree }
    );
  });

  it('removes every CVS directory but keeps the descriptions', async () => {
    const tree = descriptionsDir(basepath);
    await mkdir(join(tree, 'CVS'), { recursive: true });
    await mkdir(join(tree, 'main', 'CVS'), { recursive: true });
    await writeFile(join(tree, 'main', 'tendril.info'), 'Package: tendril\n');

    await new CvsStrategy({ basepath }, root).clearMetadata();

    expect(await exists(join(tree, 'CVS'))).toBe(false);
    expect(await exists(join(tree, 'main', 'CVS'))).toBe(false);
    expect(await exists(join(tree, 'main', 'tendril.info'))).toBe(true);
  });

  it('clears nothing when no tree exists yet', async () => {
    await expect(new CvsStrategy({ basepath }, root).clearMetadata()).resolves.toBeUndefined();
  });
});

describe('PointStrategy', () => {
  const url = 'https://dist.test/descriptions.tar.gz';

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('downloads the tarball and unpacks it over the tree', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('tarball-bytes', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await new PointStrategy({ basepath }, url).doDirect();

    expect(fetchMock).toHaveBeenCalledWith(url);
    expect(runWithSpinner).toHaveBeenCalledWith(
      'Unpacking package descriptions',
      'tar',
      ['-xzf', expect.stringMatching(/descriptions\.tar\.gz$/), '-C', descriptionsDir(basepath), '--strip-components=1'],
      { debug: undefined }
    );
  });

  it('fails without unpacking when the download is refused', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('', { status: 404, statusText: 'Not Found' })));

    await expect(new PointStrategy({ basepath }, url).doDirect()).rejects.toThrow(CommandFailedError);
    expect(runWithSpinner).not.toHaveBeenCalled();
  });

  it('removes its VERSION file as metadata', async () => {
    const tree = descriptionsDir(basepath);
    await mkdir(tree, { recursive: true });
    await writeFile(join(tree, 'VERSION'), '0.4.0\n');

    await new PointStrategy({ basepath }, url).clearMetadata();

    expect(await readdir(tree)).toEqual([]);
  });
});
