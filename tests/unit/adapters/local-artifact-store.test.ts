import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { LocalDirectoryArtifactStore } from '../../../src/adapters/local-artifact-store.js';
import { createArtifactStore, matchesPrefix, normalizeStorePath } from '../../../src/adapters/artifact-store.js';
import { HubArtifactStore } from '../../../src/adapters/hub-artifact-store.js';
import { ArtifactStoreError } from '../../../src/api/errors.js';
import { makePipelineConfig, makeTempDir } from '../../helpers/fixtures.js';

const REF = 'acme/tiny';

describe('LocalDirectoryArtifactStore', () => {
  let testDir: string;
  let storeRoot: string;
  let store: LocalDirectoryArtifactStore;

  const writeFile = async (file: string, content = 'x'): Promise<void> => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
  };

  beforeEach(async () => {
    testDir = await makeTempDir('dir-store');
    storeRoot = path.join(testDir, 'store');
    store = new LocalDirectoryArtifactStore(storeRoot);
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('reports a missing ref as not found', async () => {
    const error = await store.list(REF).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ArtifactStoreError);
    expect(error instanceof ArtifactStoreError && error.reason).toBe('NOT_FOUND');
  });

  it('lists files under a prefix', async () => {
    await writeFile(path.join(storeRoot, REF, 'engines', 'sm89', 'rank0.engine'));
    await writeFile(path.join(storeRoot, REF, 'engines-old', 'rank0.engine'));
    await writeFile(path.join(storeRoot, REF, 'checkpoints', 'config.json'));

    expect(await store.list(REF, 'engines/')).toEqual(['engines/sm89/rank0.engine']);
    expect(await store.list(REF)).toEqual([
      'checkpoints/config.json',
      'engines-old/rank0.engine',
      'engines/sm89/rank0.engine',
    ]);
  });

  it('uploads a directory, replacing what was under the prefix', async () => {
    const source = path.join(testDir, 'engine');
    await writeFile(path.join(source, 'rank0.engine'));
    await writeFile(path.join(source, 'plugins', 'attn.so'));

    expect(await store.upload(REF, source, 'engines/sm89')).toBe(2);

    await fs.rm(path.join(source, 'plugins'), { recursive: true });
    expect(await store.upload(REF, source, 'engines/sm89')).toBe(1);
    expect(await store.list(REF)).toEqual(['engines/sm89/rank0.engine']);
  });

  it('downloads only the requested prefixes', async () => {
    await writeFile(path.join(storeRoot, REF, 'engines', 'sm89', 'rank0.engine'), 'engine');
    await writeFile(path.join(storeRoot, REF, 'checkpoints', 'config.json'));
    const target = path.join(testDir, 'download');

    const files = await store.download(REF, ['engines/sm89'], target);

    expect(files).toEqual(['engines/sm89/rank0.engine']);
    expect(await fs.readFile(path.join(target, 'engines', 'sm89', 'rank0.engine'), 'utf8')).toBe('engine');
    await expect(fs.access(path.join(target, 'checkpoints'))).rejects.toThrow();
  });

  it('fails a download that matches nothing', async () => {
    await writeFile(path.join(storeRoot, REF, 'checkpoints', 'config.json'));

    await expect(store.download(REF, ['engines'], path.join(testDir, 'download'))).rejects.toThrow(
      `Nothing under engines in ${path.join(storeRoot, 'acme', 'tiny')}`
    );
  });

  it('rejects refs that escape the store root', async () => {
    await expect(store.list('../outside')).rejects.toThrow("Store path may not contain '..': ../outside");
  });
});

describe('store paths', () => {
  it('normalizes separators and surrounding slashes', () => {
    expect(normalizeStorePath('/engines\\sm89/')).toBe('engines/sm89');
    expect(normalizeStorePath('')).toBe('');
  });

  it('matches whole path segments only', () => {
    expect(matchesPrefix('engines/sm89/rank0.engine', 'engines')).toBe(true);
    expect(matchesPrefix('engines-old/rank0.engine', 'engines')).toBe(false);
    expect(matchesPrefix('anything', '')).toBe(true);
  });
});

describe('createArtifactStore', () => {
  const options = { hubCli: { command: 'hub', args: [] } };

  it('returns null when remote storage is disabled', () => {
    expect(createArtifactStore(makePipelineConfig('/srv/build').remote, options)).toBeNull();
  });

  it('builds the configured store kind', () => {
    const directory = createArtifactStore(
      makePipelineConfig('/srv/build', { kind: 'directory', directoryRoot: '/mnt/artifacts' }).remote,
      options
    );
    const hub = createArtifactStore(makePipelineConfig('/srv/build', { kind: 'hub' }).remote, options);

    expect(directory).toBeInstanceOf(LocalDirectoryArtifactStore);
    expect(hub).toBeInstanceOf(HubArtifactStore);
  });
});
