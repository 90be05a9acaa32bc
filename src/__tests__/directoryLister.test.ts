import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { listDirectories, pruneVanishedFiles, registerListedFiles } from '../lister/DirectoryLister';
import { parseRuleSet } from '../rules/RuleLoader';
import { MetadataStoreBuilder, openConnection } from '../store/MetadataStoreBuilder';

describe('listDirectories', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'lister-test-')));
    await fs.mkdir(path.join(tempDir, 'nested', 'deeper'), { recursive: true });
    await fs.mkdir(path.join(tempDir, '.cache'));
    await fs.writeFile(path.join(tempDir, 'top.txt'), 'top');
    await fs.writeFile(path.join(tempDir, 'nested', 'deeper', 'old.tmp'), 'stale data');
    await fs.writeFile(path.join(tempDir, '.hidden'), 'secret');
    await fs.writeFile(path.join(tempDir, '.cache', 'entry.bin'), 'cached');
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('walks nested directories and skips dotfiles', async () => {
    const { files, failures } = await listDirectories([tempDir]);

    expect(failures).toEqual([]);
    expect(files.map((f) => f.path).sort()).toEqual([
      path.join(tempDir, 'nested', 'deeper', 'old.tmp'),
      path.join(tempDir, 'top.txt'),
    ]);
    const top = files.find((f) => f.path.endsWith('top.txt'));
    expect(top?.size).toBe(3);
    expect(top?.contentSignature).toMatch(/^[0-9a-f]{64}$/);
  });

  it('reports a missing directory and keeps going', async () => {
    const missing = path.join(tempDir, 'does-not-exist');

    const { files, failures } = await listDirectories([missing, path.join(tempDir, 'nested')]);

    expect(files).toHaveLength(1);
    expect(failures.map((f) => f.path)).toEqual([missing]);
  });

  it('registers listed files and scores them, replacing records from an earlier run', async () => {
    const storeConfig = { storageLocation: ':memory:', dropOnStart: false };
    const store = MetadataStoreBuilder.create().configure(storeConfig).connection(openConnection(storeConfig)).seal().build();
    store.initDb();
    const { ruleSet } = parseRuleSet('{"kind":"extension","name":"temporary","weight":-3,"extensions":[".tmp"]}', 'inline');
    const { files } = await listDirectories([tempDir]);
    const oldPath = path.join(tempDir, 'nested', 'deeper', 'old.tmp');
    store.add({ path: oldPath, size: 1, lastModified: 1, contentSignature: 'previous-run' });

    expect(registerListedFiles(store, ruleSet, files)).toEqual({ added: 2, failed: 0 });
    expect(store.get(oldPath)).toMatchObject({ size: 10, tidyScore: -3 });
    expect(store.get(path.join(tempDir, 'top.txt'))?.tidyScore).toBe(0);
    store.close();
  });

  it('prunes records of files that vanished under the listed directories only', async () => {
    const storeConfig = { storageLocation: ':memory:', dropOnStart: false };
    const store = MetadataStoreBuilder.create().configure(storeConfig).connection(openConnection(storeConfig)).seal().build();
    store.initDb();
    const { ruleSet } = parseRuleSet('', 'inline');
    const { files } = await listDirectories([tempDir]);
    registerListedFiles(store, ruleSet, files);
    const gone = path.join(tempDir, 'nested', 'deleted-while-down.txt');
    const elsewhere = path.join(path.dirname(tempDir), 'outside-listing', 'kept.txt');
    store.add({ path: gone, size: 1, lastModified: 1, contentSignature: 'old' });
    store.add({ path: elsewhere, size: 1, lastModified: 1, contentSignature: 'old' });

    expect(await pruneVanishedFiles(store, [tempDir], files)).toEqual({ pruned: 1, failed: 0 });
    expect(store.has(gone)).toBe(false);
    expect(store.has(elsewhere)).toBe(true);
    expect(store.count()).toBe(3);
    store.close();
  });

  it('keeps a record that the walk missed but that still exists on disk', async () => {
    const storeConfig = { storageLocation: ':memory:', dropOnStart: false };
    const store = MetadataStoreBuilder.create().configure(storeConfig).connection(openConnection(storeConfig)).seal().build();
    store.initDb();
    const top = path.join(tempDir, 'top.txt');
    store.add({ path: top, size: 3, lastModified: 1, contentSignature: 'old' });

    expect(await pruneVanishedFiles(store, [tempDir], [])).toEqual({ pruned: 0, failed: 0 });
    expect(store.has(top)).toBe(true);
    store.close();
  });
});
