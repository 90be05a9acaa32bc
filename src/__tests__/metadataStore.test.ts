import Database from 'better-sqlite3';
import { parseRuleSet } from '../rules/RuleLoader';
import { DuplicateKeyError, NotFoundError, StorageError, StoreBuildError } from '../store/errors';
import { MetadataStore } from '../store/MetadataStore';
import { MetadataStoreBuilder, openConnection } from '../store/MetadataStoreBuilder';
import { NewFileRecord } from '../store/types';
import { StoreConfig } from '../utils/config';

const config: StoreConfig = { storageLocation: ':memory:', dropOnStart: false };

function buildStore(storeConfig: StoreConfig = config, handle = openConnection(storeConfig)): MetadataStore {
  return MetadataStoreBuilder.create().configure(storeConfig).connection(handle).seal().build();
}

function record(filePath: string, overrides: Partial<NewFileRecord> = {}): NewFileRecord {
  return { path: filePath, size: 100, lastModified: 1700000000000, contentSignature: 'sig-1', ...overrides };
}

const { ruleSet } = parseRuleSet(
  [
    '{"kind":"extension","name":"temporary","weight":-3,"extensions":[".tmp"]}',
    '{"kind":"size","name":"heavy","weight":-2,"minBytes":1000}',
  ].join('\n'),
  'inline'
);

describe('MetadataStoreBuilder', () => {
  it('accepts configuration and connection in either order', () => {
    const handle = openConnection(config);
    const store = MetadataStoreBuilder.create().connection(handle).configure(config).seal().build();
    store.initDb();

    expect(store.count()).toBe(0);
    store.close();
  });

  it('refuses to build on a closed connection', () => {
    const handle = openConnection(config);
    const sealed = MetadataStoreBuilder.create().configure(config).connection(handle).seal();
    handle.close();

    expect(() => sealed.build()).toThrow(StoreBuildError);
  });
});

describe('MetadataStore', () => {
  let store: MetadataStore;

  beforeEach(() => {
    store = buildStore();
    store.initDb();
  });

  afterEach(() => {
    store.close();
  });

  it('adds a record once and lists it exactly once', () => {
    store.add(record('/data/a.txt'));

    const paths = store.listAll().map((r) => r.path);
    expect(paths).toEqual(['/data/a.txt']);
    expect(store.get('/data/a.txt')).toEqual({ ...record('/data/a.txt'), tidyScore: null });
  });

  it('rejects a second add for the same path', () => {
    store.add(record('/data/a.txt'));

    expect(() => store.add(record('/data/a.txt', { size: 5 }))).toThrow(DuplicateKeyError);
    expect(store.get('/data/a.txt')?.size).toBe(100);
  });

  it('replaces the attributes and clears the score with the replace policy', () => {
    store.add(record('/data/a.txt'));
    store.setScore('/data/a.txt', 7);

    store.add(record('/data/a.txt', { size: 5, contentSignature: 'sig-2' }), { onConflict: 'replace' });

    expect(store.get('/data/a.txt')).toEqual({
      path: '/data/a.txt',
      size: 5,
      lastModified: 1700000000000,
      contentSignature: 'sig-2',
      tidyScore: null,
    });
    expect(store.count()).toBe(1);
  });

  it('fails the second remove of the same path', () => {
    store.add(record('/data/a.txt'));
    store.remove('/data/a.txt');

    expect(() => store.remove('/data/a.txt')).toThrow(NotFoundError);
    expect(store.has('/data/a.txt')).toBe(false);
  });

  it('restores the record after renaming there and back', () => {
    store.add(record('/data/a.txt'));
    store.setScore('/data/a.txt', -1);
    const original = store.get('/data/a.txt');

    store.updatePath('/data/a.txt', '/data/b.txt');
    expect(store.get('/data/a.txt')).toBeNull();
    expect(store.get('/data/b.txt')).toEqual({ ...original, path: '/data/b.txt' });

    store.updatePath('/data/b.txt', '/data/a.txt');
    expect(store.get('/data/a.txt')).toEqual(original);
  });

  it('rejects a rename onto a tracked path or from an untracked one', () => {
    store.add(record('/data/a.txt'));
    store.add(record('/data/b.txt'));

    expect(() => store.updatePath('/data/a.txt', '/data/b.txt')).toThrow(DuplicateKeyError);
    expect(() => store.updatePath('/data/missing.txt', '/data/c.txt')).toThrow(NotFoundError);
    expect(store.count()).toBe(2);
  });

  it('updates single fields and rejects updates for unknown paths', () => {
    store.add(record('/data/a.txt'));

    store.updateSignature('/data/a.txt', 'sig-9');
    store.updateLastModified('/data/a.txt', 1800000000000);
    store.updateSize('/data/a.txt', 42);

    expect(store.get('/data/a.txt')).toEqual({
      path: '/data/a.txt',
      size: 42,
      lastModified: 1800000000000,
      contentSignature: 'sig-9',
      tidyScore: null,
    });
    expect(() => store.updateSignature('/data/none', 'x')).toThrow(NotFoundError);
    expect(() => store.updateLastModified('/data/none', 1)).toThrow(NotFoundError);
    expect(() => store.updateSize('/data/none', 1)).toThrow(NotFoundError);
    expect(() => store.setScore('/data/none', 1)).toThrow(NotFoundError);
  });

  it('updates size and modification time together', () => {
    store.add(record('/data/a.txt'));

    store.updateStat('/data/a.txt', { size: 7, lastModified: 1900000000000 });

    expect(store.get('/data/a.txt')).toEqual({
      path: '/data/a.txt',
      size: 7,
      lastModified: 1900000000000,
      contentSignature: 'sig-1',
      tidyScore: null,
    });
    expect(() => store.updateStat('/data/none', { size: 1, lastModified: 1 })).toThrow(NotFoundError);
  });

  it('scores a record and writes the score back', () => {
    store.add(record('/data/big.tmp', { size: 5000 }));

    expect(store.updateGrade('/data/big.tmp', ruleSet)).toBe(-5);
    expect(store.get('/data/big.tmp')?.tidyScore).toBe(-5);
    expect(() => store.updateGrade('/data/none', ruleSet)).toThrow(NotFoundError);
  });

  it('rescores every record', () => {
    store.add(record('/data/a.tmp'));
    store.add(record('/data/b.txt', { size: 2000 }));

    expect(store.updateAllGrades(ruleSet)).toEqual({ scored: 2, failed: 0 });
    expect(store.get('/data/a.tmp')?.tidyScore).toBe(-3);
    expect(store.get('/data/b.txt')?.tidyScore).toBe(-2);
  });

  it('carries operation and path on store errors', () => {
    try {
      store.remove('/data/none');
      throw new Error('expected remove to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ operation: 'remove', path: '/data/none', message: 'No record for /data/none' });
    }
  });

  it('keeps list snapshots consistent with interleaved creates and removes', () => {
    const live = new Set<string>();
    const everAdded = new Set<string>();

    for (let i = 0; i < 200; i++) {
      const added = `/data/file-${i}.txt`;
      store.add(record(added));
      live.add(added);
      everAdded.add(added);

      if (i % 3 === 0 && i > 0) {
        const removed = `/data/file-${i - 1}.txt`;
        store.remove(removed);
        live.delete(removed);
      }

      if (i % 10 === 0) {
        const snapshot = store.listAll().map((r) => r.path);
        expect(new Set(snapshot).size).toBe(snapshot.length);
        expect(snapshot.every((p) => everAdded.has(p))).toBe(true);
        expect(snapshot.sort()).toEqual([...live].sort());
      }
    }
  });
});

describe('MetadataStore lifecycle', () => {
  it('throws StorageError before initDb', () => {
    const store = buildStore();

    expect(() => store.count()).toThrow(StorageError);
    expect(() => store.get('/data/a.txt')).toThrow('database not initialized, call initDb() first');
    store.close();
  });

  it('keeps records across initDb unless dropOnStart is set', () => {
    const handle = new Database(':memory:');
    const first = buildStore(config, handle);
    first.initDb();
    first.add(record('/data/a.txt'));

    const reopened = buildStore(config, handle);
    reopened.initDb();
    expect(reopened.count()).toBe(1);

    const dropping = buildStore({ ...config, dropOnStart: true }, handle);
    dropping.initDb();
    expect(dropping.count()).toBe(0);
    dropping.close();
  });

  it('wraps driver failures in StorageError', () => {
    const handle = new Database(':memory:');
    const store = buildStore(config, handle);
    store.initDb();
    handle.close();

    expect(() => store.count()).toThrow(StorageError);
  });
});
