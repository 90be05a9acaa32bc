import Database from 'better-sqlite3';
import Logger from '../logger/Logger';
import { StoreConfig } from '../utils/config';
import { StoreBuildError } from './errors';
import { MetadataStore } from './MetadataStore';

type Fill = 'missing' | 'present';
type Slot<F extends Fill, T> = F extends 'present' ? T : undefined;

/**
 * Staged builder for MetadataStore. The type parameters record which inputs
 * have been supplied: `seal()` only type-checks once both the configuration
 * and the connection are present, and `build()` only on a sealed builder.
 *
 * ```ts
 * const store = MetadataStoreBuilder.create()
 *   .configure(config.store)
 *   .connection(openConnection(config.store))
 *   .seal()
 *   .build();
 * ```
 */
export class MetadataStoreBuilder<C extends Fill, H extends Fill, S extends boolean> {
  private constructor(
    private readonly config: Slot<C, StoreConfig>,
    private readonly handle: Slot<H, Database.Database>,
    // Only carries S, so sealed and unsealed builders are distinct types.
    private readonly sealed: S
  ) {}

  static create(): MetadataStoreBuilder<'missing', 'missing', false> {
    return new MetadataStoreBuilder<'missing', 'missing', false>(undefined, undefined, false);
  }

  configure(config: StoreConfig): MetadataStoreBuilder<'present', H, false> {
    return new MetadataStoreBuilder<'present', H, false>({ ...config }, this.handle, false);
  }

  connection(handle: Database.Database): MetadataStoreBuilder<C, 'present', false> {
    return new MetadataStoreBuilder<C, 'present', false>(this.config, handle, false);
  }

  seal(this: MetadataStoreBuilder<'present', 'present', false>): MetadataStoreBuilder<'present', 'present', true> {
    return new MetadataStoreBuilder<'present', 'present', true>(this.config, this.handle, true);
  }

  build(this: MetadataStoreBuilder<'present', 'present', true>): MetadataStore {
    if (!this.handle.open) {
      throw new StoreBuildError(`Connection to ${this.config.storageLocation} is closed`);
    }
    return new MetadataStore(this.config, this.handle);
  }
}

/** Opens the SQLite handle the builder needs. Use ':memory:' for a throwaway store. */
export function openConnection(config: StoreConfig): Database.Database {
  try {
    const db = new Database(config.storageLocation);
    db.pragma('journal_mode = WAL');
    Logger.debug('File database connection opened', { location: config.storageLocation });
    return db;
  } catch (error) {
    throw new StoreBuildError(
      `Cannot open file database at ${config.storageLocation}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
