import path from 'path';
import Logger from '../logger/Logger';
import { createFileInfo, fileSignature, pathExists, statFile } from '../files/fileInfo';
import { RuleSet } from '../rules/types';
import { MetadataStore } from '../store/MetadataStore';
import { errorMessage } from '../utils/errors';
import { EventChannel } from '../utils/queue';
import { CanonicalAction, HandleOutcome, RawFileEvent } from './types';

export interface NormalizerStats {
  eventsObserved: number;
  applied: number;
  skipped: number;
  failed: number;
  ignored: number;
}

/** Maps a raw notification to its canonical action; null when there is nothing to do. */
export function normalize(event: RawFileEvent): CanonicalAction | null {
  const [first, second] = event.paths.map((p) => path.resolve(p));
  if (first === undefined) return null;

  switch (event.kind) {
    case 'create':
      return { type: 'Created', path: first };
    case 'remove':
      return { type: 'Removed', path: first };
    case 'modify-metadata':
      return { type: 'MetadataChanged', path: first };
    case 'modify-data':
      return { type: 'ContentChanged', path: first };
    case 'modify-name':
      return second === undefined ? null : { type: 'Renamed', from: first, to: second };
    case 'other':
      return null;
  }
}

/**
 * Applies canonical actions to the metadata store and rescores whatever
 * changed. Removal and creation are re-checked against the filesystem first
 * so stale or duplicated notifications cannot desync the store. handle()
 * never rejects: a failed event is logged and the stream moves on.
 */
export class EventNormalizer {
  private stats: NormalizerStats = { eventsObserved: 0, applied: 0, skipped: 0, failed: 0, ignored: 0 };

  constructor(
    private readonly store: MetadataStore,
    private readonly ruleSet: RuleSet
  ) {}

  async handle(event: RawFileEvent): Promise<HandleOutcome> {
    this.stats.eventsObserved++;
    const action = normalize(event);
    if (!action) {
      Logger.debug('Event ignored', { kind: event.kind, paths: event.paths });
      return this.finish({ action: null, status: 'ignored' });
    }

    try {
      return this.finish(await this.apply(action));
    } catch (error) {
      Logger.error('Event handling failed', {
        action: action.type,
        path: action.type === 'Renamed' ? `${action.from} -> ${action.to}` : action.path,
        error: errorMessage(error),
      });
      return this.finish({ action, status: 'failed', reason: errorMessage(error) });
    }
  }

  private async apply(action: CanonicalAction): Promise<HandleOutcome> {
    switch (action.type) {
      case 'Removed': {
        Logger.info('File removed', { path: action.path });
        if (await pathExists(action.path)) {
          Logger.error('Trying to remove a file that still exists', { path: action.path });
          return { action, status: 'skipped', reason: 'file still exists' };
        }
        this.store.remove(action.path);
        return { action, status: 'applied' };
      }
      case 'Created': {
        Logger.info('File created', { path: action.path });
        if (!(await pathExists(action.path))) {
          Logger.error('Trying to add a file that does not exist', { path: action.path });
          return { action, status: 'skipped', reason: 'file does not exist' };
        }
        if (this.store.has(action.path)) {
          Logger.debug('File already tracked', { path: action.path });
          return { action, status: 'skipped', reason: 'already tracked' };
        }
        const info = await createFileInfo(action.path);
        if (!info) {
          return { action, status: 'skipped', reason: 'not a regular file' };
        }
        this.store.add(info);
        return this.rescore(action, action.path);
      }
      case 'MetadataChanged': {
        Logger.info('Metadata modification', { path: action.path });
        this.store.updateStat(action.path, await statFile(action.path));
        return this.rescore(action, action.path);
      }
      case 'ContentChanged': {
        Logger.info('File content modified', { path: action.path });
        const signature = await fileSignature(action.path);
        this.store.updateSignature(action.path, signature);
        return this.rescore(action, action.path);
      }
      case 'Renamed': {
        Logger.info('File moved', { from: action.from, to: action.to });
        this.store.updatePath(action.from, action.to);
        return this.rescore(action, action.to);
      }
    }
  }

  private rescore(action: CanonicalAction, filePath: string): HandleOutcome {
    const score = this.store.updateGrade(filePath, this.ruleSet);
    Logger.debug('TidyScore updated', { path: filePath, score });
    return { action, status: 'applied', score };
  }

  private finish(outcome: HandleOutcome): HandleOutcome {
    this.stats[outcome.status]++;
    return outcome;
  }

  getStats(): NormalizerStats {
    return { ...this.stats };
  }
}

/**
 * The single consumer: handles one event at a time, in channel order, until
 * the channel is closed and drained.
 */
export async function runConsumer(channel: EventChannel<RawFileEvent>, normalizer: EventNormalizer): Promise<void> {
  for await (const event of channel) {
    await normalizer.handle(event);
  }
  Logger.info('Event consumer stopped', normalizer.getStats());
}
