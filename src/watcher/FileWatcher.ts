import { FSWatcher, watch } from 'chokidar';
import path from 'path';
import Logger from '../logger/Logger';
import { errorMessage } from '../utils/errors';
import { RawEventKind, RawFileEvent } from './types';

type EventListener = (event: RawFileEvent) => void;

export type StatSnapshot = { ino: number; size: number; mtimeMs: number };

interface PendingUnlink {
  path: string;
  timer: NodeJS.Timeout;
}

/**
 * Turns chokidar's add/change/unlink stream into raw notifications.
 * chokidar reports a rename as unlink + add; an unlink whose inode shows up
 * again within `renameWindowMs` becomes a single modify-name event.
 */
export class RawEventTranslator {
  private known = new Map<string, StatSnapshot>();
  private pendingUnlinks = new Map<number, PendingUnlink>();
  private seeded = new Set<string>();

  constructor(
    private readonly emit: EventListener,
    private readonly renameWindowMs: number
  ) {}

  /** Records a file seen during the initial scan without emitting anything. */
  seed(filePath: string, stats?: StatSnapshot): void {
    if (stats) this.known.set(filePath, snapshot(stats));
    this.seeded.add(filePath);
  }

  /** Emits create for each seeded path that `isTracked` rejects, then forgets the seeds. */
  reconcile(isTracked: (filePath: string) => boolean): void {
    const seeded = [...this.seeded];
    this.seeded.clear();
    for (const filePath of seeded) {
      if (!isTracked(filePath)) {
        this.send('create', [filePath]);
      }
    }
  }

  add(filePath: string, stats?: StatSnapshot): void {
    const pending = stats ? this.pendingUnlinks.get(stats.ino) : undefined;
    if (stats) this.known.set(filePath, snapshot(stats));

    if (stats && pending) {
      clearTimeout(pending.timer);
      this.pendingUnlinks.delete(stats.ino);
      this.send('modify-name', [pending.path, filePath]);
      return;
    }
    this.send('create', [filePath]);
  }

  change(filePath: string, stats?: StatSnapshot): void {
    const previous = this.known.get(filePath);
    if (stats) this.known.set(filePath, snapshot(stats));

    if (!stats || !previous || previous.size !== stats.size || previous.mtimeMs !== stats.mtimeMs) {
      // Content writes also move mtime, so the metadata follows.
      this.send('modify-data', [filePath]);
      this.send('modify-metadata', [filePath]);
      return;
    }
    this.send('modify-metadata', [filePath]);
  }

  unlink(filePath: string): void {
    const previous = this.known.get(filePath);
    this.known.delete(filePath);
    this.seeded.delete(filePath);

    if (!previous || this.renameWindowMs <= 0) {
      this.send('remove', [filePath]);
      return;
    }

    const stale = this.pendingUnlinks.get(previous.ino);
    if (stale) {
      clearTimeout(stale.timer);
      this.send('remove', [stale.path]);
    }
    const timer = setTimeout(() => {
      this.pendingUnlinks.delete(previous.ino);
      this.send('remove', [filePath]);
    }, this.renameWindowMs);
    this.pendingUnlinks.set(previous.ino, { path: filePath, timer });
  }

  /** Emits every unlink still waiting for a matching add. */
  flush(): void {
    for (const pending of this.pendingUnlinks.values()) {
      clearTimeout(pending.timer);
      this.send('remove', [pending.path]);
    }
    this.pendingUnlinks.clear();
  }

  private send(kind: RawEventKind, paths: string[]): void {
    this.emit({ kind, paths, timestamp: Date.now() });
  }
}

function snapshot(stats: StatSnapshot): StatSnapshot {
  return { ino: stats.ino, size: stats.size, mtimeMs: stats.mtimeMs };
}

export interface FileWatcherOptions {
  renameWindowMs?: number;
  /** Files from the initial scan that this rejects are reported as created once the watcher is ready. */
  isTracked?: (filePath: string) => boolean;
}

/** Single producer of raw notifications for every watched directory. */
export class FileWatcher {
  private watcher: FSWatcher | null = null;
  private listeners: EventListener[] = [];
  private translator: RawEventTranslator;
  private ready = false;
  private readonly isTracked: (filePath: string) => boolean;

  constructor(
    private readonly dirs: string[],
    options: FileWatcherOptions = {}
  ) {
    this.isTracked = options.isTracked ?? (() => true);
    this.translator = new RawEventTranslator((event) => this.emitEvent(event), options.renameWindowMs ?? 500);
  }

  start(): void {
    if (this.watcher) return;

    this.watcher = watch(this.dirs, {
      ignored: /(^|[/\\])\../, // dotfiles
      persistent: true,
      ignoreInitial: false,
      alwaysStat: true,
      awaitWriteFinish: {
        stabilityThreshold: 200,
        pollInterval: 50,
      },
    });

    this.watcher
      .on('add', (filePath, stats) => {
        const absolute = path.resolve(filePath);
        if (this.ready) {
          this.translator.add(absolute, stats);
        } else {
          this.translator.seed(absolute, stats);
        }
      })
      .on('change', (filePath, stats) => this.translator.change(path.resolve(filePath), stats))
      .on('unlink', (filePath) => this.translator.unlink(path.resolve(filePath)))
      .on('ready', () => {
        this.ready = true;
        this.translator.reconcile(this.isTracked);
        Logger.info('File watcher ready', { dirs: this.dirs });
      })
      .on('error', (error) => {
        Logger.error('File watcher error', { error: errorMessage(error) });
      });

    Logger.info('File watcher started', { dirs: this.dirs });
  }

  onEvent(listener: EventListener): void {
    this.listeners.push(listener);
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    const watcher = this.watcher;
    this.watcher = null;
    this.ready = false;
    await watcher.close();
    this.translator.flush();
    Logger.info('File watcher stopped');
  }

  private emitEvent(event: RawFileEvent): void {
    Logger.debug('Raw file event', { kind: event.kind, paths: event.paths });
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        Logger.error('File event listener failed', { kind: event.kind, error: errorMessage(error) });
      }
    }
  }
}
