import express, { Request, Response } from 'express';
import { Server } from 'http';
import Logger from '../logger/Logger';
import { AgentStatus } from '../agent/AgentStatus';
import { HubClient } from '../hub/HubClient';
import { MetadataStore } from '../store/MetadataStore';
import { FileRecord } from '../store/types';
import { EventNormalizer } from '../watcher/EventNormalizer';

export type SortKey = 'size' | 'last_update';

export interface FileView {
  path: string;
  size: number;
  content_signature: string;
  last_modified: number;
  tidy_score: number | null;
}

export function toFileView(record: FileRecord): FileView {
  return {
    path: record.path,
    size: record.size,
    content_signature: record.contentSignature,
    last_modified: record.lastModified,
    tidy_score: record.tidyScore,
  };
}

export function parseSortKey(value: string): SortKey | null {
  const normalized = value.toLowerCase();
  return normalized === 'size' || normalized === 'last_update' ? normalized : null;
}

/** Top `count` records, largest or most recently modified first. */
export function selectFiles(records: FileRecord[], count: number, sortBy: SortKey): FileRecord[] {
  const sorted = [...records].sort((a, b) =>
    sortBy === 'size' ? b.size - a.size : b.lastModified - a.lastModified
  );
  return sorted.slice(0, count);
}

export interface APIServerOptions {
  host: string;
  port: number;
  store: MetadataStore;
  status: AgentStatus;
  hub?: HubClient;
  normalizer?: EventNormalizer;
  /** winston level for per-request log lines. */
  requestLogLevel?: string;
}

/** Read-only query surface over the metadata store and the agent status. */
export class APIServer {
  private app: express.Express;
  private server?: Server;

  constructor(private readonly options: APIServerOptions) {
    this.app = express();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    const requestLogLevel = this.options.requestLogLevel ?? 'debug';
    this.app.use((req, res, next) => {
      const started = Date.now();
      res.on('finish', () => {
        Logger.log(requestLogLevel, 'API request', {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - started,
        });
      });
      next();
    });

    this.app.get('/', (_req: Request, res: Response) => {
      res.json({ message: 'hello world' });
    });

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    this.app.get('/get_status', (_req: Request, res: Response) => {
      try {
        res.json({
          ...this.options.status.snapshot(),
          hub: this.options.hub ? this.options.hub.getState() : null,
          events: this.options.normalizer ? this.options.normalizer.getStats() : null,
          tracked_files: this.options.store.count(),
        });
      } catch (error) {
        Logger.error('API: Failed to get status', { error });
        res.status(500).json({ error: 'Internal server error' });
      }
    });

    this.app.get('/get_files/:nb_files/sorted_by/:sort_type', (req: Request, res: Response) => {
      const count = Number(req.params.nb_files);
      if (!Number.isInteger(count) || count < 0) {
        res.status(400).json({ error: 'Validation failed', details: { nb_files: 'Must be a non-negative integer' } });
        return;
      }

      let sortBy = parseSortKey(req.params.sort_type);
      if (!sortBy) {
        Logger.error('Invalid sort parameter in get_files route. Defaulting to size.', {
          sortType: req.params.sort_type,
        });
        sortBy = 'size';
      }

      try {
        const files = selectFiles(this.options.store.listAll(), count, sortBy).map(toFileView);
        res.json(files);
      } catch (error) {
        Logger.error('API: Failed to list files', { error });
        res.status(500).json({ error: 'Internal server error' });
      }
    });
  }

  /** Starts listening; resolves with the bound port (useful with port 0). */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.options.port, this.options.host, () => {
        const address = server.address();
        const port = address && typeof address === 'object' ? address.port : this.options.port;
        Logger.info('API server started', { host: this.options.host, port });
        resolve(port);
      });
      server.once('error', (error) => {
        Logger.error('API server failed to start', { error: error.message });
        reject(error);
      });
      this.server = server;
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        Logger.info('API server stopped');
        resolve();
      });
      this.server = undefined;
    });
  }
}
