import Logger, { configureLogger, resolveLogLevel } from './logger/Logger';
import { Config, loadConfig } from './utils/config';
import { errorMessage } from './utils/errors';
import { EventChannel } from './utils/queue';
import { AgentStatus } from './agent/AgentStatus';
import { APIServer } from './api/APIServer';
import { HubClient } from './hub/HubClient';
import { listDirectories, pruneVanishedFiles, registerListedFiles } from './lister/DirectoryLister';
import { Notifier } from './notifications/Notifier';
import { describeLoadError, loadRuleSet } from './rules/RuleLoader';
import { RuleSet } from './rules/types';
import { MetadataStore } from './store/MetadataStore';
import { MetadataStoreBuilder, openConnection } from './store/MetadataStoreBuilder';
import { EventNormalizer, runConsumer } from './watcher/EventNormalizer';
import { FileWatcher } from './watcher/FileWatcher';
import { RawFileEvent } from './watcher/types';

class TidyAgent {
  private store: MetadataStore;
  private channel = new EventChannel<RawFileEvent>('file-events');
  private fileWatcher: FileWatcher;
  private notifier: Notifier;
  private hubClient: HubClient;
  private status: AgentStatus;
  private apiServer: APIServer | null = null;
  private consumer: Promise<void> | null = null;
  private shuttingDown = false;

  constructor(private readonly config: Config) {
    // Throws on an unusable database; main() treats that as fatal.
    const handle = openConnection(config.store);
    this.store = MetadataStoreBuilder.create().configure(config.store).connection(handle).seal().build();
    Logger.info('File database successfully created', { location: config.store.storageLocation });
    this.store.initDb();

    this.notifier = new Notifier(config.notificationsEnabled);
    this.status = new AgentStatus(config.agentData, config.fileWatcher.dirs);
    this.hubClient = new HubClient(config.hub, {
      registration: () => this.status.snapshot(),
      onGiveUp: (attempts) => this.notifier.notifyHubUnreachable(this.hubClient.baseUrl, attempts),
    });
    this.fileWatcher = new FileWatcher(config.fileWatcher.dirs, {
      renameWindowMs: config.fileWatcher.renameWindowMs,
      isTracked: (filePath) => this.store.has(filePath),
    });
  }

  async start(): Promise<void> {
    Logger.info('Tidy agent starting', { pid: process.pid });

    const ruleSet = await this.loadRules();

    const listing = await listDirectories(this.config.fileLister.dirs);
    const registered = registerListedFiles(this.store, ruleSet, listing.files);
    const pruned = await pruneVanishedFiles(this.store, this.config.fileLister.dirs, listing.files);
    Logger.info('Listed files registered', { ...registered, ...pruned, unreadable: listing.failures.length });
    this.store.updateAllGrades(ruleSet);

    const normalizer = new EventNormalizer(this.store, ruleSet);
    this.consumer = runConsumer(this.channel, normalizer);
    this.fileWatcher.onEvent((event) => {
      this.channel.push(event);
    });
    this.fileWatcher.start();

    this.apiServer = new APIServer({
      host: this.config.server.host,
      port: this.config.server.port,
      store: this.store,
      status: this.status,
      hub: this.hubClient,
      normalizer,
      requestLogLevel: resolveLogLevel(this.config.server.logLevel),
    });
    await this.apiServer.start();

    this.hubClient
      .connect()
      .then((result) => {
        if (!result.connected) {
          Logger.error('Hub unavailable, continuing without it', { attempts: result.attempts });
        }
      })
      .catch((error) => {
        Logger.error('Hub connection loop crashed', { error: errorMessage(error) });
      });

    this.setupShutdownHandlers();
    Logger.info('Tidy agent running', {
      watched: this.config.fileWatcher.dirs,
      listed: this.config.fileLister.dirs,
      rules: ruleSet.rules.length,
      trackedFiles: this.store.count(),
    });
  }

  private async loadRules(): Promise<RuleSet> {
    const { ruleSet, loaded, errors } = await loadRuleSet(this.config.rulesPath);
    if (errors.length > 0) {
      Logger.error('Some rules could not be loaded', {
        path: this.config.rulesPath,
        errors: errors.map(describeLoadError),
      });
    }
    Logger.info(`Successfully loaded ${loaded} rules`, { path: this.config.rulesPath });
    return ruleSet;
  }

  async shutdown(signal: string): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    Logger.info('Shutdown signal received', { signal });

    await this.fileWatcher.stop();
    this.channel.close();
    if (this.consumer) {
      await this.consumer;
    }
    if (this.apiServer) {
      await this.apiServer.stop();
    }
    await this.hubClient.disconnect();
    this.store.close();
    Logger.info('Agent stopped');
  }

  private setupShutdownHandlers(): void {
    const onSignal = (signal: NodeJS.Signals) => {
      this.shutdown(signal)
        .then(() => process.exit(0))
        .catch((error) => {
          Logger.error('Shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
    process.on('uncaughtException', (error) => {
      Logger.error('Uncaught exception', { error: error.message, stack: error.stack });
      this.notifier.notifyError(`Agent crashed: ${error.message}`);
      process.exit(1);
    });
    process.on('unhandledRejection', (reason) => {
      Logger.error('Unhandled rejection', { reason });
    });
  }
}

function main(): void {
  let agent: TidyAgent;
  try {
    const config = loadConfig();
    configureLogger(config.logger);
    agent = new TidyAgent(config);
  } catch (error) {
    Logger.error('Failed to initialize agent', { error: errorMessage(error) });
    console.error('Failed to initialize agent:', errorMessage(error));
    process.exit(1);
  }

  agent.start().catch((error) => {
    Logger.error('Failed to start agent', { error: errorMessage(error) });
    console.error('Failed to start agent:', errorMessage(error));
    process.exit(1);
  });
}

main();
