import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

export interface AgentDataConfig {
  latestVersion: string;
  minimalVersion: string;
}

export interface HubConfig {
  host: string;
  port: number;
  protocol: 'http' | 'https';
  authPath: string;
  disconnectPath: string;
  /** 0 means retry forever. */
  connectionAttemptLimit: number;
  initialRetrySeconds: number;
  requestTimeoutMs: number;
}

export interface StoreConfig {
  storageLocation: string;
  dropOnStart: boolean;
}

export interface Config {
  agentData: AgentDataConfig;
  fileLister: { dirs: string[] };
  fileWatcher: { dirs: string[]; renameWindowMs: number };
  server: { host: string; port: number; logLevel: string };
  logger: { termLevel: string; fileLevel: string; dir: string };
  store: StoreConfig;
  hub: HubConfig;
  rulesPath: string;
  notificationsEnabled: boolean;
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: JsonObject, override: JsonObject): JsonObject {
  const result: JsonObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isObject(current) && isObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}

function readJson(filePath: string): JsonObject {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (!isObject(parsed)) {
    throw new ConfigError([`${filePath} must contain a JSON object`]);
  }
  return parsed;
}

function applyEnvOverrides(raw: JsonObject, env: NodeJS.ProcessEnv): JsonObject {
  const overrides: JsonObject = {};
  const section = (name: string): JsonObject => {
    const existing = overrides[name];
    if (isObject(existing)) return existing;
    const created: JsonObject = {};
    overrides[name] = created;
    return created;
  };

  if (env.LOG_LEVEL) section('logger').termLevel = env.LOG_LEVEL;
  if (env.LOG_DIR) section('logger').dir = env.LOG_DIR;
  if (env.API_PORT) section('server').port = Number(env.API_PORT);
  if (env.TIDY_DB_PATH) section('store').storageLocation = env.TIDY_DB_PATH;
  if (env.HUB_HOST) section('hub').host = env.HUB_HOST;
  if (env.HUB_PORT) section('hub').port = Number(env.HUB_PORT);

  return deepMerge(raw, overrides);
}

/**
 * Validates a merged raw configuration object. Collects every problem
 * before failing so an operator can fix the file in one pass.
 */
export function parseConfig(raw: JsonObject): Config {
  const problems: string[] = [];
  const at = (keyPath: string): unknown =>
    keyPath.split('.').reduce<unknown>((node, key) => (isObject(node) ? node[key] : undefined), raw);

  const str = (keyPath: string): string => {
    const value = at(keyPath);
    if (typeof value !== 'string' || value.length === 0) {
      problems.push(`${keyPath} must be a non-empty string`);
      return '';
    }
    return value;
  };
  const num = (keyPath: string, min = 0): number => {
    const value = at(keyPath);
    if (typeof value !== 'number' || !Number.isFinite(value) || value < min) {
      problems.push(`${keyPath} must be a number >= ${min}`);
      return min;
    }
    return value;
  };
  const bool = (keyPath: string): boolean => {
    const value = at(keyPath);
    if (typeof value !== 'boolean') {
      problems.push(`${keyPath} must be a boolean`);
      return false;
    }
    return value;
  };
  const dirs = (keyPath: string): string[] => {
    const value = at(keyPath);
    if (!Array.isArray(value) || !value.every((dir): dir is string => typeof dir === 'string')) {
      problems.push(`${keyPath} must be an array of paths`);
      return [];
    }
    return value.map((dir) => path.resolve(dir));
  };

  const protocol = str('hub.protocol');
  if (protocol && protocol !== 'http' && protocol !== 'https') {
    problems.push('hub.protocol must be "http" or "https"');
  }

  const config: Config = {
    agentData: {
      latestVersion: str('agentData.latestVersion'),
      minimalVersion: str('agentData.minimalVersion'),
    },
    fileLister: { dirs: dirs('fileLister.dirs') },
    fileWatcher: {
      dirs: dirs('fileWatcher.dirs'),
      renameWindowMs: num('fileWatcher.renameWindowMs'),
    },
    server: {
      host: str('server.host'),
      port: num('server.port', 1),
      logLevel: str('server.logLevel'),
    },
    logger: {
      termLevel: str('logger.termLevel'),
      fileLevel: str('logger.fileLevel'),
      dir: str('logger.dir'),
    },
    store: {
      storageLocation: str('store.storageLocation'),
      dropOnStart: bool('store.dropOnStart'),
    },
    hub: {
      host: str('hub.host'),
      port: num('hub.port', 1),
      protocol: protocol === 'https' ? 'https' : 'http',
      authPath: str('hub.authPath'),
      disconnectPath: str('hub.disconnectPath'),
      connectionAttemptLimit: num('hub.connectionAttemptLimit'),
      initialRetrySeconds: num('hub.initialRetrySeconds'),
      requestTimeoutMs: num('hub.requestTimeoutMs', 1),
    },
    rulesPath: str('rulesPath'),
    notificationsEnabled: bool('notificationsEnabled'),
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}

/**
 * Loads config/default.json, overlays config/<TIDY_ENV>.json when present,
 * then environment variables (.env included).
 */
export function loadConfig(configDir = path.resolve('config'), env: NodeJS.ProcessEnv = process.env): Config {
  dotenv.config();
  const environment = env.TIDY_ENV || 'development';

  let raw = readJson(path.join(configDir, 'default.json'));
  const envFile = path.join(configDir, `${environment}.json`);
  if (fs.existsSync(envFile)) {
    raw = deepMerge(raw, readJson(envFile));
  }

  return parseConfig(applyEnvOverrides(raw, env));
}
