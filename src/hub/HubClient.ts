import Logger from '../logger/Logger';
import { HubConfig } from '../utils/config';
import { errorMessage } from '../utils/errors';

export type AgentConnectionState =
  | { status: 'disconnected' }
  | { status: 'connecting'; attempt: number }
  | { status: 'connected'; agentId: string };

export interface HubResponse {
  status: number;
  body: unknown;
}

export interface HubTransport {
  post(url: string, body: unknown, timeoutMs: number): Promise<HubResponse>;
}

export interface ConnectResult {
  connected: boolean;
  attempts: number;
  agentId?: string;
}

export interface HubClientOptions {
  transport?: HubTransport;
  sleep?: (ms: number) => Promise<void>;
  /** Body sent with the registration request. */
  registration?: () => unknown;
  /** Called once when the attempt limit is reached without success. */
  onGiveUp?: (attempts: number, lastError: ConnectivityError) => void;
}

export class ConnectivityError extends Error {
  constructor(
    public readonly attempt: number,
    cause: unknown
  ) {
    super(`Hub connection attempt ${attempt} failed: ${errorMessage(cause)}`);
    this.name = 'ConnectivityError';
    this.cause = cause;
  }
}

export const fetchTransport: HubTransport = {
  async post(url, body, timeoutMs) {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body ?? {}),
      signal: AbortSignal.timeout(timeoutMs),
    });
    const text = await response.text();
    let parsed: unknown = text;
    try {
      parsed = text.length > 0 ? JSON.parse(text) : null;
    } catch {
      // Plain-text body; handed over as is.
    }
    return { status: response.status, body: parsed };
  },
};

/** Longest delay setTimeout honours; anything above fires after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/** setTimeout-based sleep that splits waits longer than one timer can hold. */
export async function chunkedSleep(ms: number): Promise<void> {
  let remaining = ms;
  while (remaining > 0) {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  }
}

/** Pulls the agent identifier out of a registration response body. */
export function extractAgentId(body: unknown): string | null {
  if (typeof body === 'string') {
    const trimmed = body.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (body && typeof body === 'object') {
    for (const key of ['agent_id', 'agentId', 'uuid', 'id']) {
      const value: unknown = Reflect.get(body, key);
      if (typeof value === 'string' && value.length > 0) return value;
      if (typeof value === 'number') return String(value);
    }
  }
  return null;
}

/**
 * Registers the agent with the hub. Failed attempts back off exponentially
 * (initialRetrySeconds, then doubled each time) until the attempt limit;
 * giving up is reported, never thrown. Once connected the loop is over for
 * the rest of the process.
 */
export class HubClient {
  private state: AgentConnectionState = { status: 'disconnected' };
  private inFlight: Promise<ConnectResult> | null = null;
  private stopRequested = false;
  private registering = false;
  private readonly transport: HubTransport;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: HubConfig,
    private readonly options: HubClientOptions = {}
  ) {
    this.transport = options.transport ?? fetchTransport;
    this.sleep = options.sleep ?? chunkedSleep;
  }

  get baseUrl(): string {
    return `${this.config.protocol}://${this.config.host}:${this.config.port}`;
  }

  getState(): AgentConnectionState {
    return { ...this.state };
  }

  connect(): Promise<ConnectResult> {
    if (this.state.status === 'connected') {
      return Promise.resolve({ connected: true, attempts: 0, agentId: this.state.agentId });
    }
    if (!this.inFlight) {
      this.stopRequested = false;
      this.inFlight = this.retryLoop().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  async disconnect(): Promise<void> {
    this.stopRequested = true;
    if (this.registering && this.inFlight) {
      // The loop sees stopRequested once the pending registration settles and
      // undoes a late success itself.
      await this.inFlight;
      return;
    }
    if (this.state.status !== 'connected') {
      this.state = { status: 'disconnected' };
      return;
    }
    await this.sendDisconnect(this.state.agentId);
  }

  private async sendDisconnect(agentId: string): Promise<void> {
    const url = this.baseUrl + this.config.disconnectPath.replace('{agent_id}', encodeURIComponent(agentId));
    try {
      const response = await this.transport.post(url, { agent_id: agentId }, this.config.requestTimeoutMs);
      if (response.status < 200 || response.status >= 300) {
        Logger.warn('Hub rejected disconnect', { url, status: response.status });
      } else {
        Logger.info('Disconnected from hub', { agentId });
      }
    } catch (error) {
      Logger.warn('Hub disconnect failed', { url, error: errorMessage(error) });
    } finally {
      this.state = { status: 'disconnected' };
    }
  }

  private async retryLoop(): Promise<ConnectResult> {
    const limit = this.config.connectionAttemptLimit;
    let timeoutSeconds = this.config.initialRetrySeconds;

    for (let attempt = 1; ; attempt++) {
      this.state = { status: 'connecting', attempt };
      this.registering = true;
      try {
        const agentId = await this.register(attempt);
        this.registering = false;
        if (this.stopRequested) {
          Logger.info('Registered while stopping, disconnecting again', { agentId });
          this.state = { status: 'connected', agentId };
          await this.sendDisconnect(agentId);
          return { connected: false, attempts: attempt };
        }
        this.state = { status: 'connected', agentId };
        Logger.info('Connected to hub', { url: this.baseUrl, agentId, attempts: attempt });
        return { connected: true, attempts: attempt, agentId };
      } catch (error) {
        this.registering = false;
        const failure = error instanceof ConnectivityError ? error : new ConnectivityError(attempt, error);

        if (limit > 0 && attempt >= limit) {
          this.state = { status: 'disconnected' };
          Logger.error('Unable to reach hub, giving up', {
            url: this.baseUrl,
            attempts: attempt,
            error: failure.message,
          });
          this.options.onGiveUp?.(attempt, failure);
          return { connected: false, attempts: attempt };
        }

        if (this.stopRequested) {
          this.state = { status: 'disconnected' };
          Logger.info('Hub connection loop stopped', { attempts: attempt });
          return { connected: false, attempts: attempt };
        }

        Logger.error('Error connecting to the hub', {
          error: failure.message,
          retryInSeconds: timeoutSeconds,
        });
      }

      await this.sleep(timeoutSeconds * 1000);
      timeoutSeconds *= 2;

      if (this.stopRequested) {
        this.state = { status: 'disconnected' };
        Logger.info('Hub connection loop stopped', { attempts: attempt });
        return { connected: false, attempts: attempt };
      }
    }
  }

  private async register(attempt: number): Promise<string> {
    const url = this.baseUrl + this.config.authPath;
    let response: HubResponse;
    try {
      response = await this.transport.post(url, this.options.registration?.() ?? {}, this.config.requestTimeoutMs);
    } catch (error) {
      throw new ConnectivityError(attempt, error);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new ConnectivityError(attempt, new Error(`hub answered ${response.status}`));
    }
    const agentId = extractAgentId(response.body);
    if (!agentId) {
      throw new ConnectivityError(attempt, new Error('hub response carried no agent id'));
    }
    return agentId;
  }
}
