import os from 'os';
import { AgentDataConfig } from '../utils/config';

export interface StatusSnapshot {
  agent_version: {
    latest_version: string;
    minimal_version: string;
  };
  machine_name: string;
  process_id: number;
  /** Host uptime in seconds. */
  uptime: number;
  watched_directories: string[];
}

/** Agent self-description; uptime is re-read on every snapshot. */
export class AgentStatus {
  private readonly watchedDirectories: string[];

  constructor(
    private readonly version: AgentDataConfig,
    watchedDirectories: string[],
    private readonly uptime: () => number = os.uptime
  ) {
    this.watchedDirectories = [...watchedDirectories];
  }

  snapshot(): StatusSnapshot {
    return {
      agent_version: {
        latest_version: this.version.latestVersion,
        minimal_version: this.version.minimalVersion,
      },
      machine_name: os.hostname(),
      process_id: process.pid,
      uptime: Math.floor(this.uptime()),
      watched_directories: [...this.watchedDirectories],
    };
  }
}
