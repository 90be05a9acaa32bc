import os from 'os';
import { AgentStatus } from '../agent/AgentStatus';

describe('AgentStatus', () => {
  it('re-reads uptime on every snapshot', () => {
    let uptime = 10.7;
    const status = new AgentStatus({ latestVersion: '2.0.0', minimalVersion: '1.5.0' }, ['/srv/data'], () => uptime);

    const first = status.snapshot();
    uptime = 99.2;
    const second = status.snapshot();

    expect(first).toEqual({
      agent_version: { latest_version: '2.0.0', minimal_version: '1.5.0' },
      machine_name: os.hostname(),
      process_id: process.pid,
      uptime: 10,
      watched_directories: ['/srv/data'],
    });
    expect(second.uptime).toBe(99);
  });
});
