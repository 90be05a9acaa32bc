import notifier from 'node-notifier';
import { Notifier } from '../notifications/Notifier';

jest.mock('node-notifier', () => ({ notify: jest.fn() }));

describe('Notifier', () => {
  beforeEach(() => {
    jest.mocked(notifier.notify).mockClear();
  });

  it('sends nothing when disabled', () => {
    new Notifier(false).notifyError('disk full');

    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('alerts when the hub stays unreachable', () => {
    new Notifier(true).notifyHubUnreachable('http://localhost:7001', 30);

    expect(notifier.notify).toHaveBeenCalledWith({
      title: 'Tidy agent: hub unreachable',
      message: 'Gave up on http://localhost:7001 after 30 attempt(s). File scoring continues locally.',
      sound: true,
      wait: false,
    });
  });

  it('suppresses a repeat of the same alert', () => {
    const alerts = new Notifier(true);

    alerts.notifyError('disk full');
    alerts.notifyError('disk full');
    alerts.notifyError('database locked');

    expect(notifier.notify).toHaveBeenCalledTimes(2);
  });
});
