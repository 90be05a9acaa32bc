import notifier from 'node-notifier';
import Logger from '../logger/Logger';
import { errorMessage } from '../utils/errors';

interface Notification {
  title: string;
  message: string;
  sound: boolean;
  wait: boolean;
}

/**
 * Desktop alerts for conditions an operator has to act on. Repeats of the
 * same alert inside the dedupe window are dropped.
 */
export class Notifier {
  private recentNotifications = new Map<string, number>();
  private dedupeWindow = 30000;

  constructor(private readonly enabled: boolean) {
    Logger.debug('Notifier initialized', { enabled });
  }

  notifyHubUnreachable(url: string, attempts: number): void {
    this.notify(`hub:${url}`, {
      title: 'Tidy agent: hub unreachable',
      message: `Gave up on ${url} after ${attempts} attempt(s). File scoring continues locally.`,
      sound: true,
      wait: false,
    });
  }

  notifyError(error: string): void {
    this.notify(`error:${error}`, {
      title: 'Tidy agent error',
      message: error,
      sound: true,
      wait: false,
    });
  }

  private notify(key: string, notification: Notification): void {
    if (!this.enabled) {
      Logger.debug('Notifications disabled, skipping', { title: notification.title });
      return;
    }

    const now = Date.now();
    const lastNotified = this.recentNotifications.get(key);
    if (lastNotified !== undefined && now - lastNotified < this.dedupeWindow) {
      Logger.debug('Notification suppressed (duplicate)', { key, suppressedFor: now - lastNotified });
      return;
    }
    this.recentNotifications.set(key, now);

    try {
      notifier.notify({
        title: notification.title,
        message: notification.message,
        sound: notification.sound,
        wait: notification.wait,
      });
      Logger.debug('Desktop notification sent', { title: notification.title });
    } catch (error) {
      Logger.error('Desktop notification failed', { error: errorMessage(error) });
    }
  }
}
