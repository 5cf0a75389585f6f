import {
  silentLogger,
  toErrorMessage,
  type Logger,
  type Notifier,
  type NotifierEvent,
} from '@holdtype/core';
import { runCommand, type CommandRunner } from './exec';

export interface DesktopNotifierOptions {
  enabled: boolean;
  expireMs: number;
  icon: string;
  run?: CommandRunner;
  logger?: Logger;
}

interface Notification {
  title: string;
  body: string;
  urgency: 'low' | 'normal' | 'critical';
}

export const describeEvent = (event: NotifierEvent): Notification | null => {
  switch (event.type) {
    case 'recording':
      return { title: 'Dictation', body: 'Recording...', urgency: 'low' };
    case 'transcribing':
      return { title: 'Dictation', body: 'Transcribing...', urgency: 'low' };
    case 'done':
      return event.textLength > 0
        ? { title: 'Dictation Complete', body: event.preview, urgency: 'normal' }
        : { title: 'Dictation Complete', body: 'No speech detected', urgency: 'low' };
    case 'error':
      return { title: 'Dictation Error', body: event.message, urgency: 'critical' };
    case 'idle':
      return null;
  }
};

export const buildNotifyArgs = (
  notification: Notification,
  options: Pick<DesktopNotifierOptions, 'expireMs' | 'icon'>
) => [
  '--app-name=holdtype',
  `--icon=${options.icon}`,
  `--urgency=${notification.urgency}`,
  `--expire-time=${options.expireMs}`,
  notification.title,
  notification.body,
];

/** Desktop notifications through `notify-send`. Failures are logged, never thrown. */
export const createDesktopNotifier = (options: DesktopNotifierOptions): Notifier => {
  const run = options.run ?? runCommand;
  const log = options.logger ?? silentLogger;
  return {
    async notify(event) {
      if (!options.enabled) return;
      const notification = describeEvent(event);
      if (!notification) return;
      try {
        await run('notify-send', buildNotifyArgs(notification, options));
      } catch (error) {
        log.debug(`notify-send failed: ${toErrorMessage(error)}`);
      }
    },
  };
};
