/**
 * Log notifier - writes alerts to the log instead of sending them (dry runs)
 */

import { createLogger, type Logger } from '../../../shared/lib';
import type { Notifier } from '../model';

export function createLogNotifier(logger: Logger = createLogger('notify')): Notifier {
  return {
    kind: 'log',

    async send(notification) {
      logger.info(`${notification.title}\n${notification.body}`);
      return {};
    },
  };
}
