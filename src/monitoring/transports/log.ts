import { createChildLogger } from '../../utils/logger.js';
import { NotificationTransport } from '../types.js';

const logger = createChildLogger('notifications');

/**
 * Writes notifications to the application log under `log:<label>`
 */
export class LogTransport implements NotificationTransport {
  readonly scheme = 'log';

  async deliver(label: string, message: string): Promise<void> {
    logger.info({ label, message }, 'Notification');
  }
}
