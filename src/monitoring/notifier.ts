import { Config, ConfigError, WatchError, errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { DeliveryResult, NotificationEvent, NotificationTransport } from './types.js';
import { LogTransport } from './transports/log.js';
import { TelegramTransport } from './transports/telegram.js';

const logger = createChildLogger('notifier');

export interface Destination {
  scheme: string;
  target: string;
}

/**
 * Split `<scheme>:<target>`
 */
export function parseDestination(destination: string): Destination {
  const separator = destination.indexOf(':');
  if (separator <= 0 || separator === destination.length - 1) {
    throw new ConfigError(`Destination must look like "<scheme>:<target>": ${destination}`, { destination });
  }
  return {
    scheme: destination.substring(0, separator),
    target: destination.substring(separator + 1),
  };
}

/**
 * Render an event as plain text. The first line is the headline.
 */
export function formatEvent(event: NotificationEvent): string {
  const lines: string[] = [];

  switch (event.kind) {
    case 'changed':
      lines.push(`Change detected: ${event.resource}`, event.summary);
      break;
    case 'new_item':
      lines.push(`New item: ${event.item?.title ?? event.summary}`);
      if (event.item) {
        lines.push(event.item.url);
        if (event.item.postedAt) lines.push(`Posted: ${event.item.postedAt}`);
      }
      if (event.classification?.startDate) lines.push(`Opens: ${event.classification.startDate}`);
      if (event.classification?.endDate) lines.push(`Closes: ${event.classification.endDate}`);
      break;
    case 'reminder':
      lines.push(`Deadline reminder: ${event.item?.title ?? event.resource}`, event.summary);
      if (event.item) lines.push(event.item.url);
      break;
  }

  return lines.filter((line) => line.length > 0).join('\n');
}

/**
 * Routes events to the transport registered for the destination scheme
 */
export class Notifier {
  private readonly transports = new Map<string, NotificationTransport>();

  constructor(transports: NotificationTransport[]) {
    for (const transport of transports) {
      this.transports.set(transport.scheme, transport);
    }
  }

  get schemes(): string[] {
    return [...this.transports.keys()];
  }

  /**
   * Deliver one event. Never throws; failures come back as `{ ok: false }`.
   */
  async notify(event: NotificationEvent, destination: string): Promise<DeliveryResult> {
    try {
      const { scheme, target } = parseDestination(destination);
      const transport = this.transports.get(scheme);
      if (!transport) {
        throw new ConfigError(`No transport for destination scheme "${scheme}"`, { destination });
      }

      await transport.deliver(target, formatEvent(event));
      logger.debug({ taskId: event.taskId, kind: event.kind, destination }, 'Notification delivered');
      return { ok: true };
    } catch (error) {
      logger.warn(
        { taskId: event.taskId, kind: event.kind, destination, error: errorMessage(error) },
        'Notification delivery failed'
      );
      return {
        ok: false,
        error: error instanceof Error ? error : new WatchError(String(error), 'DELIVERY_FAILED'),
      };
    }
  }
}

/**
 * Notifier with the transports available under the given configuration.
 * Telegram is registered only when a bot token is configured.
 */
export function createNotifier(config: Config): Notifier {
  const transports: NotificationTransport[] = [new LogTransport()];
  if (config.telegram.botToken) {
    transports.push(new TelegramTransport(config.telegram));
  }
  return new Notifier(transports);
}
