import axios from 'axios';
import { Config, ConfigError, NetworkError, errorMessage } from '../../types/index.js';
import { NotificationTransport } from '../types.js';

const SEND_TIMEOUT_MS = 20000;

export function escapeHtml(input: string): string {
  return input.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * First line bold, the rest as escaped text
 */
export function toTelegramHtml(message: string): string {
  const [headline, ...rest] = message.split('\n');
  return [`<b>${escapeHtml(headline)}</b>`, ...rest.map((line) => escapeHtml(line))].join('\n');
}

/**
 * Delivers to `telegram:<chatId>` through the Bot API sendMessage method
 */
export class TelegramTransport implements NotificationTransport {
  readonly scheme = 'telegram';

  constructor(private config: Config['telegram']) {}

  async deliver(chatId: string, message: string): Promise<void> {
    if (!this.config.botToken) {
      throw new ConfigError('TELEGRAM_BOT_TOKEN is not set');
    }

    const url = `${this.config.apiBaseUrl.replace(/\/+$/, '')}/bot${this.config.botToken}/sendMessage`;
    try {
      await axios.post(
        url,
        {
          chat_id: chatId,
          text: toTelegramHtml(message),
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        },
        { timeout: SEND_TIMEOUT_MS }
      );
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new NetworkError(`Telegram delivery to ${chatId} failed: ${errorMessage(error)}`, { chatId, status });
    }
  }
}
