/**
 * TelegramDigestSender - delivers the digest through the Telegram Bot API
 */

import TelegramBot from 'node-telegram-bot-api';
import { Logger } from 'winston';
import { Digest } from '../services/DigestFormatter';
import { createLogger } from '../utils/logger';
import { DeliveryError, errorMessage } from '../utils/errors';

export interface DigestSenderConfig {
  token: string;
  chatId: string;
}

export interface SendResult {
  success: boolean;
  messagesSent: number;
  error?: string;
}

/**
 * Anything that can deliver a formatted digest
 */
export interface DigestSender {
  send(digest: Digest): Promise<SendResult>;
}

export class TelegramDigestSender implements DigestSender {
  private bot: TelegramBot;
  private logger: Logger;
  private chatId: string;

  constructor(config: DigestSenderConfig) {
    this.logger = createLogger('TelegramDigestSender');
    this.chatId = config.chatId;
    // Send-only: no polling, no webhook
    this.bot = new TelegramBot(config.token, { polling: false });
  }

  /**
   * Sends every message of the digest in order. Stops at the first failure;
   * messages already sent stay sent.
   */
  async send(digest: Digest): Promise<SendResult> {
    if (digest.messages.length === 0) {
      this.logger.info('No high-relevance articles or contracts today, nothing to send');
      return { success: true, messagesSent: 0 };
    }

    let messagesSent = 0;
    try {
      for (const message of digest.messages) {
        const result = await this.bot.sendMessage(this.chatId, message, {
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        });
        if (!result.message_id) {
          throw new DeliveryError('Telegram returned no message id');
        }
        messagesSent++;
      }

      this.logger.info('Digest sent', {
        title: digest.title,
        chatId: this.chatId,
        messagesSent,
      });
      return { success: true, messagesSent };
    } catch (error) {
      this.logger.error('Failed to send digest', {
        chatId: this.chatId,
        messagesSent,
        error: errorMessage(error),
      });
      return { success: false, messagesSent, error: errorMessage(error) };
    }
  }
}
