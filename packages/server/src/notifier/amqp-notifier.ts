import amqp from 'amqplib';
import type { EmailMessage } from '@authgate/shared';
import type { OperationOptions } from '../types/index.js';
import type { Notifier } from './notifier.js';
import type { Logger } from '../logging/logger.js';
import { AuthError } from '../errors/auth-error.js';
import { ensureActive } from '../services/deadline.js';

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;
type AmqpChannel = Awaited<ReturnType<AmqpConnection['createChannel']>>;

export interface AmqpNotifierOptions {
  url: string;
  queue: string;
  logger: Logger;
}

/**
 * Publishes email jobs as persistent JSON messages on a durable queue
 */
export class AmqpNotifier implements Notifier {
  private constructor(
    private readonly connection: AmqpConnection,
    private readonly channel: AmqpChannel,
    private readonly queue: string,
    private readonly logger: Logger
  ) {}

  static async connect(options: AmqpNotifierOptions): Promise<AmqpNotifier> {
    const { url, queue, logger } = options;

    const connection = await amqp.connect(url);
    connection.on('error', (error: unknown) => {
      logger.error('AMQP connection error', { op: 'notifier.connection', error });
    });

    const channel = await connection.createChannel();
    // amqplib emits 'error' on a channel the broker closes
    channel.on('error', (error: unknown) => {
      logger.error('AMQP channel error', { op: 'notifier.channel', queue, error });
    });
    channel.on('close', () => {
      logger.warn('AMQP channel closed', { op: 'notifier.channel', queue });
    });
    await channel.assertQueue(queue, { durable: true });

    return new AmqpNotifier(connection, channel, queue, logger);
  }

  async publish(message: EmailMessage, options?: OperationOptions): Promise<void> {
    ensureActive(options?.signal, 'notifier.publish');

    let accepted: boolean;
    try {
      accepted = this.channel.sendToQueue(this.queue, Buffer.from(JSON.stringify(message)), {
        persistent: true,
        contentType: 'application/json',
      });
    } catch (error) {
      throw AuthError.internal('notifier.publish', error);
    }

    if (!accepted) {
      // Buffered locally; amqplib flushes it once the socket drains
      this.logger.warn('AMQP write buffer full', { op: 'notifier.publish', queue: this.queue });
    }
  }

  async close(): Promise<void> {
    await this.channel.close();
    await this.connection.close();
  }
}
