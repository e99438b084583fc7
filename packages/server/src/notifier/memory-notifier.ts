import type { EmailMessage } from '@authgate/shared';
import type { OperationOptions } from '../types/index.js';
import type { Notifier } from './notifier.js';
import type { Logger } from '../logging/logger.js';
import { ensureActive } from '../services/deadline.js';

/**
 * Keeps published messages in memory (tests, local development)
 */
export class MemoryNotifier implements Notifier {
  readonly messages: EmailMessage[] = [];

  constructor(private readonly logger?: Logger) {}

  async publish(message: EmailMessage, options?: OperationOptions): Promise<void> {
    ensureActive(options?.signal, 'notifier.publish');
    this.messages.push({ ...message });
    this.logger?.info('Email queued in memory', {
      op: 'notifier.publish',
      to: message.to,
      purpose: message.purpose,
    });
  }

  /**
   * Most recent message sent to `to`, if any
   */
  lastTo(to: string): EmailMessage | undefined {
    return this.messages.filter((message) => message.to === to).at(-1);
  }

  clear(): void {
    this.messages.length = 0;
  }
}
