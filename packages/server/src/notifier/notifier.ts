import type { EmailMessage } from '@authgate/shared';
import type { OperationOptions } from '../types/index.js';

/**
 * Outbound email hand-off
 *
 * Fire-and-forget: `publish` resolves once the message is queued, never
 * after delivery.
 */
export interface Notifier {
  publish(message: EmailMessage, options?: OperationOptions): Promise<void>;
}
