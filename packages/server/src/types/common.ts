/**
 * Source of the current time
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Per-call options accepted by every core and store operation
 */
export interface OperationOptions {
  /**
   * Caller deadline; aborting it fails the operation with deadline_exceeded
   */
  signal?: AbortSignal;
}
