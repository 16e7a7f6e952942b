/**
 * Publishes domain events after their transaction has committed.
 * Channels are named `room:<CODE>`.
 */
export interface MessageBus {
  publish(channel: string, event: object): Promise<void>;
}
