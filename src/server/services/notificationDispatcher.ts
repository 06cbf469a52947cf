import { logger } from '../../utils/logger.js';

export interface NotificationMeta {
  topic: string;
  /** Sending node number (0 for link-level notifications) */
  from: number;
  to: number;
  packetId: number;
  /** Id of the packet this one answers, 0 when unsolicited */
  requestId: number;
  channel: number;
  receivedAt: number;
}

export type NotificationHandler = (data: Uint8Array, meta: NotificationMeta) => void | Promise<void>;

/**
 * Topic registry for unsolicited inbound data.
 *
 * One handler per topic; registering again replaces it. Handlers run
 * synchronously in arrival order. A handler that throws, or returns a
 * promise that rejects, is logged and does not affect later dispatches.
 */
export class NotificationDispatcher {
  private readonly handlers = new Map<string, NotificationHandler>();
  private dropped = 0;

  register(topic: string, handler: NotificationHandler): void {
    if (this.handlers.has(topic)) {
      logger.debug(`Replacing notification handler for ${topic}`);
    }
    this.handlers.set(topic, handler);
  }

  unregister(topic: string): boolean {
    return this.handlers.delete(topic);
  }

  hasHandler(topic: string): boolean {
    return this.handlers.has(topic);
  }

  get droppedCount(): number {
    return this.dropped;
  }

  /**
   * Returns false when no handler was registered for the topic
   */
  dispatch(topic: string, data: Uint8Array, meta: Partial<Omit<NotificationMeta, 'topic'>> = {}): boolean {
    const handler = this.handlers.get(topic);
    if (!handler) {
      this.dropped++;
      logger.debug(`🤷 No handler for ${topic}, dropping ${data.length} byte(s)`);
      return false;
    }

    const fullMeta: NotificationMeta = {
      topic,
      from: meta.from ?? 0,
      to: meta.to ?? 0,
      packetId: meta.packetId ?? 0,
      requestId: meta.requestId ?? 0,
      channel: meta.channel ?? 0,
      receivedAt: meta.receivedAt ?? Date.now(),
    };

    try {
      const result = handler(data, fullMeta);
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          logger.error(`❌ Async notification handler for ${topic} failed:`, error);
        });
      }
    } catch (error) {
      logger.error(`❌ Notification handler for ${topic} threw:`, error);
    }
    return true;
  }

  clear(): void {
    this.handlers.clear();
  }
}
