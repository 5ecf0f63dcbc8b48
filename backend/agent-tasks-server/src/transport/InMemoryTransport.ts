/**
 * InMemoryTransport
 *
 * In-process topic fabric. Backs single-process deployments, the TransportHub
 * (which bridges remote sockets into it) and tests.
 *
 * Design:
 * - Multiple subscribers per topic, each removable on its own
 * - Handlers are invoked in subscription order without waiting for async
 *   handlers to settle; a failing handler never affects the others
 * - No retention: a message published with no subscribers is gone
 */

import { TransportError } from "../errors";
import { MessageHandler, TaskTransport, TransportSubscription } from "./TaskTransport";

/**
 * Subscription handle that can also be removed synchronously by ID
 */
export interface LocalSubscription extends TransportSubscription {
  readonly id: string;
}

interface SubscriptionRecord {
  id: string;
  handler: MessageHandler;
}

export interface InMemoryTransportOptions {
  /** Where handler failures are reported (default: console) */
  logger?: Pick<Console, "warn">;
}

export class InMemoryTransport implements TaskTransport {
  /** Map of topic to list of subscriptions */
  private subscriptions: Map<string, SubscriptionRecord[]> = new Map();

  /** Counter for generating unique subscription IDs */
  private subscriptionCounter: number = 0;

  private closed: boolean = false;

  private readonly logger: Pick<Console, "warn">;

  constructor(options: InMemoryTransportOptions = {}) {
    this.logger = options.logger ?? console;
  }

  private generateSubscriptionId(): string {
    return `sub-${Date.now()}-${(++this.subscriptionCounter).toString(16)}`;
  }

  async publish(topic: string, message: string): Promise<number> {
    return this.publishSync(topic, message);
  }

  /**
   * Deliver a message to the current subscribers of a topic.
   *
   * @returns Number of handlers invoked
   */
  publishSync(topic: string, message: string): number {
    this.assertOpen();

    // Snapshot so handlers may unsubscribe while being called
    const handlers = [...(this.subscriptions.get(topic) ?? [])];

    for (const sub of handlers) {
      try {
        const result = sub.handler(message, topic);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportHandlerError(topic, error));
        }
      } catch (error) {
        this.reportHandlerError(topic, error);
      }
    }

    return handlers.length;
  }

  async subscribe(topic: string, handler: MessageHandler): Promise<TransportSubscription> {
    return this.subscribeSync(topic, handler);
  }

  subscribeSync(topic: string, handler: MessageHandler): LocalSubscription {
    this.assertOpen();

    const id = this.generateSubscriptionId();
    const subs = this.subscriptions.get(topic) ?? [];
    subs.push({ id, handler });
    this.subscriptions.set(topic, subs);

    return {
      id,
      topic,
      unsubscribe: async () => {
        this.unsubscribe(topic, id);
      },
    };
  }

  /**
   * Remove a subscription.
   *
   * @returns true if the subscription was found and removed
   */
  unsubscribe(topic: string, subscriptionId: string): boolean {
    const subs = this.subscriptions.get(topic);
    if (!subs) {
      return false;
    }

    const index = subs.findIndex((s) => s.id === subscriptionId);
    if (index === -1) {
      return false;
    }

    subs.splice(index, 1);

    if (subs.length === 0) {
      this.subscriptions.delete(topic);
    }

    return true;
  }

  getSubscriberCount(topic: string): number {
    return this.subscriptions.get(topic)?.length ?? 0;
  }

  hasSubscribers(topic: string): boolean {
    return this.getSubscriberCount(topic) > 0;
  }

  /**
   * Topics with at least one subscriber
   */
  getTopics(): string[] {
    return Array.from(this.subscriptions.keys());
  }

  async close(): Promise<void> {
    this.closed = true;
    this.subscriptions.clear();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new TransportError("Transport is closed");
    }
  }

  private reportHandlerError(topic: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.warn(`[InMemoryTransport] Handler for ${topic} failed: ${message}`);
  }
}
