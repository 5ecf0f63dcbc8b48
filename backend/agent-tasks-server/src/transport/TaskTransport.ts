/**
 * TaskTransport
 *
 * The publish/subscribe fabric connecting submitters and workers.
 * Delivery is fire-and-forget: a message reaches whoever is subscribed to its
 * topic at publish time and is not retained for later subscribers.
 */

/**
 * Receives raw (serialized) messages published on a topic
 */
export type MessageHandler = (message: string, topic: string) => void | Promise<void>;

/**
 * Handle returned from subscribe()
 */
export interface TransportSubscription {
  /** Topic this subscription listens to */
  readonly topic: string;
  /** Stop receiving messages. Safe to call more than once. */
  unsubscribe(): Promise<void>;
}

export interface TaskTransport {
  /**
   * Publish a message on a topic.
   *
   * @returns Number of subscribers the message was delivered to
   * @throws TransportError when the connection is unavailable
   */
  publish(topic: string, message: string): Promise<number>;

  /**
   * Subscribe to a topic. The returned promise resolves once the
   * subscription is active, so any message published afterwards is received.
   *
   * @throws TransportError when the connection is unavailable
   */
  subscribe(topic: string, handler: MessageHandler): Promise<TransportSubscription>;

  /**
   * Release the connection and drop every subscription.
   */
  close(): Promise<void>;
}
