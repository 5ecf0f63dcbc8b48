/**
 * WebSocketTransport
 *
 * Cross-process TaskTransport that talks to a TransportHub over a single
 * WebSocket connection.
 *
 * - Each topic is subscribed on the hub once; local handlers are multiplexed
 * - subscribe/unsubscribe/publish wait for the hub's acknowledgement, so a
 *   resolved subscribe() means the hub will route later publishes to us
 * - On an unexpected disconnect the client reconnects with exponential backoff
 *   and re-subscribes every live topic; messages published while it was away
 *   are not replayed
 */

import { WebSocket } from "ws";
import { TransportError } from "../errors";
import { MessageHandler, TaskTransport, TransportSubscription } from "./TaskTransport";
import { ClientFrame, HubFrame, hubFrameSchema, rawDataToString } from "./protocol";
import { clampTimerDelay } from "../timers";

export interface WebSocketTransportOptions {
  /** Hub endpoint, e.g. ws://127.0.0.1:3000/ws/transport */
  url: string;
  /** First reconnect delay in ms, doubled per attempt (default: 500) */
  reconnectBaseDelayMs?: number;
  /** Upper bound for the reconnect delay in ms (default: 30000) */
  reconnectMaxDelayMs?: number;
  /** How long to wait for the hub to acknowledge a request (default: 10000) */
  requestTimeoutMs?: number;
  /** Reconnect after an unexpected disconnect (default: true) */
  autoReconnect?: boolean;
  logger?: Pick<Console, "log" | "warn">;
}

interface PendingRequest {
  resolve: (receivers: number) => void;
  reject: (error: TransportError) => void;
  timeoutId: ReturnType<typeof setTimeout>;
}

interface TopicRecord {
  handlers: Map<number, MessageHandler>;
  /** Settles when the hub has acknowledged the subscription */
  ready: Promise<void>;
}

export class WebSocketTransport implements TaskTransport {
  private readonly url: string;
  private readonly reconnectBaseDelayMs: number;
  private readonly reconnectMaxDelayMs: number;
  private readonly requestTimeoutMs: number;
  private readonly autoReconnect: boolean;
  private readonly logger: Pick<Console, "log" | "warn">;

  private socket?: WebSocket;
  private readonly topics: Map<string, TopicRecord> = new Map();
  private readonly pending: Map<string, PendingRequest> = new Map();
  private requestCounter: number = 0;
  private handlerCounter: number = 0;

  /** Set once the first connection succeeds; gates reconnection */
  private connectedOnce: boolean = false;
  private closed: boolean = false;
  private reconnectAttempt: number = 0;
  private reconnectTimeoutId?: ReturnType<typeof setTimeout>;

  constructor(options: WebSocketTransportOptions) {
    this.url = options.url;
    this.reconnectBaseDelayMs = options.reconnectBaseDelayMs ?? 500;
    this.reconnectMaxDelayMs = options.reconnectMaxDelayMs ?? 30000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000;
    this.autoReconnect = options.autoReconnect ?? true;
    this.logger = options.logger ?? console;
  }

  /**
   * Open the connection to the hub.
   *
   * @throws TransportError if the hub cannot be reached
   */
  async connect(): Promise<void> {
    if (this.closed) {
      throw new TransportError("Transport is closed");
    }
    if (this.isConnected()) {
      return;
    }
    await this.openSocket();
    this.connectedOnce = true;
  }

  isConnected(): boolean {
    return this.socket !== undefined && this.socket.readyState === WebSocket.OPEN;
  }

  async publish(topic: string, message: string): Promise<number> {
    return this.request({ type: "publish", requestId: this.nextRequestId(), topic, message });
  }

  async subscribe(topic: string, handler: MessageHandler): Promise<TransportSubscription> {
    if (this.closed) {
      throw new TransportError("Transport is closed");
    }

    const handlerId = ++this.handlerCounter;
    let record = this.topics.get(topic);

    if (!record) {
      const ready = this.request({ type: "subscribe", requestId: this.nextRequestId(), topic }).then(
        () => undefined
      );
      record = { handlers: new Map(), ready };
      this.topics.set(topic, record);
    }

    record.handlers.set(handlerId, handler);

    try {
      await record.ready;
    } catch (error) {
      this.dropHandler(topic, handlerId);
      throw error;
    }

    return {
      topic,
      unsubscribe: () => this.removeHandler(topic, handlerId),
    };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.reconnectTimeoutId) {
      clearTimeout(this.reconnectTimeoutId);
      this.reconnectTimeoutId = undefined;
    }

    this.topics.clear();
    this.rejectAllPending(new TransportError("Transport is closed"));

    const socket = this.socket;
    this.socket = undefined;
    if (socket && socket.readyState !== WebSocket.CLOSED) {
      await new Promise<void>((resolve) => {
        socket.once("close", () => resolve());
        socket.close();
      });
    }
  }

  private openSocket(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const socket = new WebSocket(this.url);
      let opened = false;

      socket.on("open", () => {
        opened = true;
        if (this.closed) {
          socket.close();
          reject(new TransportError("Transport is closed"));
          return;
        }
        this.socket = socket;
        resolve();
      });

      socket.on("message", (data: Buffer | ArrayBuffer | Buffer[]) => {
        this.handleFrame(rawDataToString(data));
      });

      socket.on("error", (error: Error) => {
        if (!opened) {
          reject(new TransportError(`Cannot connect to ${this.url}: ${error.message}`, { cause: error }));
        } else {
          this.logger.warn(`[WebSocketTransport] Socket error: ${error.message}`);
        }
      });

      socket.on("close", () => {
        if (this.socket === socket) {
          this.socket = undefined;
        }
        this.rejectAllPending(new TransportError("Connection to hub closed"));
        if (!opened) {
          reject(new TransportError(`Cannot connect to ${this.url}`));
        }
        if (!this.closed && this.connectedOnce && this.autoReconnect) {
          this.scheduleReconnect();
        }
      });
    });
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimeoutId) {
      return;
    }

    const delay = Math.min(
      this.reconnectBaseDelayMs * 2 ** this.reconnectAttempt,
      this.reconnectMaxDelayMs
    );
    this.reconnectAttempt++;
    this.logger.warn(
      `[WebSocketTransport] Disconnected from hub, reconnecting in ${delay}ms (attempt ${this.reconnectAttempt})`
    );

    this.reconnectTimeoutId = setTimeout(() => {
      this.reconnectTimeoutId = undefined;
      this.openSocket()
        .then(() => {
          this.reconnectAttempt = 0;
          this.logger.log(`[WebSocketTransport] Reconnected to ${this.url}`);
          this.resubscribeAll();
        })
        .catch((error: unknown) => {
          // The close event that follows a failed attempt schedules the next one
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(`[WebSocketTransport] Reconnect failed: ${message}`);
        });
    }, clampTimerDelay(delay));
  }

  private resubscribeAll(): void {
    for (const [topic, record] of this.topics) {
      const ready = this.request({ type: "subscribe", requestId: this.nextRequestId(), topic }).then(
        () => undefined
      );
      record.ready = ready;
      ready.catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`[WebSocketTransport] Re-subscribe to ${topic} failed: ${message}`);
      });
    }
  }

  private handleFrame(raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.logger.warn("[WebSocketTransport] Dropped non-JSON frame from hub");
      return;
    }

    const parsed = hubFrameSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn("[WebSocketTransport] Dropped unrecognized frame from hub");
      return;
    }

    this.applyFrame(parsed.data);
  }

  private applyFrame(frame: HubFrame): void {
    switch (frame.type) {
      case "status":
        return;
      case "ack": {
        const request = this.pending.get(frame.requestId);
        if (request) {
          this.pending.delete(frame.requestId);
          clearTimeout(request.timeoutId);
          request.resolve(frame.receivers ?? 0);
        }
        return;
      }
      case "error": {
        const request = frame.requestId ? this.pending.get(frame.requestId) : undefined;
        if (request && frame.requestId) {
          this.pending.delete(frame.requestId);
          clearTimeout(request.timeoutId);
          request.reject(new TransportError(`Hub rejected request: ${frame.error}`));
        } else {
          this.logger.warn(`[WebSocketTransport] Hub reported: ${frame.error}`);
        }
        return;
      }
      case "message": {
        const record = this.topics.get(frame.topic);
        if (!record) return;
        for (const handler of [...record.handlers.values()]) {
          this.invokeHandler(handler, frame.message, frame.topic);
        }
        return;
      }
    }
  }

  private invokeHandler(handler: MessageHandler, message: string, topic: string): void {
    const report = (error: unknown) => {
      const text = error instanceof Error ? error.message : String(error);
      this.logger.warn(`[WebSocketTransport] Handler for ${topic} failed: ${text}`);
    };
    try {
      const result = handler(message, topic);
      if (result instanceof Promise) {
        result.catch(report);
      }
    } catch (error) {
      report(error);
    }
  }

  private request(frame: ClientFrame): Promise<number> {
    const socket = this.socket;
    if (this.closed) {
      return Promise.reject(new TransportError("Transport is closed"));
    }
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError(`Not connected to ${this.url}`));
    }

    return new Promise<number>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        this.pending.delete(frame.requestId);
        reject(new TransportError(`Hub did not acknowledge ${frame.type} within ${this.requestTimeoutMs}ms`));
      }, clampTimerDelay(this.requestTimeoutMs));

      this.pending.set(frame.requestId, { resolve, reject, timeoutId });

      socket.send(JSON.stringify(frame), (error?: Error) => {
        if (error) {
          const request = this.pending.get(frame.requestId);
          if (request) {
            this.pending.delete(frame.requestId);
            clearTimeout(request.timeoutId);
            request.reject(new TransportError(`Send failed: ${error.message}`, { cause: error }));
          }
        }
      });
    });
  }

  private async removeHandler(topic: string, handlerId: number): Promise<void> {
    if (!this.dropHandler(topic, handlerId)) {
      return;
    }
    if (!this.isConnected()) {
      return;
    }
    try {
      await this.request({ type: "unsubscribe", requestId: this.nextRequestId(), topic });
    } catch (error) {
      // The hub drops our subscriptions on disconnect anyway
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`[WebSocketTransport] Unsubscribe from ${topic} failed: ${message}`);
    }
  }

  /**
   * Remove a local handler.
   *
   * @returns true if that was the topic's last handler
   */
  private dropHandler(topic: string, handlerId: number): boolean {
    const record = this.topics.get(topic);
    if (!record || !record.handlers.delete(handlerId)) {
      return false;
    }
    if (record.handlers.size === 0) {
      this.topics.delete(topic);
      return true;
    }
    return false;
  }

  private rejectAllPending(error: TransportError): void {
    for (const [requestId, request] of this.pending) {
      clearTimeout(request.timeoutId);
      request.reject(error);
      this.pending.delete(requestId);
    }
  }

  private nextRequestId(): string {
    return `req-${(++this.requestCounter).toString(16)}`;
  }
}
