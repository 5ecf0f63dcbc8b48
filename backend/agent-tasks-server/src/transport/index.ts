/**
 * Transport Module
 *
 * Publish/subscribe fabric used for task dispatch and result notification.
 */

export type { TaskTransport, TransportSubscription, MessageHandler } from "./TaskTransport";
export { InMemoryTransport } from "./InMemoryTransport";
export type { InMemoryTransportOptions, LocalSubscription } from "./InMemoryTransport";
export { WebSocketTransport } from "./WebSocketTransport";
export type { WebSocketTransportOptions } from "./WebSocketTransport";
export { TransportHub } from "./TransportHub";
export type { TransportHubOptions } from "./TransportHub";
export { clientFrameSchema, hubFrameSchema } from "./protocol";
export type { ClientFrame, HubFrame } from "./protocol";
