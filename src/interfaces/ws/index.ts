export { default as wsPlugin } from './ws-plugin.js';
export { WebSocketServer } from './websocket-server.js';
export type { WebSocketServerOptions } from './websocket-server.js';
export { SubscriberSession } from './subscriber-session.js';
export type { SessionState, SubscriberSessionOptions } from './subscriber-session.js';
export * from './frames.js';
