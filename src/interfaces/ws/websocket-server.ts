import { STATUS_CODES } from 'node:http';
import type { IncomingMessage, Server as HttpServer } from 'node:http';
import { Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import type { Logger } from 'pino';
import { subscribeQuerySchema } from '../../application/index.js';
import type { EventBroadcaster, SchemaRegistry } from '../../application/index.js';
import type { ErrorKind } from '../../domain/index.js';
import { CLOSE_CODE, acceptKey } from './frames.js';
import { SubscriberSession } from './subscriber-session.js';

export interface WebSocketServerOptions {
  broadcaster: EventBroadcaster;
  registry: SchemaRegistry;
  log: Logger;
  /** Upgrade path, e.g. `/ws/logs`. */
  path: string;
  /** 0 disables the heartbeat. */
  heartbeatIntervalMs: number;
  maxPayload?: number;
}

let nextSessionId = 1;

/**
 * Live log stream over raw Node.js HTTP upgrade (RFC 6455).
 *
 * `GET <path>?schema_id=<uuid>` subscribes to created/deleted events of one
 * schema; without `schema_id` every event is delivered. A malformed id is
 * refused with HTTP 400 and an unknown one with 404, both before the
 * handshake. Requests for other paths are dropped.
 */
export class WebSocketServer {
  private readonly sessions = new Map<SubscriberSession, Promise<string>>();
  private readonly broadcaster: EventBroadcaster;
  private readonly registry: SchemaRegistry;
  private readonly log: Logger;
  private readonly path: string;
  private readonly heartbeatIntervalMs: number;
  private readonly maxPayload: number | undefined;
  private pingInterval: ReturnType<typeof setInterval> | null = null;
  private server: HttpServer | null = null;
  private closing = false;

  constructor(options: WebSocketServerOptions) {
    this.broadcaster = options.broadcaster;
    this.registry = options.registry;
    this.log = options.log.child({ component: 'websocket' });
    this.path = options.path;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs;
    this.maxPayload = options.maxPayload;
  }

  /* ------------------------------------------------------------------ */
  /*  Attach to HTTP server                                             */
  /* ------------------------------------------------------------------ */

  attach(server: HttpServer): void {
    this.server = server;
    server.on('upgrade', this.onUpgrade);

    if (this.heartbeatIntervalMs > 0) {
      this.pingInterval = setInterval(() => {
        for (const session of this.sessions.keys()) {
          session.heartbeat();
        }
      }, this.heartbeatIntervalMs);
      this.pingInterval.unref();
    }

    this.log.info({ path: this.path }, 'WebSocket server attached');
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /** Closes every session with 1001 and waits for them to finish. */
  async close(): Promise<void> {
    this.closing = true;
    if (this.pingInterval !== null) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    this.server?.off('upgrade', this.onUpgrade);
    this.server = null;

    const running = [...this.sessions.entries()];
    for (const [session] of running) {
      session.close('server_shutdown', CLOSE_CODE.GOING_AWAY);
    }
    await Promise.allSettled(running.map(([, done]) => done));
    this.log.info({ sessions: running.length }, 'WebSocket server closed');
  }

  /* ------------------------------------------------------------------ */
  /*  Handshake                                                         */
  /* ------------------------------------------------------------------ */

  private readonly onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    this.handleUpgrade(req, socket, head).catch((err: unknown) => {
      this.log.error({ err }, 'WebSocket upgrade failed');
      refuse(socket, 500, 'InternalError', 'An internal error occurred');
    });
  };

  /** Exposed for tests that drive the handshake without a listening server. */
  async handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    // The HTTP server detaches its own 'error' listener before emitting
    // 'upgrade'; a reset during the lookup below would otherwise throw.
    socket.on('error', (err: Error) => {
      this.log.debug({ err: err.message }, 'Upgrade socket error');
    });

    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname !== this.path || this.closing) {
      socket.destroy();
      return;
    }

    const upgrade = req.headers['upgrade'];
    const key = req.headers['sec-websocket-key'];
    if (upgrade?.toLowerCase() !== 'websocket' || typeof key !== 'string' || key === '') {
      refuse(socket, 400, 'BadRequest', 'Expected a WebSocket upgrade request');
      return;
    }

    const parsed = subscribeQuerySchema.safeParse({
      schema_id: url.searchParams.get('schema_id') ?? undefined,
    });
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => i.message).join('; ');
      refuse(socket, 400, 'BadRequest', message);
      return;
    }

    const schemaId = parsed.data.schema_id ?? null;
    if (schemaId !== null) {
      const schema = await this.registry.getById(schemaId);
      if (schema === null) {
        refuse(socket, 404, 'NotFound', `Schema with id '${schemaId}' not found`);
        return;
      }
    }

    // The client may have gone away during the lookup.
    if (socket.destroyed || this.closing) {
      socket.destroy();
      return;
    }

    socket.write(
      'HTTP/1.1 101 Switching Protocols\r\n' +
        'Upgrade: websocket\r\n' +
        'Connection: Upgrade\r\n' +
        `Sec-WebSocket-Accept: ${acceptKey(key)}\r\n` +
        '\r\n',
    );

    if (socket instanceof Socket) {
      // After the upgrade the HTTP parser ends the readable side; with the
      // default allowHalfOpen=false that would end the socket too.
      socket.allowHalfOpen = true;
      socket.setTimeout(0);
      socket.setNoDelay(true);
      socket.setKeepAlive(true, 30_000);
    }

    this.accept(socket, head, schemaId);
  }

  private accept(socket: Duplex, head: Buffer, schemaId: string | null): void {
    const id = nextSessionId++;

    const subscription = this.broadcaster.subscribe({
      schemaId,
      onLagged: (missed) => {
        this.log.warn({ session_id: id, missed }, 'Subscriber lagged; skipped events');
      },
    });

    const session = new SubscriberSession({
      id,
      socket,
      subscription,
      log: this.log,
      head,
      maxPayload: this.maxPayload,
    });

    const done = session.run().finally(() => {
      this.sessions.delete(session);
      this.log.debug({ session_id: id, sessions: this.sessions.size }, 'Session removed');
    });
    this.sessions.set(session, done);

    this.log.info(
      { session_id: id, schema_id: schemaId, sessions: this.sessions.size },
      'WebSocket upgrade accepted',
    );

    // After the upgrade the socket may be left paused.
    socket.resume();
  }
}

/** Plain HTTP refusal written to a socket that has not been upgraded. */
function refuse(socket: Duplex, status: number, error: ErrorKind, message: string): void {
  if (socket.destroyed) return;
  const body = JSON.stringify({ error, message });
  socket.end(
    `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ''}\r\n` +
      'Content-Type: application/json\r\n' +
      `Content-Length: ${Buffer.byteLength(body)}\r\n` +
      'Connection: close\r\n' +
      '\r\n' +
      body,
  );
}
