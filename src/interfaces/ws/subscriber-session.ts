import type { Duplex } from 'node:stream';
import type { Logger } from 'pino';
import type { Subscription } from '../../application/index.js';
import {
  CLOSE_CODE,
  FrameError,
  MAX_INBOUND_PAYLOAD,
  OPCODE,
  encodeCloseFrame,
  encodeControlFrame,
  encodeTextFrame,
  tryParseFrame,
} from './frames.js';

/** How long a closing socket may take to flush its close frame. */
export const CLOSE_LINGER_MS = 1_000;

export type SessionState = 'connecting' | 'active' | 'closing' | 'closed';

export interface SubscriberSessionOptions {
  id: number;
  socket: Duplex;
  subscription: Subscription;
  log: Logger;
  /** Bytes that arrived with the upgrade request. */
  head?: Buffer;
  maxPayload?: number;
}

/**
 * One live WebSocket subscriber.
 *
 * Two halves run concurrently once `run()` is called:
 * - outbound drains the subscription into text frames, waiting for `drain`
 *   whenever the socket buffer is full;
 * - inbound reads client frames (ping → pong, pong → alive, close → echo
 *   and finish; anything else is ignored; malformed input finishes it).
 *
 * Whichever half finishes first moves the session to `closing` and cancels
 * the other. `run()` resolves once both have settled and the session is
 * `closed`.
 */
export class SubscriberSession {
  readonly id: number;
  readonly subscription: Subscription;

  private readonly socket: Duplex;
  private readonly log: Logger;
  private readonly maxPayload: number;
  private sessionState: SessionState = 'connecting';
  private reason: string | null = null;
  private alive = true;
  private buffer: Buffer;
  private finishInbound: ((reason: string) => void) | null = null;
  private releaseDrain: (() => void) | null = null;

  constructor(options: SubscriberSessionOptions) {
    this.id = options.id;
    this.socket = options.socket;
    this.subscription = options.subscription;
    this.log = options.log.child({ session_id: options.id });
    this.maxPayload = options.maxPayload ?? MAX_INBOUND_PAYLOAD;
    this.buffer = options.head !== undefined && options.head.length > 0
      ? Buffer.from(options.head)
      : Buffer.alloc(0);

    // Kept for the socket's whole life: an 'error' with no listener throws.
    this.socket.on('error', (err: Error) => {
      this.log.debug({ err: err.message }, 'Socket error');
    });
  }

  get state(): SessionState {
    return this.sessionState;
  }

  /** Why the session closed, once it is closing. */
  get closeReason(): string | null {
    return this.reason;
  }

  /** Runs both halves to completion. Resolves with the close reason. */
  async run(): Promise<string> {
    if (this.sessionState !== 'connecting') {
      return this.reason ?? 'closed';
    }
    this.sessionState = 'active';
    this.log.info({ schema_id: this.subscription.schemaId }, 'Subscriber session active');

    const inbound = this.readInbound();
    const outbound = this.pumpOutbound().then(
      () => 'subscription_closed',
      (err: unknown) => {
        this.log.warn({ err }, 'Outbound delivery failed');
        return 'write_error';
      },
    );

    const first = await Promise.race([inbound, outbound]);
    this.close(first);

    await Promise.allSettled([inbound, outbound]);
    await this.socketReleased();
    this.sessionState = 'closed';

    const reason = this.reason ?? first;
    this.log.info(
      { reason, missed_total: this.subscription.missedTotal },
      'Subscriber session closed',
    );
    return reason;
  }

  /**
   * Starts closing. Idempotent and synchronous. With `code` a close frame
   * is sent before the socket ends. A peer that has stopped reading is cut
   * off at once; otherwise the socket is destroyed once flushed, or after
   * `CLOSE_LINGER_MS`.
   */
  close(reason: string, code?: number): void {
    if (this.sessionState === 'closing' || this.sessionState === 'closed') return;
    const wasConnecting = this.sessionState === 'connecting';
    this.sessionState = wasConnecting ? 'closed' : 'closing';
    this.reason = reason;

    this.subscription.close();
    this.releaseDrain?.();
    this.stopInbound(reason);

    const socket = this.socket;
    if (socket.destroyed) return;

    // Bytes still queued in user space: the peer is not draining them.
    if (socket.writableLength > 0) {
      this.log.debug({ pending_bytes: socket.writableLength }, 'Dropping unflushed frames');
      socket.destroy();
      return;
    }

    const linger = setTimeout(() => socket.destroy(), CLOSE_LINGER_MS);
    linger.unref();
    socket.once('close', () => clearTimeout(linger));

    const frame = code === undefined ? undefined : encodeCloseFrame(code, reason);
    if (frame === undefined) {
      socket.end(() => socket.destroy());
    } else {
      socket.end(frame, () => socket.destroy());
    }
  }

  /**
   * One heartbeat tick. A client that has not answered since the previous
   * tick is closed; otherwise a ping is sent. Returns whether the session
   * is still open.
   */
  heartbeat(): boolean {
    if (this.sessionState !== 'active') return false;
    if (!this.alive) {
      this.log.debug('Heartbeat timeout');
      this.close('heartbeat_timeout');
      return false;
    }
    this.alive = false;
    this.write(encodeControlFrame(OPCODE.PING));
    return true;
  }

  /** Resolves once the socket has emitted 'close'. */
  private socketReleased(): Promise<void> {
    if (this.socket.closed) return Promise.resolve();
    return new Promise((resolve) => {
      this.socket.once('close', () => resolve());
    });
  }

  /* ------------------------------------------------------------------ */
  /*  Outbound half                                                     */
  /* ------------------------------------------------------------------ */

  private async pumpOutbound(): Promise<void> {
    for await (const event of this.subscription) {
      if (this.sessionState !== 'active') break;
      if (!this.write(encodeTextFrame(JSON.stringify(event)))) {
        await this.waitForDrain();
      }
    }
  }

  private waitForDrain(): Promise<void> {
    if (this.socket.destroyed || this.sessionState !== 'active') {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const done = (): void => {
        this.socket.off('drain', done);
        this.socket.off('close', done);
        this.releaseDrain = null;
        resolve();
      };
      this.releaseDrain = done;
      this.socket.on('drain', done);
      this.socket.on('close', done);
    });
  }

  /** False when the frame was queued behind a full buffer or not written. */
  private write(frame: Buffer): boolean {
    if (this.socket.destroyed || this.socket.writableEnded) return false;
    return this.socket.write(frame);
  }

  /* ------------------------------------------------------------------ */
  /*  Inbound half                                                      */
  /* ------------------------------------------------------------------ */

  private readInbound(): Promise<string> {
    return new Promise((resolve) => {
      this.finishInbound = resolve;
      this.socket.on('data', this.onData);
      this.socket.on('close', this.onClose);
      // Frames that arrived with the upgrade request.
      this.consumeFrames();
    });
  }

  private readonly onData = (chunk: Buffer): void => {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    this.consumeFrames();
  };

  private readonly onClose = (): void => {
    this.stopInbound('socket_closed');
  };

  private stopInbound(reason: string): void {
    const finish = this.finishInbound;
    if (finish === null) return;
    this.finishInbound = null;
    this.socket.off('data', this.onData);
    this.socket.off('close', this.onClose);
    finish(reason);
  }

  /** Consumes every complete frame in the buffer. */
  private consumeFrames(): void {
    while (this.finishInbound !== null && this.buffer.length > 0) {
      let frame: ReturnType<typeof tryParseFrame>;
      try {
        frame = tryParseFrame(this.buffer, this.maxPayload);
      } catch (err: unknown) {
        const code = err instanceof FrameError ? err.closeCode : CLOSE_CODE.PROTOCOL_ERROR;
        this.log.warn({ err }, 'Malformed frame from client');
        this.write(encodeCloseFrame(code, 'protocol error'));
        this.stopInbound('frame_parse_error');
        return;
      }

      if (frame === null) return; // need more bytes

      this.buffer = this.buffer.subarray(frame.nextOffset);
      this.alive = true;

      if (frame.opcode === OPCODE.PONG) {
        continue;
      }

      if (frame.opcode === OPCODE.PING) {
        this.write(encodeControlFrame(OPCODE.PONG, frame.payload));
        continue;
      }

      if (frame.opcode === OPCODE.CLOSE) {
        this.log.debug('Close frame received from client');
        this.write(encodeControlFrame(OPCODE.CLOSE, frame.payload));
        this.stopInbound('close_frame');
        return;
      }

      // TEXT / BINARY / CONTINUATION: nothing to act on.
    }
  }
}
