import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBroadcaster } from '../../src/application/event-broadcaster.js';
import type { DomainEvent } from '../../src/domain/index.js';
import { CLOSE_CODE, OPCODE } from '../../src/interfaces/ws/frames.js';
import { CLOSE_LINGER_MS, SubscriberSession } from '../../src/interfaces/ws/subscriber-session.js';
import { silentLogger } from '../helpers.js';
import { FakeSocket, clientFrame, decodeServerFrames } from './ws-helpers.js';

const SCHEMA_ID = '11111111-1111-4111-8111-111111111111';

function created(id: number): DomainEvent {
  return {
    event_type: 'created',
    id,
    schema_id: SCHEMA_ID,
    log_data: { message: `m${id}` },
    created_at: '2026-03-01T10:00:00.000Z',
  };
}

let broadcaster: EventBroadcaster;

beforeEach(() => {
  broadcaster = new EventBroadcaster({ log: silentLogger() });
});

function open(socket = new FakeSocket(), head?: Buffer) {
  const subscription = broadcaster.subscribe({ schemaId: SCHEMA_ID });
  const session = new SubscriberSession({ id: 1, socket, subscription, log: silentLogger(), head });
  const done = session.run();
  return { socket, session, subscription, done };
}

function frames(socket: FakeSocket) {
  return decodeServerFrames(Buffer.concat(socket.written));
}

function textMessages(socket: FakeSocket): unknown[] {
  return frames(socket)
    .filter((f) => f.opcode === OPCODE.TEXT)
    .map((f): unknown => JSON.parse(f.payload.toString('utf-8')));
}

// ─── outbound ────────────────────────────────────────────────

describe('SubscriberSession outbound', () => {
  it('writes published events as JSON text frames', async () => {
    const { socket, session } = open();
    expect(session.state).toBe('active');

    broadcaster.publish(created(1));
    broadcaster.publish({ event_type: 'deleted', id: 1, schema_id: SCHEMA_ID });

    await vi.waitFor(() => {
      expect(textMessages(socket)).toEqual([
        created(1),
        { event_type: 'deleted', id: 1, schema_id: SCHEMA_ID },
      ]);
    });
  });

  it('waits for drain when the socket buffer is full', async () => {
    const socket = new FakeSocket({ writableHighWaterMark: 1 });
    socket.stall();
    open(socket);

    broadcaster.publish(created(1));
    broadcaster.publish(created(2));
    broadcaster.publish(created(3));

    await vi.waitFor(() => {
      expect(socket.written).toHaveLength(1);
    });

    socket.resumeWrites();

    await vi.waitFor(() => {
      expect(textMessages(socket)).toEqual([created(1), created(2), created(3)]);
    });
  });
});

// ─── inbound ─────────────────────────────────────────────────

describe('SubscriberSession inbound', () => {
  it('answers a ping with a pong carrying the same payload', async () => {
    const { socket } = open();

    socket.receive(clientFrame(OPCODE.PING, Buffer.from('are-you-there')));

    await vi.waitFor(() => {
      expect(frames(socket)).toEqual([
        { opcode: OPCODE.PONG, payload: Buffer.from('are-you-there') },
      ]);
    });
  });

  it('processes frames that arrived with the upgrade', async () => {
    const { socket } = open(new FakeSocket(), clientFrame(OPCODE.PING, Buffer.from('early')));

    await vi.waitFor(() => {
      expect(frames(socket)[0]?.payload.toString()).toBe('early');
    });
  });

  it('ignores text frames from the client', async () => {
    const { socket, session } = open();

    socket.receive(clientFrame(OPCODE.TEXT, Buffer.from('hello')));
    socket.receive(clientFrame(OPCODE.PING));

    await vi.waitFor(() => {
      expect(frames(socket).map((f) => f.opcode)).toEqual([OPCODE.PONG]);
    });
    expect(session.state).toBe('active');
  });

  it('echoes a client close and finishes', async () => {
    const { socket, session, done } = open();
    const closePayload = Buffer.from([0x03, 0xe8]);

    socket.receive(clientFrame(OPCODE.CLOSE, closePayload));

    await expect(done).resolves.toBe('close_frame');
    expect(session.state).toBe('closed');
    expect(frames(socket)).toEqual([{ opcode: OPCODE.CLOSE, payload: closePayload }]);
    expect(broadcaster.size).toBe(0);
    await vi.waitFor(() => {
      expect(socket.destroyed).toBe(true);
    });
  });

  it('closes with a protocol error on a malformed frame', async () => {
    const { socket, done } = open();

    socket.receive(clientFrame(OPCODE.TEXT, Buffer.from('x'), { masked: false }));

    await expect(done).resolves.toBe('frame_parse_error');
    const [closeFrame] = frames(socket);
    expect(closeFrame?.opcode).toBe(OPCODE.CLOSE);
    expect(closeFrame?.payload.readUInt16BE(0)).toBe(CLOSE_CODE.PROTOCOL_ERROR);
  });

  it('finishes when the peer drops the connection', async () => {
    const { socket, subscription, done } = open();

    socket.destroy();

    await expect(done).resolves.toBe('socket_closed');
    expect(subscription.isClosed).toBe(true);
  });
});

// ─── close / heartbeat ───────────────────────────────────────

describe('SubscriberSession.close', () => {
  it('sends a close frame with the code and is idempotent', async () => {
    const { socket, session, done } = open();

    session.close('server_shutdown', CLOSE_CODE.GOING_AWAY);
    session.close('again', CLOSE_CODE.NORMAL);

    await expect(done).resolves.toBe('server_shutdown');
    const closes = frames(socket).filter((f) => f.opcode === OPCODE.CLOSE);
    expect(closes).toHaveLength(1);
    expect(closes[0]?.payload.readUInt16BE(0)).toBe(CLOSE_CODE.GOING_AWAY);
    expect(closes[0]?.payload.subarray(2).toString()).toBe('server_shutdown');
  });

  it('does not block a concurrent publish', () => {
    const { session } = open();

    session.close('server_shutdown');

    expect(broadcaster.publish(created(1))).toBe(0);
    expect(session.state).toBe('closing');
  });

  it('destroys a socket whose peer stopped reading without queueing a close frame', async () => {
    const socket = new FakeSocket({ writableHighWaterMark: 1 });
    socket.stall();
    const { session, done } = open(socket);

    broadcaster.publish(created(1));
    broadcaster.publish(created(2));
    await vi.waitFor(() => {
      expect(socket.writableLength).toBeGreaterThan(0);
    });

    session.close('heartbeat_timeout', CLOSE_CODE.NORMAL);

    expect(socket.destroyed).toBe(true);
    await expect(done).resolves.toBe('heartbeat_timeout');
    expect(frames(socket).filter((f) => f.opcode === OPCODE.CLOSE)).toEqual([]);
  });

  it('destroys the socket when the close frame never flushes', async () => {
    vi.useFakeTimers();
    try {
      const socket = new FakeSocket();
      const { session, done } = open(socket);
      socket.stall();

      session.close('server_shutdown', CLOSE_CODE.GOING_AWAY);
      expect(socket.destroyed).toBe(false);

      vi.advanceTimersByTime(CLOSE_LINGER_MS);

      expect(socket.destroyed).toBe(true);
      await expect(done).resolves.toBe('server_shutdown');
      expect(session.state).toBe('closed');
    } finally {
      vi.useRealTimers();
    }
  });

  it('resolves run() at once when closed before starting', async () => {
    const socket = new FakeSocket();
    const subscription = broadcaster.subscribe();
    const session = new SubscriberSession({ id: 2, socket, subscription, log: silentLogger() });

    session.close('rejected');

    await expect(session.run()).resolves.toBe('rejected');
    expect(session.state).toBe('closed');
  });
});

describe('SubscriberSession.heartbeat', () => {
  it('pings, then closes a client that never answered', async () => {
    const { socket, session, done } = open();

    expect(session.heartbeat()).toBe(true);
    expect(frames(socket).map((f) => f.opcode)).toEqual([OPCODE.PING]);

    expect(session.heartbeat()).toBe(false);
    await expect(done).resolves.toBe('heartbeat_timeout');
  });

  it('keeps a client that answered the ping', async () => {
    const { socket, session } = open();

    session.heartbeat();
    socket.receive(clientFrame(OPCODE.PONG));
    // The pong to this ping shows the client's frames were read.
    socket.receive(clientFrame(OPCODE.PING, Buffer.from('sync')));

    await vi.waitFor(() => {
      expect(frames(socket).map((f) => f.opcode)).toEqual([OPCODE.PING, OPCODE.PONG]);
    });
    expect(session.heartbeat()).toBe(true);
  });
});
