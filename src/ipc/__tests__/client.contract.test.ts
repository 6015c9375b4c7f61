/**
 * IPC Client Contract Tests
 *
 * Drives the public IPCClient API against an in-process mpv stand-in on a
 * Unix socket.
 *
 * What we test:
 * ✅ Behavior: execute() → one reply per call, matched by request_id
 * ✅ Invariants: no cross-delivery, fail-fast after close, timeouts bound each phase
 * ✅ Edge cases: player not running, player hangs up, player stops reading,
 *    malformed lines, events mid-call
 *
 * What we DON'T test:
 * ❌ Reader/writer loop internals (covered by their unit tests)
 */

import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import { createServer, type Server, type Socket } from 'node:net';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { MockMpvServer, waitFor } from '@/__testutils__/index.js';
import { IPCClient } from '@/ipc/client.js';
import { EventRouter } from '@/ipc/events.js';
import type { Notification } from '@/ipc/protocol/index.js';
import {
  ClientClosedError,
  ConnectionClosedError,
  ConnectionError,
  RecvTimeoutError,
  SendTimeoutError,
} from '@/ipc/transport/IPCError.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

void describe('IPCClient contract', () => {
  let server: MockMpvServer;
  let client: IPCClient | undefined;

  beforeEach(async () => {
    server = await MockMpvServer.start();
  });

  afterEach(async () => {
    await client?.close();
    client = undefined;
    await server.stop();
  });

  async function open(options: { timeoutMs?: number; sink?: EventRouter } = {}): Promise<IPCClient> {
    client = await IPCClient.open({
      socketPath: server.socketPath,
      timeoutMs: options.timeoutMs ?? 1000,
      ...(options.sink && { notificationSink: options.sink }),
    });
    return client;
  }

  void describe('request/reply', () => {
    void it('reads the pause property', async () => {
      const c = await open();

      const reply = await c.execute(['get_property', 'pause']);

      assert.deepEqual(reply, { error: '', data: false, event: '', requestId: 1 });
      assert.deepEqual(server.received, [{ command: ['get_property', 'pause'], requestId: 1 }]);
    });

    void it('returns player errors in the reply instead of throwing', async () => {
      const c = await open();

      const reply = await c.execute(['get_property', 'no-such-property']);

      assert.equal(reply.error, 'property unavailable');
      assert.equal(reply.data, undefined);
    });

    void it('numbers requests 1, 2, 3 on one connection', async () => {
      const c = await open();

      await c.execute(['get_property', 'volume']);
      await c.execute(['set_property', 'volume', 40]);
      const reply = await c.execute(['get_property', 'volume']);

      assert.equal(reply.data, 40);
      assert.deepEqual(
        server.received.map((request) => request.requestId),
        [1, 2, 3]
      );
      assert.equal(server.connections, 1);
    });
  });

  void describe('correlation', () => {
    void it('matches replies that arrive in reverse order', async () => {
      const c = await open();
      server.hold = true;

      const volume = c.execute(['get_property', 'volume']);
      const pause = c.execute(['get_property', 'pause']);
      await server.waitForRequests(2);
      server.release([2, 1]);

      assert.equal((await volume).data, 100);
      assert.equal((await pause).data, false);
    });

    void it('never delivers one caller another caller\'s reply', async () => {
      const c = await open();
      for (let i = 0; i < 20; i++) {
        server.properties.set(`prop-${i}`, i);
      }
      server.hold = true;

      const calls = Array.from({ length: 20 }, (_, i) => c.execute(['get_property', `prop-${i}`]));
      await server.waitForRequests(20);
      const ids = server.heldIds;
      const evens = ids.filter((id) => id % 2 === 0).reverse();
      const odds = ids.filter((id) => id % 2 === 1);
      server.release([...evens, ...odds]);

      const replies = await Promise.all(calls);
      replies.forEach((reply, i) => assert.equal(reply.data, i));
      assert.deepEqual(c.stats(), {
        delivered: 20,
        late: 0,
        notifications: 0,
        malformed: 0,
        unmatched: 0,
        pending: 0,
      });
    });
  });

  void describe('notifications', () => {
    void it('hands events to the sink while a call is in flight', async () => {
      const events = new EventRouter();
      const seen: Notification[] = [];
      events.onAny((n) => seen.push(n));
      const c = await open({ sink: events });
      server.hold = true;

      const call = c.execute(['get_property', 'volume']);
      await server.waitForRequests(1);
      server.notify('start-file', { playlist_entry_id: 1 });
      server.release();

      assert.equal((await call).data, 100);
      assert.equal(seen.length, 1);
      assert.equal(seen[0]?.event, 'start-file');
      assert.equal(seen[0]?.fields['playlist_entry_id'], 1);
    });
  });

  void describe('protocol errors', () => {
    void it('drops malformed lines and keeps serving calls', async () => {
      const c = await open();

      server.send('not json\n');
      server.send('{"request_id":"seven"}\n');
      const reply = await c.execute(['get_property', 'pause']);

      assert.equal(reply.data, false);
      assert.equal(c.stats().malformed, 2);
    });

    void it('drops replies nobody is waiting for', async () => {
      const c = await open();

      server.send('{"request_id":999,"error":"success","data":1}\n');
      await c.execute(['get_property', 'pause']);

      assert.equal(c.stats().unmatched, 1);
    });
  });

  void describe('timeouts', () => {
    void it('fails the receive phase after the deadline, not before', async () => {
      const c = await open({ timeoutMs: 80 });
      server.hold = true;

      const started = Date.now();
      await assert.rejects(
        c.execute(['get_property', 'pause']),
        (error: unknown) =>
          error instanceof RecvTimeoutError &&
          error.phase === 'recv' &&
          error.message === 'Timeout after 80ms while waiting for get_property response'
      );
      const elapsed = Date.now() - started;

      // Timer granularity is 1ms
      assert.ok(elapsed >= 79, `rejected after ${elapsed}ms`);
      assert.equal(c.stats().pending, 1);
    });

    void it('lets a late reply land without disturbing later calls', async () => {
      const c = await open({ timeoutMs: 50 });
      server.hold = true;

      await assert.rejects(c.execute(['get_property', 'volume']), RecvTimeoutError);
      server.hold = false;
      server.release();
      const reply = await c.execute(['get_property', 'pause']);

      assert.equal(reply.data, false);
      assert.equal(reply.requestId, 2);
      assert.equal(c.stats().pending, 0);
      assert.equal(c.stats().late, 1);
      assert.equal(c.stats().delivered, 1);
    });
  });

  void describe('send timeout', () => {
    let dir: string;
    let stalledPath: string;
    let peer: Server;
    let accepted: Socket[];

    beforeEach(async () => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mpvctl-stalled-'));
      stalledPath = path.join(dir, 'mpv.sock');
      accepted = [];
      peer = createServer((socket) => {
        socket.pause();
        accepted.push(socket);
      });
      await new Promise<void>((resolve) => peer.listen(stalledPath, resolve));
    });

    afterEach(async () => {
      accepted.forEach((socket) => socket.destroy());
      await new Promise<void>((resolve) => peer.close(() => resolve()));
      fs.rmSync(dir, { recursive: true, force: true });
    });

    function readUntilClosed(socket: Socket): Promise<string> {
      return new Promise((resolve) => {
        const chunks: Buffer[] = [];
        socket.on('data', (chunk: Buffer) => chunks.push(chunk));
        socket.on('error', () => {});
        socket.on('close', () => resolve(Buffer.concat(chunks).toString('utf8')));
        socket.resume();
      });
    }

    void it('reports a command the writer never took as a send timeout', async () => {
      const c = await IPCClient.open({ socketPath: stalledPath, timeoutMs: 200 });
      client = c;

      // Far more than the socket buffers hold, so the writer stays blocked on it
      const blocking = assert.rejects(
        c.execute(['print-text', 'x'.repeat(20 * 1024 * 1024)]),
        RecvTimeoutError
      );
      const started = Date.now();
      await assert.rejects(
        c.execute(['get_property', 'volume']),
        (error: unknown) =>
          error instanceof SendTimeoutError &&
          error.phase === 'send' &&
          error.message === 'Timeout after 200ms while sending get_property'
      );
      const elapsed = Date.now() - started;
      await blocking;

      assert.ok(elapsed >= 199, `rejected after ${elapsed}ms`);
      assert.equal(c.stats().pending, 1);

      await c.close();
      const [socket] = accepted;
      assert.ok(socket);
      const received = await readUntilClosed(socket);
      assert.ok(received.startsWith('{"command":["print-text","xxx'));
      assert.equal(received.includes('get_property'), false);
    });
  });

  void describe('shutdown', () => {
    void it('fails fast after close without writing', async () => {
      const c = await open();
      await c.close();

      await assert.rejects(c.execute(['get_property', 'pause']), ClientClosedError);
      assert.equal(server.received.length, 0);
      assert.equal(c.closed, true);
    });

    void it('fails in-flight calls with ClientClosedError', async () => {
      const c = await open();
      server.hold = true;

      const rejection = assert.rejects(c.execute(['get_property', 'pause']), ClientClosedError);
      await server.waitForRequests(1);
      await c.close();

      await rejection;
      assert.equal(c.stats().pending, 0);
    });

    void it('treats repeated close as a no-op', async () => {
      const c = await open();

      await c.close();
      await c.close();

      assert.equal(c.signal.reason instanceof ClientClosedError, true);
    });

    void it('fails calls with ConnectionClosedError when the player hangs up', async () => {
      const c = await open();
      server.hold = true;

      const rejection = assert.rejects(
        c.execute(['get_property', 'pause']),
        (error: unknown) =>
          error instanceof ConnectionClosedError &&
          error.message === `Connection to ${server.socketPath} closed by peer`
      );
      await server.waitForRequests(1);
      server.disconnectClients();

      await rejection;
      await waitFor(() => c.closed, 'client shutdown');
      await assert.rejects(c.execute(['get_property', 'pause']), ConnectionClosedError);
    });
  });

  void describe('dialing', () => {
    void it('reports a missing socket as ConnectionError with ENOENT', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mpvctl-missing-'));
      const socketPath = path.join(dir, 'absent.sock');
      try {
        await assert.rejects(
          IPCClient.open({ socketPath, dialTimeoutMs: 500 }),
          (error: unknown) =>
            error instanceof ConnectionError &&
            error.code === 'ENOENT' &&
            error.socketPath === socketPath &&
            error.exitCode === EXIT_CODES.RESOURCE_NOT_FOUND
        );
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    void it('cancels the dial when the parent signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort(new ClientClosedError());

      await assert.rejects(
        IPCClient.open({ socketPath: server.socketPath, signal: controller.signal }),
        ClientClosedError
      );
    });
  });
});
