/**
 * MockMpvServer - In-process stand-in for mpv's JSON IPC server
 *
 * Listens on a Unix socket in a fresh temp directory and answers the client
 * the way mpv does: property reads and writes against an in-memory map,
 * "success" for everything else. Tests can hold requests back and release
 * them in any order, push events, write raw lines and hang up.
 */

import * as fs from 'node:fs';
import * as net from 'node:net';
import * as os from 'node:os';
import * as path from 'node:path';

import type { EncodableRequest, Reply } from '@/ipc/protocol/index.js';
import { decodeRequest, encodeReply, JSONLBuffer } from '@/ipc/transport/jsonl.js';

interface RequestWaiter {
  count: number;
  resolve: () => void;
}

export class MockMpvServer {
  /** Every request received, in arrival order */
  readonly received: EncodableRequest[] = [];
  /** Property values served by get_property and changed by set_property */
  readonly properties = new Map<string, unknown>([
    ['pause', false],
    ['volume', 100],
  ]);
  /** While true, requests are queued instead of answered */
  hold = false;

  private readonly held: EncodableRequest[] = [];
  private readonly sockets = new Set<net.Socket>();
  private waiters: RequestWaiter[] = [];

  private constructor(
    private readonly server: net.Server,
    private readonly dir: string,
    readonly socketPath: string
  ) {}

  static async start(): Promise<MockMpvServer> {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mpvctl-test-'));
    const socketPath = path.join(dir, 'mpv.sock');
    const server = net.createServer();
    const mock = new MockMpvServer(server, dir, socketPath);
    server.on('connection', (socket) => mock.accept(socket));

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(socketPath, () => {
        server.off('error', reject);
        resolve();
      });
    });
    return mock;
  }

  /**
   * Hang up on every client, stop listening and remove the temp directory.
   */
  async stop(): Promise<void> {
    this.disconnectClients();
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
    fs.rmSync(this.dir, { recursive: true, force: true });
  }

  /**
   * Resolve once at least `count` requests have arrived.
   */
  waitForRequests(count: number): Promise<void> {
    if (this.received.length >= count) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push({ count, resolve }));
  }

  /**
   * Answer held requests; `order` lists request ids, defaulting to arrival order.
   */
  release(order?: number[]): void {
    const ids = order ?? this.held.map((request) => request.requestId);
    for (const id of ids) {
      const index = this.held.findIndex((request) => request.requestId === id);
      const [request] = index === -1 ? [] : this.held.splice(index, 1);
      if (request) {
        this.write(encodeReply(this.answer(request)));
      }
    }
  }

  get heldIds(): number[] {
    return this.held.map((request) => request.requestId);
  }

  /**
   * Push an event to every connected client.
   */
  notify(event: string, extra: Record<string, unknown> = {}): void {
    this.write(JSON.stringify({ event, ...extra }) + '\n');
  }

  /**
   * Write raw text to every connected client.
   */
  send(raw: string): void {
    this.write(raw);
  }

  /**
   * Close every connection after flushing what was already written.
   */
  hangUp(): void {
    for (const socket of this.sockets) {
      socket.end();
    }
  }

  disconnectClients(): void {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
  }

  get connections(): number {
    return this.sockets.size;
  }

  private accept(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.setEncoding('utf8');
    const buffer = new JSONLBuffer();

    socket.on('data', (chunk: string) => {
      for (const line of buffer.process(chunk)) {
        this.handleLine(socket, line);
      }
    });
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', () => this.sockets.delete(socket));
  }

  private handleLine(socket: net.Socket, line: string): void {
    const request = decodeRequest(line);
    this.received.push(request);

    const ready = this.waiters.filter((waiter) => this.received.length >= waiter.count);
    this.waiters = this.waiters.filter((waiter) => this.received.length < waiter.count);
    ready.forEach((waiter) => waiter.resolve());

    if (this.hold) {
      this.held.push(request);
      return;
    }
    socket.write(encodeReply(this.answer(request)));
  }

  private answer(request: EncodableRequest): Reply {
    const [name, property, value] = request.command;
    const reply: Reply = { error: '', data: undefined, event: '', requestId: request.requestId };

    if (name === 'get_property' && typeof property === 'string') {
      if (this.properties.has(property)) {
        return { ...reply, data: this.properties.get(property) };
      }
      return { ...reply, error: 'property unavailable' };
    }
    if (name === 'set_property' && typeof property === 'string') {
      this.properties.set(property, value);
      return reply;
    }
    if (name === 'fail') {
      return { ...reply, error: 'invalid parameter' };
    }
    return reply;
  }

  private write(raw: string): void {
    for (const socket of this.sockets) {
      socket.write(raw);
    }
  }
}
