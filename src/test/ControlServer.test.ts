import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { WebSocket } from 'ws';
import { ServoSystem } from '../ServoSystem';
import { RecordingDriver } from './helpers';

type Sent = Record<string, unknown>;

interface Peer {
  socket: WebSocket;
  messages: Sent[];
  closed: Promise<number>;
  waitFor(type: string, count?: number): Promise<Sent>;
}

function connect(port: number): Promise<Peer> {
  const socket = new WebSocket(`ws://127.0.0.1:${port}`);
  const messages: Sent[] = [];
  let waiters: Array<() => void> = [];

  socket.on('message', (data) => {
    messages.push(JSON.parse(data.toString()));
    const pending = waiters;
    waiters = [];
    pending.forEach(check => check());
  });

  const closed = new Promise<number>((resolve) => {
    socket.once('close', (code) => resolve(code));
  });

  function waitFor(type: string, count = 1): Promise<Sent> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => reject(new Error(`Timed out waiting for ${type}`)), 2000);
      const check = (): void => {
        const matching = messages.filter(message => message.type === type);
        if (matching.length >= count) {
          clearTimeout(timer);
          resolve(matching[count - 1]);
          return;
        }
        waiters.push(check);
      };
      check();
    });
  }

  return new Promise((resolve, reject) => {
    socket.once('open', () => resolve({ socket, messages, closed, waitFor }));
    socket.once('error', reject);
  });
}

function count(peer: Peer, type: string): number {
  return peer.messages.filter(message => message.type === type).length;
}

describe('ControlServer', () => {
  let directory: string;
  let system: ServoSystem;
  let port: number;
  const peers: Peer[] = [];

  async function join(): Promise<Peer> {
    const peer = await connect(port);
    peers.push(peer);
    return peer;
  }

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'servo-server-'));
    system = new ServoSystem({
      env: {},
      driver: new RecordingDriver(),
      config: {
        logLevel: 'error',
        motion: { tickRateHz: 50 },
        profiles: { directory },
        server: { host: '127.0.0.1', port: 0, broadcastIntervalMs: 50, pingIntervalMs: 50, pongTimeoutMs: 100 },
      },
    });
    await system.initialize();
    const server = await system.startServer();
    const bound = server.getPort();
    if (bound === undefined) throw new Error('server did not bind');
    port = bound;
  });

  afterEach(async () => {
    for (const peer of peers.splice(0)) peer.socket.terminate();
    // Latched so shutdown skips the homing move
    system.getContext().validator.triggerEmergencyStop('test teardown');
    await system.shutdown();
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('greets each connection with the full status', async () => {
    const peer = await join();

    const greeting = await peer.waitFor('initial_status');

    expect(peer.messages[0].type).toBe('initial_status');
    expect(greeting).toMatchObject({ driver: { name: 'simulated', connected: true }, clients: 1 });
    expect(greeting.servos).toHaveLength(16);
  });

  it('answers malformed JSON without closing the socket', async () => {
    const peer = await join();
    await peer.waitFor('initial_status');

    peer.socket.send('{ nope');

    expect(await peer.waitFor('error')).toMatchObject({ message: 'Invalid JSON format' });
    expect(peer.socket.readyState).toBe(WebSocket.OPEN);
  });

  it('pushes status updates at a fixed interval', async () => {
    const peer = await join();

    const update = await peer.waitFor('status_update', 3);

    expect(update).toMatchObject({ clients: 1, safety: { emergencyStopActive: false } });
  });

  it('fans an emergency stop out to every socket', async () => {
    const operator = await join();
    const observer = await join();
    await observer.waitFor('initial_status');

    operator.socket.send(JSON.stringify({ type: 'emergency_stop' }));

    expect(await operator.waitFor('emergency_response')).toMatchObject({ success: true, active: true });
    const notice = await observer.waitFor('emergency_stop_activated');
    expect(String(notice.reason).startsWith('Requested by client client_')).toBe(true);
    expect(system.getContext().validator.isEmergencyStopped()).toBe(true);
  });

  it('closes a client that stops answering pings', async () => {
    const live = await join();
    const silent = await join();
    silent.socket.pong = () => undefined;

    await silent.closed;

    expect(live.socket.readyState).toBe(WebSocket.OPEN);
    const after = count(live, 'status_update');
    expect(await live.waitFor('status_update', after + 1)).toMatchObject({ clients: 1 });
  });
});
