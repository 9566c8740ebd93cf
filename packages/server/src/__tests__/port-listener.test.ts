/**
 * Port Listener Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer } from 'net';
import type { Server, Socket } from 'net';
import { EventCollector } from '@honeyport/trace';
import { AdmissionGate } from '../admission-gate.js';
import { ConnectionRegistry } from '../connection-registry.js';
import { PortListener } from '../port-listener.js';
import type { ListenerContext } from '../port-listener.js';
import type { Connection } from '../connection.js';
import { closedPeer, freePort, openPeer, waitFor } from './helpers.js';

describe('PortListener', () => {
  let collector: EventCollector;
  let registry: ConnectionRegistry;
  let dispatched: Connection[];
  let peers: Socket[];
  let listeners: PortListener[];

  function makeListener(gate: AdmissionGate, port = 0, extra: Partial<ListenerContext> = {}): PortListener {
    const listener = new PortListener(port, {
      host: '127.0.0.1',
      gate,
      registry,
      log: collector,
      dispatch: connection => dispatched.push(connection),
      ...extra,
    });
    listeners.push(listener);
    return listener;
  }

  async function peer(port: number): Promise<Socket> {
    const socket = await openPeer(port);
    socket.on('error', () => undefined);
    peers.push(socket);
    return socket;
  }

  beforeEach(() => {
    collector = new EventCollector({ flush_interval_ms: 0 });
    registry = new ConnectionRegistry();
    dispatched = [];
    peers = [];
    listeners = [];
  });

  afterEach(async () => {
    for (const connection of dispatched) {
      registry.unregister(connection);
      connection.token.release();
      connection.socket.destroy();
    }
    peers.forEach(p => p.destroy());
    await Promise.all(listeners.map(l => l.stop()));
    await collector.close();
  });

  describe('start', () => {
    it('should bind and record listener_started', async () => {
      const listener = makeListener(new AdmissionGate(1));

      await expect(listener.start()).resolves.toBe(true);

      expect(listener.getState()).toBe('listening');
      expect(listener.boundPort).toBeGreaterThan(0);
      const events = collector.getEventsByType('listener_started');
      expect(events).toHaveLength(1);
      expect(events[0].payload).toEqual({ port: listener.boundPort, host: '127.0.0.1' });
    });

    it('should record listen_error when the port is taken', async () => {
      const occupier: Server = createServer();
      await new Promise<void>(resolve => occupier.listen({ port: 0, host: '127.0.0.1' }, () => resolve()));
      const address = occupier.address();
      const taken = address !== null && typeof address === 'object' ? address.port : 0;

      try {
        const listener = makeListener(new AdmissionGate(1), taken);

        await expect(listener.start()).resolves.toBe(false);

        expect(listener.getState()).toBe('stopped');
        const events = collector.getEventsByType('listen_error');
        expect(events).toHaveLength(1);
        expect(events[0].severity).toBe('error');
        expect(events[0].payload.port).toBe(taken);
        expect(String(events[0].payload.err)).toContain('EADDRINUSE');
      } finally {
        await new Promise<void>(resolve => occupier.close(() => resolve()));
      }
    });
  });

  describe('Accept loop', () => {
    it('should register and dispatch admitted connections', async () => {
      const gate = new AdmissionGate(2);
      const listener = makeListener(gate);
      await listener.start();
      void listener.run();

      await peer(listener.boundPort);
      await waitFor(() => dispatched.length === 1);

      const [connection] = dispatched;
      expect(connection.port).toBe(listener.boundPort);
      expect(registry.has(connection.id)).toBe(true);
      expect(connection.record.remote_addr).toMatch(/^127\.0\.0\.1:\d+$/);
      expect(gate.inUse).toBe(1);
      expect(listener.acceptedTotal).toBe(1);
    });

    it('should leave peers queued while the gate is saturated', async () => {
      const gate = new AdmissionGate(1);
      const listener = makeListener(gate);
      await listener.start();
      void listener.run();

      await peer(listener.boundPort);
      await waitFor(() => dispatched.length === 1);
      await peer(listener.boundPort);
      await waitFor(() => listener.queuedCount === 1);

      expect(dispatched).toHaveLength(1);

      dispatched[0].token.release();
      await waitFor(() => dispatched.length === 2);
      expect(listener.queuedCount).toBe(0);
    });

    it('should log accept failures and keep accepting', async () => {
      const gate = new AdmissionGate(1);
      const listener = makeListener(gate);
      await listener.start();
      void listener.run();

      listener['server'].emit('error', new Error('EMFILE: too many open files'));
      await waitFor(() => collector.getEventsByType('accept_error').length === 1);

      const [event] = collector.getEventsByType('accept_error');
      expect(event.severity).toBe('warn');
      expect(event.payload).toEqual({ port: listener.boundPort, err: 'EMFILE: too many open files' });

      await peer(listener.boundPort);
      await waitFor(() => dispatched.length === 1);
      expect(gate.inUse).toBe(1);
      expect(listener.getState()).toBe('listening');
    });
  });

  describe('stop', () => {
    it('should unblock a pending accept and end the loop', async () => {
      const gate = new AdmissionGate(1);
      const listener = makeListener(gate);
      await listener.start();
      const loop = listener.run();

      await listener.stop();
      await loop;

      expect(listener.getState()).toBe('stopped');
      expect(gate.inUse).toBe(0);
      const events = collector.getEventsByType('listener_stopped');
      expect(events).toHaveLength(1);
      expect(events[0].payload).toEqual({ port: listener.boundPort });
    });

    it('should end a loop that is waiting for admission', async () => {
      const gate = new AdmissionGate(1);
      const held = await gate.acquire();
      const listener = makeListener(gate);
      await listener.start();
      const loop = listener.run();

      await listener.stop();
      await loop;

      expect(listener.getState()).toBe('stopped');
      expect(gate.waiting).toBe(0);
      held?.release();
    });

    it('should disconnect peers still waiting for admission', async () => {
      const gate = new AdmissionGate(1);
      const held = await gate.acquire();
      const listener = makeListener(gate);
      await listener.start();
      void listener.run();

      const waiting = await peer(listener.boundPort);
      await waitFor(() => listener.queuedCount === 1);

      await listener.stop();
      await closedPeer(waiting);

      expect(listener.queuedCount).toBe(0);
      expect(dispatched).toHaveLength(0);
      held?.release();
    });

    it('should be safe to call twice', async () => {
      const listener = makeListener(new AdmissionGate(1));
      await listener.start();
      void listener.run();

      await listener.stop();
      await listener.stop();

      expect(collector.getEventsByType('listener_stopped')).toHaveLength(1);
    });

    it('should mark a never-started listener stopped', async () => {
      const listener = makeListener(new AdmissionGate(1));

      await listener.stop();

      expect(listener.getState()).toBe('stopped');
      await expect(listener.start()).resolves.toBe(false);
    });

    it('should close a listener stopped while it is still binding', async () => {
      const port = await freePort();
      const listener = makeListener(new AdmissionGate(1), port);

      const starting = listener.start();
      await listener.stop();

      await expect(starting).resolves.toBe(false);
      expect(listener.getState()).toBe('stopped');
      expect(collector.getEventsByType('listener_started')).toHaveLength(0);
      await expect(openPeer(port)).rejects.toThrow(/ECONNREFUSED/);
    });
  });

  describe('queue timeout', () => {
    it('should disconnect a peer that waits too long for admission', async () => {
      const gate = new AdmissionGate(1);
      const held = await gate.acquire();
      const listener = makeListener(gate, 0, { queueTimeoutMs: 200 });
      await listener.start();
      void listener.run();

      const waiting = await peer(listener.boundPort);
      await waitFor(() => listener.queuedCount === 1);
      await closedPeer(waiting);

      expect(listener.queuedCount).toBe(0);
      expect(dispatched).toHaveLength(0);
      held?.release();
    });

    it('should keep a peer admitted before the timeout', async () => {
      const gate = new AdmissionGate(1);
      const held = await gate.acquire();
      const listener = makeListener(gate, 0, { queueTimeoutMs: 300 });
      await listener.start();
      void listener.run();

      await peer(listener.boundPort);
      await waitFor(() => listener.queuedCount === 1);
      held?.release();
      await waitFor(() => dispatched.length === 1);
      await new Promise(resolve => setTimeout(resolve, 400));

      expect(dispatched[0].socket.destroyed).toBe(false);
    });
  });
});
