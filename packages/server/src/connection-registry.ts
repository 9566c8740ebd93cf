/**
 * Connection Registry
 *
 * Set of live connections, kept so shutdown can force-close whatever is still
 * being handled.
 */

import type { EventSink } from '@honeyport/protocol';
import { HoneyportError } from '@honeyport/protocol';
import type { Connection } from './connection.js';

export class ConnectionRegistry {
  private readonly connections = new Map<string, Connection>();

  constructor(private readonly log?: EventSink) {}

  register(connection: Connection): void {
    if (this.connections.has(connection.id)) {
      throw new HoneyportError('ALREADY_REGISTERED', `Connection ${connection.id} is already registered`);
    }
    this.connections.set(connection.id, connection);
  }

  /**
   * Remove an entry. Returns false when it was already gone.
   */
  unregister(connection: Connection | string): boolean {
    const id = typeof connection === 'string' ? connection : connection.id;
    return this.connections.delete(id);
  }

  has(id: string): boolean {
    return this.connections.has(id);
  }

  get size(): number {
    return this.connections.size;
  }

  /**
   * Snapshot and clear the registry, then destroy every socket in the snapshot.
   * Handlers that finish concurrently find their entry gone and skip it.
   */
  closeAll(): number {
    const snapshot = [...this.connections.values()];
    this.connections.clear();

    for (const connection of snapshot) {
      connection.socket.destroy();
    }

    this.log?.record('connections_closed', { count: snapshot.length });
    return snapshot.length;
  }
}
