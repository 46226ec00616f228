/**
 * Connection Module Exports
 *
 * Usage:
 *   import { createConnection } from './connection';
 *   const connection = await createConnection(config.connection);
 */

import { EventEmitter } from 'events';
import type { ConnectionConfig } from '../config-schema';
import type { Connection } from './connection';
import { NobleConnection } from './noble-connection';
import { HubEmulator } from '../emulators/hub-emulator';

export type { Connection, NotificationHandler } from './connection';
export { NobleConnection, HUB_SERVICE_UUID, HUB_CHARACTERISTIC_UUID } from './noble-connection';
export type { NobleConnectionOptions } from './noble-connection';

/** A transport that also reports 'error' and 'disconnected' */
export type HubConnection = Connection & EventEmitter;

/**
 * Open the transport named in config: a Bluetooth link through noble, or
 * the in-process emulator.
 */
export async function createConnection(config: ConnectionConfig): Promise<HubConnection> {
  switch (config.type) {
    case 'emulator':
      return new HubEmulator(config.name ? { name: config.name } : {});
    case 'noble':
      return NobleConnection.open({
        address: config.address,
        name: config.name,
        scanTimeoutMs: config.scanTimeoutMs,
      });
  }
}
