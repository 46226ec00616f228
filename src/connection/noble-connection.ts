/**
 * BLE transport on top of noble.
 *
 * Scans for a hub advertising the hub service, optionally matching a MAC
 * address or advertised name, connects, and exposes the single hub
 * characteristic through the Connection interface. Writes go out without
 * response; notifications arrive on the characteristic's 'data' event.
 *
 * A handler that throws (a protocol violation in the hub engine) is fatal
 * for the link: the error is logged, re-emitted as 'error' and the
 * connection is dropped.
 */

import { EventEmitter } from 'events';
import type * as NobleModule from '@abandonware/noble';
import type { Characteristic, Peripheral } from '@abandonware/noble';
import type { Logger } from 'pino';
import { Connection, NotificationHandler } from './connection';
import { HUB_HARDWARE_HANDLE } from '../messages/constants';
import { getLogger } from '../logger';
import { toError } from '../errors';
import { toHex } from '../utils/hex';

export const HUB_SERVICE_UUID = '000016231212efde1623785feabcd123';
export const HUB_CHARACTERISTIC_UUID = '000016241212efde1623785feabcd123';

export interface NobleConnectionOptions {
  /** MAC address to connect to; first hub found when omitted */
  address?: string;
  /** Advertised local name to match */
  name?: string;
  scanTimeoutMs: number;
}

type Noble = typeof NobleModule;

let loaded: Promise<Noble> | undefined;

/** The native HCI bindings load on first use, not at import */
function loadNoble(): Promise<Noble> {
  loaded ??= import('@abandonware/noble').then(
    (mod) => mod.default,
    (err: unknown) => {
      loaded = undefined;
      throw new Error(`Bluetooth support unavailable: ${toError(err).message}`);
    },
  );
  return loaded;
}

/** Adapter state as noble exposes it */
export interface BluetoothAdapter {
  _state: string;
  on(event: 'stateChange', listener: (state: string) => void): unknown;
  removeListener(event: 'stateChange', listener: (state: string) => void): unknown;
}

export function waitForPoweredOn(adapter: BluetoothAdapter, timeoutMs: number): Promise<void> {
  if (adapter._state === 'poweredOn') return Promise.resolve();
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      adapter.removeListener('stateChange', onStateChange);
      reject(new Error(`Bluetooth adapter not powered on after ${timeoutMs}ms (state: ${adapter._state})`));
    }, timeoutMs);
    const onStateChange = (state: string) => {
      if (state !== 'poweredOn') return;
      clearTimeout(timer);
      adapter.removeListener('stateChange', onStateChange);
      resolve();
    };
    adapter.on('stateChange', onStateChange);
  });
}

function matches(peripheral: Peripheral, options: NobleConnectionOptions): boolean {
  if (options.address && peripheral.address.toLowerCase() !== options.address.toLowerCase()) {
    return false;
  }
  if (options.name && peripheral.advertisement.localName !== options.name) {
    return false;
  }
  return true;
}

async function discoverHub(options: NobleConnectionOptions, log: Logger): Promise<Peripheral> {
  const noble = await loadNoble();
  await waitForPoweredOn(noble, options.scanTimeoutMs);

  let onDiscover: ((peripheral: Peripheral) => void) | undefined;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const found = new Promise<Peripheral>((resolve, reject) => {
    timer = setTimeout(
      () => reject(new Error(`No hub found within ${options.scanTimeoutMs}ms`)),
      options.scanTimeoutMs,
    );
    onDiscover = (peripheral: Peripheral) => {
      log.debug({ address: peripheral.address, name: peripheral.advertisement.localName }, 'Discovered');
      if (matches(peripheral, options)) resolve(peripheral);
    };
    noble.on('discover', onDiscover);
  });

  try {
    await noble.startScanningAsync([HUB_SERVICE_UUID], false);
    return await found;
  } finally {
    clearTimeout(timer);
    if (onDiscover) noble.removeListener('discover', onDiscover);
    await noble.stopScanningAsync();
  }
}

export class NobleConnection extends EventEmitter implements Connection {
  private handler: NotificationHandler | null = null;
  private subscribed = false;
  private closed = false;

  private constructor(
    private readonly peripheral: Peripheral,
    private readonly characteristic: Characteristic,
    private readonly log: Logger,
  ) {
    super();
    characteristic.on('data', (data: Buffer) => this.deliver(data));
    peripheral.once('disconnect', () => {
      this.closed = true;
      this.log.info({ address: peripheral.address }, 'Link dropped');
      this.emit('disconnected');
    });
  }

  /** Scan, connect and resolve the hub characteristic */
  static async open(options: NobleConnectionOptions): Promise<NobleConnection> {
    const log = getLogger('Noble');
    const peripheral = await discoverHub(options, log);
    log.info({ address: peripheral.address, name: peripheral.advertisement.localName }, 'Connecting');
    await peripheral.connectAsync();

    const { characteristics } = await peripheral.discoverSomeServicesAndCharacteristicsAsync(
      [HUB_SERVICE_UUID],
      [HUB_CHARACTERISTIC_UUID],
    );
    const characteristic = characteristics.find((c) => c.uuid === HUB_CHARACTERISTIC_UUID);
    if (!characteristic) {
      await peripheral.disconnectAsync();
      throw new Error(`Hub characteristic ${HUB_CHARACTERISTIC_UUID} not found on ${peripheral.address}`);
    }
    return new NobleConnection(peripheral, characteristic, log);
  }

  async write(handle: number, data: Buffer): Promise<void> {
    this.log.debug({ handle, data: toHex(data) }, 'Write');
    await this.characteristic.writeAsync(data, true);
  }

  setNotificationHandler(handler: NotificationHandler): void {
    this.handler = handler;
  }

  async enableNotifications(): Promise<void> {
    if (this.subscribed) return;
    await this.characteristic.subscribeAsync();
    this.subscribed = true;
  }

  async disconnect(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.characteristic.removeAllListeners('data');
    await this.peripheral.disconnectAsync();
  }

  isAlive(): boolean {
    return !this.closed && this.peripheral.state === 'connected';
  }

  private deliver(data: Buffer): void {
    if (!this.handler) {
      this.log.warn({ data: toHex(data) }, 'Notification before handler was installed');
      return;
    }
    try {
      this.handler(HUB_HARDWARE_HANDLE, data);
    } catch (err) {
      const error = toError(err);
      this.log.fatal({ err: error, data: toHex(data) }, 'Notification handling failed, dropping link');
      this.disconnect().catch((e: unknown) => this.log.error({ err: toError(e) }, 'Disconnect failed'));
      this.emit('error', error);
    }
  }
}
