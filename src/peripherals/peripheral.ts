/**
 * Peripheral base class
 *
 * One instance per attached port. Created and destroyed only by the hub's
 * attachment tracker; holds a back-reference to the hub for sending
 * commands but does not own it.
 *
 * Emits:
 *   'data' (data: Buffer, msg: PortValueMessage) — value notification for this port
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import {
  DownstreamMessage,
  PortInputFormatMessage,
  PortInputFormatSetup,
  PortValueMessage,
  UpstreamMessage,
  UpstreamMessageClass,
} from '../messages';
import { getLogger } from '../logger';
import { hexByte } from '../utils/hex';

/** The slice of the hub a peripheral talks to */
export interface PeripheralHost {
  send(msg: DownstreamMessage): Promise<UpstreamMessage | undefined>;
  request<T extends UpstreamMessage>(msg: DownstreamMessage, reply: UpstreamMessageClass<T>): Promise<T>;
}

export type Capability =
  | 'generic'
  | 'motor'
  | 'encoded-motor'
  | 'vision-sensor'
  | 'rgb-light'
  | 'tilt-sensor'
  | 'current-sensor'
  | 'voltage-sensor';

export interface PeripheralOptions {
  /** Physical ports merged into this virtual port */
  virtualPorts?: [number, number];
  logger?: Logger;
}

export class Peripheral extends EventEmitter {
  readonly capability: Capability = 'generic';
  readonly virtualPorts?: [number, number];

  protected readonly log: Logger;
  private lastData: Buffer | undefined;
  private subscribedMode: number | undefined;

  constructor(
    readonly hub: PeripheralHost,
    readonly port: number,
    options: PeripheralOptions = {},
  ) {
    super();
    this.virtualPorts = options.virtualPorts;
    this.log = (options.logger ?? getLogger('Peripheral')).child({ port: hexByte(port) });
  }

  /** Raw bytes of the most recent value notification */
  get lastValue(): Buffer | undefined {
    return this.lastData;
  }

  /** Mode whose values the hub is currently pushing, if any */
  get mode(): number | undefined {
    return this.subscribedMode;
  }

  get isVirtual(): boolean {
    return this.virtualPorts !== undefined;
  }

  /** Called by the hub for every value notification addressed to this port */
  queuePortData(msg: PortValueMessage): void {
    this.lastData = msg.data;
    this.onData(msg.data);
    this.emit('data', msg.data, msg);
  }

  /** Subclass hook for decoding a raw reading */
  protected onData(_data: Buffer): void {
    // generic peripherals keep only the raw bytes
  }

  /** Have the hub push values of `mode` whenever they change by at least `delta` */
  async subscribe(mode: number, delta = 1): Promise<PortInputFormatMessage> {
    const reply = await this.hub.request(new PortInputFormatSetup(this.port, mode, delta, true), PortInputFormatMessage);
    this.subscribedMode = reply.notify ? reply.mode : undefined;
    this.log.debug({ mode, delta }, 'Subscribed');
    return reply;
  }

  async unsubscribe(): Promise<void> {
    if (this.subscribedMode === undefined) return;
    await this.hub.request(new PortInputFormatSetup(this.port, this.subscribedMode, 1, false), PortInputFormatMessage);
    this.subscribedMode = undefined;
  }

  toString(): string {
    const ports = this.virtualPorts ? ` (${this.virtualPorts.map(hexByte).join('+')})` : '';
    return `${this.constructor.name} on port ${hexByte(this.port)}${ports}`;
  }
}
