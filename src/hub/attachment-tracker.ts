/**
 * Attachment Tracker
 *
 * Owns the set of attached peripherals, keyed by port. Per port the state
 * is absent, attached or attached-virtual; attach events insert, detach
 * events remove. Anything else (attach on an occupied port, detach of an
 * unknown port) means driver and hub disagree and throws AttachmentError.
 */

import type { Logger } from 'pino';
import { AttachEvent, HubAttachedIOMessage } from '../messages';
import { Peripheral, PeripheralHost, PeripheralRegistry } from '../peripherals';
import { AttachmentError } from '../errors';
import { hexByte } from '../utils/hex';

export type AttachmentChange =
  | { kind: 'attached'; peripheral: Peripheral; deviceType: number }
  | { kind: 'detached'; peripheral: Peripheral };

export class AttachmentTracker {
  private readonly peripherals = new Map<number, Peripheral>();

  constructor(
    private readonly host: PeripheralHost,
    private readonly registry: PeripheralRegistry,
    private readonly log: Logger,
  ) {}

  get(port: number): Peripheral | undefined {
    return this.peripherals.get(port);
  }

  has(port: number): boolean {
    return this.peripherals.has(port);
  }

  get size(): number {
    return this.peripherals.size;
  }

  ports(): number[] {
    return Array.from(this.peripherals.keys());
  }

  values(): Peripheral[] {
    return Array.from(this.peripherals.values());
  }

  /** Live read-only view of the peripheral set */
  asMap(): ReadonlyMap<number, Peripheral> {
    return this.peripherals;
  }

  /** Apply one attached I/O event to the peripheral set */
  apply(msg: HubAttachedIOMessage): AttachmentChange {
    if (msg.event === AttachEvent.DETACHED) {
      return this.detach(msg.port);
    }
    return this.attach(msg);
  }

  private detach(port: number): AttachmentChange {
    const peripheral = this.peripherals.get(port);
    if (!peripheral) {
      throw new AttachmentError(`Detach event for port ${hexByte(port)} with no attached peripheral`, port);
    }
    this.peripherals.delete(port);
    this.log.info({ peripheral: peripheral.toString() }, 'Detached peripheral');
    return { kind: 'detached', peripheral };
  }

  private attach(msg: HubAttachedIOMessage): AttachmentChange {
    const { port } = msg;
    const existing = this.peripherals.get(port);
    if (existing) {
      throw new AttachmentError(
        `Attach event for port ${hexByte(port)} which already holds ${existing.toString()}`,
        port,
      );
    }

    const deviceType = msg.deviceType ?? 0;
    const { ctor, known } = this.registry.resolve(deviceType);
    if (!known) {
      this.log.warn(
        { deviceType: `0x${deviceType.toString(16).padStart(4, '0')}`, port: hexByte(port) },
        'No dedicated class for peripheral type, using generic peripheral',
      );
    }

    const peripheral = new ctor(this.host, port, { virtualPorts: msg.virtualPorts, logger: this.log });
    this.peripherals.set(port, peripheral);

    const revisions = msg.revisions;
    if (revisions) {
      this.log.debug({ port: hexByte(port), ...revisions }, 'Peripheral revisions');
    }
    this.log.info({ peripheral: peripheral.toString() }, 'Attached peripheral');
    return { kind: 'attached', peripheral, deviceType };
  }
}
