/**
 * Move Hub
 *
 * Hub with the Move Hub's fixed topology. Built-in devices sit on
 * well-known ports and are bound to named accessors by port id; devices on
 * the two external ports are bound by capability. Binding happens once per
 * attach event, and a detach clears whichever accessor held the peripheral.
 */

import { setTimeout as sleep } from 'timers/promises';
import {
  AlertOperation,
  HubAlert,
  HubAlertMessage,
  HubAlertRequest,
  HubAttachedIOMessage,
  HubProperty,
  HubPropertiesMessage,
  HubPropertyRequest,
  PropertyOperation,
} from '../messages';
import { Connection } from '../connection/connection';
import {
  Button,
  Capability,
  Current,
  EncodedMotor,
  LEDRGB,
  Peripheral,
  TiltSensor,
  VisionSensor,
  Voltage,
} from '../peripherals';
import { AttachmentChange } from './attachment-tracker';
import { Hub, HubOptions } from './hub';
import { toError } from '../errors';
import { formatMac } from '../utils/hex';

export const MoveHubPort = {
  A: 0x00,
  B: 0x01,
  C: 0x02,
  D: 0x03,
  AB: 0x10,
  LED: 0x32,
  TILT_SENSOR: 0x3a,
  CURRENT: 0x3b,
  VOLTAGE: 0x3c,
} as const;

export type MoveHubSlot =
  | 'motorA'
  | 'motorB'
  | 'motorAB'
  | 'portC'
  | 'portD'
  | 'led'
  | 'tiltSensor'
  | 'current'
  | 'voltage'
  | 'visionSensor'
  | 'motorExternal';

const PORT_SLOTS: ReadonlyMap<number, MoveHubSlot> = new Map<number, MoveHubSlot>([
  [MoveHubPort.A, 'motorA'],
  [MoveHubPort.B, 'motorB'],
  [MoveHubPort.AB, 'motorAB'],
  [MoveHubPort.C, 'portC'],
  [MoveHubPort.D, 'portD'],
  [MoveHubPort.LED, 'led'],
  [MoveHubPort.TILT_SENSOR, 'tiltSensor'],
  [MoveHubPort.CURRENT, 'current'],
  [MoveHubPort.VOLTAGE, 'voltage'],
]);

const BUILT_IN_MOTOR_PORTS: ReadonlySet<number> = new Set([MoveHubPort.A, MoveHubPort.B, MoveHubPort.AB]);

/** Capability → extra slot, for devices plugged into the external ports */
const CAPABILITY_SLOTS: Partial<Record<Capability, (port: number) => MoveHubSlot | undefined>> = {
  'vision-sensor': () => 'visionSensor',
  'encoded-motor': (port) => (BUILT_IN_MOTOR_PORTS.has(port) ? undefined : 'motorExternal'),
};

function slotsFor(peripheral: Peripheral): MoveHubSlot[] {
  const slots: MoveHubSlot[] = [];
  const portSlot = PORT_SLOTS.get(peripheral.port);
  if (portSlot) slots.push(portSlot);
  const capabilitySlot = CAPABILITY_SLOTS[peripheral.capability]?.(peripheral.port);
  if (capabilitySlot) slots.push(capabilitySlot);
  return slots;
}

/** Built-in devices every Move Hub announces after connecting */
export const EXPECTED_SLOTS: readonly MoveHubSlot[] = [
  'motorA',
  'motorB',
  'motorAB',
  'led',
  'tiltSensor',
  'current',
  'voltage',
];

export interface MoveHubOptions extends HubOptions {
  deviceWaitAttempts?: number;
  deviceWaitIntervalMs?: number;
}

export interface HubInfo {
  name?: string;
  mac?: string;
  voltagePercent?: number;
  lowVoltage?: boolean;
}

export class MoveHub extends Hub {
  readonly button: Button;
  readonly info: HubInfo = {};
  private readonly slots = new Map<MoveHubSlot, Peripheral>();
  private readonly deviceWaitAttempts: number;
  private readonly deviceWaitIntervalMs: number;

  constructor(connection: Connection, options: MoveHubOptions = {}) {
    super(connection, options);
    this.deviceWaitAttempts = options.deviceWaitAttempts ?? 60;
    this.deviceWaitIntervalMs = options.deviceWaitIntervalMs ?? 100;
    this.button = new Button(this);
  }

  /**
   * Start the hub, wait for the built-in devices and log the hub's status.
   * Missing devices are logged, not fatal. On any failure the connection
   * is released before the error propagates.
   */
  static async connect(connection: Connection, options: MoveHubOptions = {}): Promise<MoveHub> {
    const hub = new MoveHub(connection, options);
    try {
      await hub.start();
      await hub.waitForDevices();
      await hub.reportStatus();
    } catch (err) {
      await hub.close().catch((closeErr: unknown) => {
        hub.log.error({ err: toError(closeErr) }, 'Failed to close hub after startup error');
      });
      throw err;
    }
    return hub;
  }

  get motorA(): EncodedMotor | undefined {
    return this.slotAs('motorA', EncodedMotor);
  }

  get motorB(): EncodedMotor | undefined {
    return this.slotAs('motorB', EncodedMotor);
  }

  get motorAB(): EncodedMotor | undefined {
    return this.slotAs('motorAB', EncodedMotor);
  }

  /** Whatever is plugged into port C */
  get portC(): Peripheral | undefined {
    return this.slots.get('portC');
  }

  /** Whatever is plugged into port D */
  get portD(): Peripheral | undefined {
    return this.slots.get('portD');
  }

  get led(): LEDRGB | undefined {
    return this.slotAs('led', LEDRGB);
  }

  get tiltSensor(): TiltSensor | undefined {
    return this.slotAs('tiltSensor', TiltSensor);
  }

  get current(): Current | undefined {
    return this.slotAs('current', Current);
  }

  get voltage(): Voltage | undefined {
    return this.slotAs('voltage', Voltage);
  }

  get visionSensor(): VisionSensor | undefined {
    return this.slotAs('visionSensor', VisionSensor);
  }

  get motorExternal(): EncodedMotor | undefined {
    return this.slotAs('motorExternal', EncodedMotor);
  }

  /** Expected built-in slots that are still empty */
  missingDevices(): MoveHubSlot[] {
    return EXPECTED_SLOTS.filter((slot) => !this.slots.has(slot));
  }

  /** Poll until every built-in device has attached or the attempts run out */
  async waitForDevices(): Promise<boolean> {
    for (let attempt = 0; attempt < this.deviceWaitAttempts; attempt++) {
      if (this.missingDevices().length === 0) return true;
      this.log.debug({ attempt }, 'Waiting for devices');
      await sleep(this.deviceWaitIntervalMs);
    }
    const missing = this.missingDevices();
    if (missing.length === 0) return true;
    this.log.warn({ missing }, `Got only these devices: ${this.describeAttached()}`);
    return false;
  }

  /** Query name, MAC, battery level and low-voltage alert into `info` */
  async reportStatus(): Promise<HubInfo> {
    const name = await this.request(
      new HubPropertyRequest(HubProperty.ADVERTISE_NAME, PropertyOperation.UPD_REQUEST),
      HubPropertiesMessage,
    );
    this.info.name = name.parameters.toString('utf8');

    const mac = await this.request(
      new HubPropertyRequest(HubProperty.PRIMARY_MAC, PropertyOperation.UPD_REQUEST),
      HubPropertiesMessage,
    );
    this.info.mac = formatMac(mac.parameters);

    const voltage = await this.request(
      new HubPropertyRequest(HubProperty.VOLTAGE_PERC, PropertyOperation.UPD_REQUEST),
      HubPropertiesMessage,
    );
    if (voltage.parameters.length > 0) {
      this.info.voltagePercent = voltage.parameters[0];
    }

    const alert = await this.request(
      new HubAlertRequest(HubAlert.LOW_VOLTAGE, AlertOperation.UPD_REQUEST),
      HubAlertMessage,
    );
    this.info.lowVoltage = !alert.isOk();

    this.log.info({ ...this.info }, `${this.info.name ?? 'Hub'} on ${this.info.mac ?? 'unknown address'}`);
    if (this.info.lowVoltage) {
      this.log.warn('Low voltage, check power source (maybe replace battery)');
    }
    return this.info;
  }

  protected handleAttachmentChange(msg: HubAttachedIOMessage): AttachmentChange {
    const change = super.handleAttachmentChange(msg);
    if (change.kind === 'attached') {
      this.bind(change.peripheral);
    } else {
      this.unbind(change.peripheral);
    }
    return change;
  }

  private bind(peripheral: Peripheral): void {
    for (const slot of slotsFor(peripheral)) {
      this.slots.set(slot, peripheral);
    }
  }

  /** Free the departing peripheral's slots; another eligible device takes over */
  private unbind(peripheral: Peripheral): void {
    for (const [slot, held] of Array.from(this.slots)) {
      if (held !== peripheral) continue;
      this.slots.delete(slot);
      const successor = Array.from(this.peripherals.values()).find(
        (p) => p !== peripheral && slotsFor(p).includes(slot),
      );
      if (successor) this.slots.set(slot, successor);
    }
  }

  private slotAs<T extends Peripheral>(slot: MoveHubSlot, kind: abstract new (...args: never[]) => T): T | undefined {
    const peripheral = this.slots.get(slot);
    return peripheral instanceof kind ? peripheral : undefined;
  }

  private describeAttached(): string {
    const names = Array.from(this.slots.keys());
    return names.length > 0 ? names.join(', ') : 'none';
  }
}
