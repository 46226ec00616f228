/**
 * HubEmulator — in-process stand-in for a hub on the other end of the link
 *
 * Implements Connection so the Hub sees no difference between a real
 * Bluetooth link and the emulator. Plays the device side of the protocol:
 *   - Announces its device topology once notifications are enabled
 *   - Answers property, alert, action, input-format, virtual-port and
 *     output-with-feedback requests
 *   - Answers commands for ports with nothing attached with a generic error
 *   - Command log ring buffer with timestamps
 *
 * Notifications are delivered asynchronously (one setImmediate hop), the
 * way a radio link delivers them, and strictly in the order they were
 * queued. idle() resolves once the queue is empty.
 *
 * Emits:
 *   'error' (err: Error) — the notification handler threw; the link is dropped
 *   'disconnected'
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { Connection, NotificationHandler } from '../connection/connection';
import {
  AlertOperation,
  DeviceType,
  DownstreamMessage,
  ErrorCode,
  FeedbackStatus,
  GenericErrorMessage,
  HUB_HARDWARE_HANDLE,
  HubAction,
  HubActionMessage,
  HubActionRequest,
  HubAlert,
  HubAlertMessage,
  HubAlertRequest,
  HubAttachedIOMessage,
  HubProperty,
  HubPropertiesMessage,
  HubPropertyRequest,
  PortInputFormatMessage,
  PortInputFormatSetup,
  PortOutputCommand,
  PortOutputFeedbackMessage,
  PortValueSingleMessage,
  PropertyOperation,
  UpstreamMessage,
  VirtualPortOperation,
  VirtualPortSetup,
  decodeDownstream,
  readFrame,
} from '../messages';
import { ConnectionClosedError, toError } from '../errors';
import { getLogger } from '../logger';
import { hexByte, parseMac, toHex } from '../utils/hex';

export interface EmulatedDevice {
  port: number;
  deviceType: number;
  /** Physical ports merged into this virtual port */
  virtualPorts?: [number, number];
}

/** What a Move Hub announces right after connecting */
export const MOVE_HUB_DEVICES: readonly EmulatedDevice[] = [
  { port: 0x00, deviceType: DeviceType.MOTOR_INTERNAL_TACHO },
  { port: 0x01, deviceType: DeviceType.MOTOR_INTERNAL_TACHO },
  { port: 0x10, deviceType: DeviceType.MOTOR_INTERNAL_TACHO, virtualPorts: [0x00, 0x01] },
  { port: 0x32, deviceType: DeviceType.RGB_LIGHT },
  { port: 0x3a, deviceType: DeviceType.TILT_INTERNAL },
  { port: 0x3b, deviceType: DeviceType.CURRENT },
  { port: 0x3c, deviceType: DeviceType.VOLTAGE },
];

/** First port id the hub hands out for virtual ports */
const FIRST_VIRTUAL_PORT = 0x10;

export interface HubEmulatorOptions {
  devices?: readonly EmulatedDevice[];
  name?: string;
  mac?: string;
  batteryPercent?: number;
  lowVoltage?: boolean;
  logger?: Logger;
  maxLogSize?: number;
}

export interface EmulatorLogEntry {
  timestamp: number;
  action: string;
  details: string;
}

export interface EmulatedWrite {
  handle: number;
  data: Buffer;
}

export class HubEmulator extends EventEmitter implements Connection {
  name: string;
  mac: string;
  batteryPercent: number;
  lowVoltage: boolean;
  /** Every frame written by the driver, in order */
  readonly writes: EmulatedWrite[] = [];

  private readonly logger: Logger;
  private readonly maxLogSize: number;
  private readonly devices = new Map<number, EmulatedDevice>();
  private readonly subscriptions = new Map<number, PortInputFormatMessage>();
  private readonly lastOutputs = new Map<number, PortOutputCommand>();
  private readonly queue: Buffer[] = [];
  private handler: NotificationHandler | null = null;
  private alive = true;
  private notifying = false;
  private drainScheduled = false;
  private buttonUpdates = false;
  private buttonPressed = false;
  private _log: EmulatorLogEntry[] = [];

  constructor(options: HubEmulatorOptions = {}) {
    super();
    this.name = options.name ?? 'Move Hub';
    this.mac = options.mac ?? '00:16:53:00:00:01';
    this.batteryPercent = options.batteryPercent ?? 100;
    this.lowVoltage = options.lowVoltage ?? false;
    this.logger = options.logger ?? getLogger('Emulator');
    this.maxLogSize = options.maxLogSize ?? 200;
    for (const device of options.devices ?? MOVE_HUB_DEVICES) {
      this.devices.set(device.port, device);
    }
  }

  // --- Connection ---

  async write(handle: number, data: Buffer): Promise<void> {
    if (!this.alive) {
      throw new ConnectionClosedError('Emulated hub is disconnected');
    }
    this.writes.push({ handle, data: Buffer.from(data) });
    let msg: DownstreamMessage;
    try {
      msg = decodeDownstream(data);
    } catch (err) {
      // Truncated frames still reject the write
      const { type } = readFrame(data);
      this.log('Unknown', toError(err).message);
      this.enqueue(new GenericErrorMessage(type, ErrorCode.COMMAND_NOT_RECOGNIZED));
      return;
    }
    this.log('Write', msg.toString());
    this.respond(msg);
  }

  setNotificationHandler(handler: NotificationHandler): void {
    this.handler = handler;
  }

  async enableNotifications(): Promise<void> {
    if (this.notifying) return;
    this.notifying = true;
    this.log('Connect', `Announcing ${this.devices.size} devices`);
    for (const device of this.devices.values()) {
      this.enqueue(attachMessage(device));
    }
  }

  async disconnect(): Promise<void> {
    if (!this.alive) return;
    this.alive = false;
    this.queue.length = 0;
    this.log('Disconnect', 'Emulator disconnected');
    this.emit('disconnected');
  }

  isAlive(): boolean {
    return this.alive;
  }

  // --- Test and demo controls ---

  /** Push an arbitrary notification (raw frame or message) */
  notify(frame: Buffer | UpstreamMessage): void {
    this.queue.push(Buffer.isBuffer(frame) ? frame : frame.encode());
    this.scheduleDrain();
  }

  /** Plug a device in */
  attach(device: EmulatedDevice): void {
    this.devices.set(device.port, device);
    this.enqueue(attachMessage(device));
  }

  /** Unplug whatever is on `port` */
  detach(port: number): void {
    this.devices.delete(port);
    this.subscriptions.delete(port);
    this.enqueue(HubAttachedIOMessage.detached(port));
  }

  /** Push a value for `port` if the driver subscribed to it */
  pushValue(port: number, data: Buffer): boolean {
    const subscription = this.subscriptions.get(port);
    if (!subscription || !subscription.notify) return false;
    this.enqueue(new PortValueSingleMessage(port, data));
    return true;
  }

  /** Press or release the hub button */
  setButton(pressed: boolean): void {
    this.buttonPressed = pressed;
    if (this.buttonUpdates) {
      this.enqueue(buttonMessage(pressed));
    }
  }

  /** Most recent output command written for `port` */
  lastOutput(port: number): PortOutputCommand | undefined {
    return this.lastOutputs.get(port);
  }

  hasDevice(port: number): boolean {
    return this.devices.has(port);
  }

  /** Resolve once every queued notification has been delivered */
  async idle(): Promise<void> {
    while (this.drainScheduled || (this.queue.length > 0 && this.canDeliver())) {
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
  }

  getLog(): EmulatorLogEntry[] {
    return [...this._log];
  }

  // --- Device side ---

  private respond(msg: DownstreamMessage): void {
    if (msg instanceof HubPropertyRequest) {
      this.handleProperty(msg);
    } else if (msg instanceof HubAlertRequest) {
      this.handleAlert(msg);
    } else if (msg instanceof HubActionRequest) {
      this.handleAction(msg);
    } else if (msg instanceof PortInputFormatSetup) {
      this.handleInputFormat(msg);
    } else if (msg instanceof VirtualPortSetup) {
      this.handleVirtualPort(msg);
    } else if (msg instanceof PortOutputCommand) {
      this.handleOutput(msg);
    } else {
      this.enqueue(new GenericErrorMessage(msg.type, ErrorCode.COMMAND_NOT_RECOGNIZED));
    }
  }

  private handleProperty(msg: HubPropertyRequest): void {
    switch (msg.operation) {
      case PropertyOperation.UPD_REQUEST: {
        const value = this.propertyValue(msg.property);
        if (value) {
          this.enqueue(new HubPropertiesMessage(msg.property, PropertyOperation.UPSTREAM_UPDATE, value));
        } else {
          this.enqueue(new GenericErrorMessage(msg.type, ErrorCode.INVALID_USE));
        }
        break;
      }
      case PropertyOperation.UPD_ENABLE:
      case PropertyOperation.UPD_DISABLE:
        if (msg.property === HubProperty.BUTTON) {
          this.buttonUpdates = msg.operation === PropertyOperation.UPD_ENABLE;
          this.log('Button', this.buttonUpdates ? 'Updates on' : 'Updates off');
          if (this.buttonUpdates) this.enqueue(buttonMessage(this.buttonPressed));
        }
        break;
      case PropertyOperation.SET:
        if (msg.property === HubProperty.ADVERTISE_NAME) {
          this.name = msg.parameters.toString('utf8');
          this.log('Name', this.name);
        }
        break;
      default:
        this.log('Unhandled', msg.toString());
    }
  }

  private propertyValue(property: number): Buffer | undefined {
    switch (property) {
      case HubProperty.ADVERTISE_NAME:
        return Buffer.from(this.name, 'utf8');
      case HubProperty.BUTTON:
        return Buffer.from([this.buttonPressed ? 1 : 0]);
      case HubProperty.VOLTAGE_PERC:
        return Buffer.from([this.batteryPercent]);
      case HubProperty.PRIMARY_MAC:
        return parseMac(this.mac);
      default:
        return undefined;
    }
  }

  private handleAlert(msg: HubAlertRequest): void {
    if (msg.operation !== AlertOperation.UPD_REQUEST) {
      this.log('Alert', msg.toString());
      return;
    }
    const active = msg.alert === HubAlert.LOW_VOLTAGE && this.lowVoltage;
    this.enqueue(new HubAlertMessage(msg.alert, AlertOperation.UPSTREAM_UPDATE, active ? 0xff : 0x00));
  }

  private handleAction(msg: HubActionRequest): void {
    if (msg.action === HubAction.DISCONNECT) {
      this.enqueue(new HubActionMessage(HubAction.UPSTREAM_DISCONNECT));
    } else if (msg.action === HubAction.SWITCH_OFF) {
      this.enqueue(new HubActionMessage(HubAction.UPSTREAM_SHUTDOWN));
    } else {
      this.log('Action', hexByte(msg.action));
    }
  }

  private handleInputFormat(msg: PortInputFormatSetup): void {
    if (!this.devices.has(msg.port)) {
      this.enqueue(new GenericErrorMessage(msg.type, ErrorCode.INVALID_USE));
      return;
    }
    const reply = new PortInputFormatMessage(msg.port, msg.mode, msg.delta, msg.notify);
    this.subscriptions.set(msg.port, reply);
    this.enqueue(reply);
  }

  private handleVirtualPort(msg: VirtualPortSetup): void {
    if (msg.operation === VirtualPortOperation.CONNECT && msg.ports.length >= 2) {
      const [portA, portB] = msg.ports;
      const first = this.devices.get(portA);
      if (!first || !this.devices.has(portB)) {
        this.enqueue(new GenericErrorMessage(msg.type, ErrorCode.INVALID_USE));
        return;
      }
      this.attach({ port: this.nextVirtualPort(), deviceType: first.deviceType, virtualPorts: [portA, portB] });
    } else if (msg.operation === VirtualPortOperation.DISCONNECT && msg.ports.length >= 1) {
      const device = this.devices.get(msg.ports[0]);
      if (!device?.virtualPorts) {
        this.enqueue(new GenericErrorMessage(msg.type, ErrorCode.INVALID_USE));
        return;
      }
      this.detach(device.port);
    }
  }

  private handleOutput(msg: PortOutputCommand): void {
    if (!this.devices.has(msg.port)) {
      this.enqueue(new GenericErrorMessage(msg.type, ErrorCode.INVALID_USE));
      return;
    }
    this.lastOutputs.set(msg.port, msg);
    if (msg.waitComplete) {
      this.enqueue(PortOutputFeedbackMessage.of(msg.port, FeedbackStatus.COMPLETED | FeedbackStatus.IDLE));
    }
  }

  private nextVirtualPort(): number {
    let port = FIRST_VIRTUAL_PORT;
    while (this.devices.has(port)) port++;
    return port;
  }

  // --- Delivery ---

  private enqueue(msg: UpstreamMessage): void {
    this.notify(msg);
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => this.drain());
  }

  private canDeliver(): boolean {
    return this.alive && this.notifying && this.handler !== null;
  }

  private drain(): void {
    this.drainScheduled = false;
    const handler = this.handler;
    if (!this.canDeliver() || !handler) return;

    while (this.queue.length > 0 && this.alive) {
      const frame = this.queue.shift();
      if (!frame) break;
      try {
        handler(HUB_HARDWARE_HANDLE, frame);
      } catch (err) {
        const error = toError(err);
        this.log('Fault', `${error.message} (${toHex(frame)})`);
        this.logger.fatal({ err: error, frame: toHex(frame) }, 'Notification handling failed, dropping link');
        this.disconnect().catch((e: unknown) => this.logger.error({ err: toError(e) }, 'Disconnect failed'));
        this.emit('error', error);
      }
    }
  }

  /** Append to ring buffer and debug log */
  private log(action: string, details: string): void {
    this._log.push({ timestamp: Date.now(), action, details });
    if (this._log.length > this.maxLogSize) {
      this._log.shift();
    }
    this.logger.debug({ action }, details);
  }
}

function attachMessage(device: EmulatedDevice): HubAttachedIOMessage {
  return device.virtualPorts
    ? HubAttachedIOMessage.attachedVirtual(device.port, device.deviceType, device.virtualPorts[0], device.virtualPorts[1])
    : HubAttachedIOMessage.attached(device.port, device.deviceType);
}

function buttonMessage(pressed: boolean): HubPropertiesMessage {
  return new HubPropertiesMessage(HubProperty.BUTTON, PropertyOperation.UPSTREAM_UPDATE, Buffer.from([pressed ? 1 : 0]));
}
