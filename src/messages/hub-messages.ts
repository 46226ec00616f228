/**
 * Hub-level messages: properties, actions, alerts, attached I/O, generic errors.
 *
 * Downstream and upstream share a body layout for properties, actions and
 * alerts, but are separate classes so that each direction carries only the
 * behaviour it needs (needsReply on commands, isReplyTo on notifications).
 */

import {
  AlertOperation,
  AttachEvent,
  AttachEventCode,
  ERROR_DESCRIPTIONS,
  HubAction,
  MessageType,
  PropertyOperation,
} from './constants';
import { DownstreamMessage, UpstreamMessage, requireLength } from './base';
import { ProtocolError } from '../errors';
import { hexByte } from '../utils/hex';

// --- Properties ---

export class HubPropertyRequest extends DownstreamMessage {
  static readonly TYPE = MessageType.HUB_PROPERTIES;
  readonly type = HubPropertyRequest.TYPE;
  readonly needsReply: boolean;

  constructor(
    readonly property: number,
    readonly operation: number,
    readonly parameters: Buffer = Buffer.alloc(0),
  ) {
    super();
    this.needsReply = operation === PropertyOperation.UPD_REQUEST;
  }

  body(): Buffer {
    return Buffer.concat([Buffer.from([this.property, this.operation]), this.parameters]);
  }

  static decode(body: Buffer): HubPropertyRequest {
    requireLength(body, 2, 'Hub property request');
    return new HubPropertyRequest(body[0], body[1], Buffer.from(body.subarray(2)));
  }
}

export class HubPropertiesMessage extends UpstreamMessage {
  static readonly TYPE = MessageType.HUB_PROPERTIES;
  readonly type = HubPropertiesMessage.TYPE;

  constructor(
    readonly property: number,
    readonly operation: number,
    readonly parameters: Buffer = Buffer.alloc(0),
  ) {
    super();
  }

  body(): Buffer {
    return Buffer.concat([Buffer.from([this.property, this.operation]), this.parameters]);
  }

  isReplyTo(request: DownstreamMessage): boolean {
    return request instanceof HubPropertyRequest
      && request.operation === PropertyOperation.UPD_REQUEST
      && this.operation === PropertyOperation.UPSTREAM_UPDATE
      && this.property === request.property;
  }

  static decode(body: Buffer): HubPropertiesMessage {
    requireLength(body, 2, 'Hub properties');
    return new HubPropertiesMessage(body[0], body[1], Buffer.from(body.subarray(2)));
  }
}

// --- Actions ---

/** Downstream action → the upstream action that confirms it */
const ACTION_REPLIES: Record<number, number> = {
  [HubAction.DISCONNECT]: HubAction.UPSTREAM_DISCONNECT,
  [HubAction.SWITCH_OFF]: HubAction.UPSTREAM_SHUTDOWN,
};

export class HubActionRequest extends DownstreamMessage {
  static readonly TYPE = MessageType.HUB_ACTIONS;
  readonly type = HubActionRequest.TYPE;
  readonly needsReply: boolean;

  constructor(readonly action: number) {
    super();
    this.needsReply = action in ACTION_REPLIES;
  }

  body(): Buffer {
    return Buffer.from([this.action]);
  }

  static decode(body: Buffer): HubActionRequest {
    requireLength(body, 1, 'Hub action request');
    return new HubActionRequest(body[0]);
  }
}

export class HubActionMessage extends UpstreamMessage {
  static readonly TYPE = MessageType.HUB_ACTIONS;
  readonly type = HubActionMessage.TYPE;

  constructor(readonly action: number) {
    super();
  }

  body(): Buffer {
    return Buffer.from([this.action]);
  }

  isReplyTo(request: DownstreamMessage): boolean {
    return request instanceof HubActionRequest && ACTION_REPLIES[request.action] === this.action;
  }

  static decode(body: Buffer): HubActionMessage {
    requireLength(body, 1, 'Hub action');
    return new HubActionMessage(body[0]);
  }
}

// --- Alerts ---

export class HubAlertRequest extends DownstreamMessage {
  static readonly TYPE = MessageType.HUB_ALERTS;
  readonly type = HubAlertRequest.TYPE;
  readonly needsReply: boolean;

  constructor(readonly alert: number, readonly operation: number) {
    super();
    this.needsReply = operation === AlertOperation.UPD_REQUEST;
  }

  body(): Buffer {
    return Buffer.from([this.alert, this.operation]);
  }

  static decode(body: Buffer): HubAlertRequest {
    requireLength(body, 2, 'Hub alert request');
    return new HubAlertRequest(body[0], body[1]);
  }
}

export class HubAlertMessage extends UpstreamMessage {
  static readonly TYPE = MessageType.HUB_ALERTS;
  readonly type = HubAlertMessage.TYPE;

  constructor(readonly alert: number, readonly operation: number, readonly status: number) {
    super();
  }

  body(): Buffer {
    return Buffer.from([this.alert, this.operation, this.status]);
  }

  /** 0x00 means the alert condition is not present */
  isOk(): boolean {
    return this.status === 0x00;
  }

  isReplyTo(request: DownstreamMessage): boolean {
    return request instanceof HubAlertRequest
      && request.operation === AlertOperation.UPD_REQUEST
      && this.operation === AlertOperation.UPSTREAM_UPDATE
      && this.alert === request.alert;
  }

  static decode(body: Buffer): HubAlertMessage {
    requireLength(body, 3, 'Hub alert');
    return new HubAlertMessage(body[0], body[1], body[2]);
  }
}

// --- Attached I/O ---

function isAttachEvent(value: number): value is AttachEventCode {
  return value === AttachEvent.DETACHED
    || value === AttachEvent.ATTACHED
    || value === AttachEvent.ATTACHED_VIRTUAL;
}

/**
 * Render a packed version number as major.minor.bugfix.build.
 * Layout (int32 LE): bits 28-30 major, 24-27 minor, 16-23 bugfix (BCD), 0-15 build (BCD).
 */
export function formatVersion(packed: number): string {
  const major = (packed >>> 28) & 0x07;
  const minor = (packed >>> 24) & 0x0f;
  const bugfix = (packed >>> 16) & 0xff;
  const build = packed & 0xffff;
  return `${major}.${minor}.${bugfix.toString(16).padStart(2, '0')}.${build.toString(16).padStart(4, '0')}`;
}

export class HubAttachedIOMessage extends UpstreamMessage {
  static readonly TYPE = MessageType.HUB_ATTACHED_IO;
  readonly type = HubAttachedIOMessage.TYPE;

  constructor(
    readonly port: number,
    readonly event: AttachEventCode,
    /** Everything after the event byte; empty for a detach */
    readonly payload: Buffer = Buffer.alloc(0),
  ) {
    super();
  }

  static attached(port: number, deviceType: number, hwVersion = 0x10000000, swVersion = 0x10000000): HubAttachedIOMessage {
    const payload = Buffer.alloc(10);
    payload.writeUInt16LE(deviceType, 0);
    payload.writeInt32LE(hwVersion, 2);
    payload.writeInt32LE(swVersion, 6);
    return new HubAttachedIOMessage(port, AttachEvent.ATTACHED, payload);
  }

  static attachedVirtual(port: number, deviceType: number, portA: number, portB: number): HubAttachedIOMessage {
    const payload = Buffer.alloc(4);
    payload.writeUInt16LE(deviceType, 0);
    payload[2] = portA;
    payload[3] = portB;
    return new HubAttachedIOMessage(port, AttachEvent.ATTACHED_VIRTUAL, payload);
  }

  static detached(port: number): HubAttachedIOMessage {
    return new HubAttachedIOMessage(port, AttachEvent.DETACHED);
  }

  get deviceType(): number | undefined {
    return this.event === AttachEvent.DETACHED ? undefined : this.payload.readUInt16LE(0);
  }

  /** Hardware and software revision of a physically attached device */
  get revisions(): { hardware: string; software: string } | undefined {
    if (this.event !== AttachEvent.ATTACHED) return undefined;
    return {
      hardware: formatVersion(this.payload.readInt32LE(2)),
      software: formatVersion(this.payload.readInt32LE(6)),
    };
  }

  /** The two physical ports merged into a virtual port */
  get virtualPorts(): [number, number] | undefined {
    if (this.event !== AttachEvent.ATTACHED_VIRTUAL) return undefined;
    return [this.payload[2], this.payload[3]];
  }

  body(): Buffer {
    return Buffer.concat([Buffer.from([this.port, this.event]), this.payload]);
  }

  static decode(body: Buffer): HubAttachedIOMessage {
    requireLength(body, 2, 'Attached I/O');
    const event = body[1];
    if (!isAttachEvent(event)) {
      throw new ProtocolError(`Unknown attach event ${hexByte(event)} on port ${hexByte(body[0])}`);
    }
    const payload = Buffer.from(body.subarray(2));
    if (event === AttachEvent.ATTACHED) requireLength(payload, 10, 'Attached I/O payload');
    if (event === AttachEvent.ATTACHED_VIRTUAL) requireLength(payload, 4, 'Attached virtual I/O payload');
    return new HubAttachedIOMessage(body[0], event, payload);
  }
}

// --- Generic error ---

export class GenericErrorMessage extends UpstreamMessage {
  static readonly TYPE = MessageType.GENERIC_ERROR;
  readonly type = GenericErrorMessage.TYPE;

  constructor(readonly commandType: number, readonly errorCode: number) {
    super();
  }

  message(): string {
    const description = ERROR_DESCRIPTIONS[this.errorCode] ?? 'Unknown error';
    return `Command ${hexByte(this.commandType)} caused error ${hexByte(this.errorCode)}: ${description}`;
  }

  /** An error naming the pending command's type answers that command */
  isReplyTo(request: DownstreamMessage): boolean {
    return request.type === this.commandType;
  }

  body(): Buffer {
    return Buffer.from([this.commandType, this.errorCode]);
  }

  static decode(body: Buffer): GenericErrorMessage {
    requireLength(body, 2, 'Generic error');
    return new GenericErrorMessage(body[0], body[1]);
  }
}
