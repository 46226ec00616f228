/**
 * Port-level messages: input format setup, port values, output commands
 * with their feedback, and virtual port setup.
 */

import {
  COMPLETION_FEEDBACK,
  FeedbackStatus,
  MessageType,
  STARTUP_IMMEDIATE,
  VirtualPortOperation,
} from './constants';
import { DownstreamMessage, UpstreamMessage, requireLength } from './base';
import { ProtocolError } from '../errors';
import { hexByte } from '../utils/hex';

// --- Input format ---

function encodeInputFormat(port: number, mode: number, delta: number, notify: boolean): Buffer {
  const body = Buffer.alloc(7);
  body[0] = port;
  body[1] = mode;
  body.writeUInt32LE(delta, 2);
  body[6] = notify ? 0x01 : 0x00;
  return body;
}

/** Ask the hub to (stop) push(ing) values of one port mode */
export class PortInputFormatSetup extends DownstreamMessage {
  static readonly TYPE = MessageType.PORT_INPUT_FORMAT_SETUP_SINGLE;
  readonly type = PortInputFormatSetup.TYPE;
  readonly needsReply = true;

  constructor(
    readonly port: number,
    readonly mode: number,
    readonly delta = 1,
    readonly notify = true,
  ) {
    super();
  }

  body(): Buffer {
    return encodeInputFormat(this.port, this.mode, this.delta, this.notify);
  }

  static decode(body: Buffer): PortInputFormatSetup {
    requireLength(body, 7, 'Port input format setup');
    return new PortInputFormatSetup(body[0], body[1], body.readUInt32LE(2), body[6] !== 0);
  }
}

export class PortInputFormatMessage extends UpstreamMessage {
  static readonly TYPE = MessageType.PORT_INPUT_FORMAT_SINGLE;
  readonly type = PortInputFormatMessage.TYPE;

  constructor(
    readonly port: number,
    readonly mode: number,
    readonly delta: number,
    readonly notify: boolean,
  ) {
    super();
  }

  body(): Buffer {
    return encodeInputFormat(this.port, this.mode, this.delta, this.notify);
  }

  isReplyTo(request: DownstreamMessage): boolean {
    return request instanceof PortInputFormatSetup && request.port === this.port;
  }

  static decode(body: Buffer): PortInputFormatMessage {
    requireLength(body, 7, 'Port input format');
    return new PortInputFormatMessage(body[0], body[1], body.readUInt32LE(2), body[6] !== 0);
  }
}

// --- Port values ---

export class PortValueSingleMessage extends UpstreamMessage {
  static readonly TYPE = MessageType.PORT_VALUE_SINGLE;
  readonly type = PortValueSingleMessage.TYPE;

  constructor(readonly port: number, readonly data: Buffer) {
    super();
  }

  body(): Buffer {
    return Buffer.concat([Buffer.from([this.port]), this.data]);
  }

  static decode(body: Buffer): PortValueSingleMessage {
    requireLength(body, 1, 'Port value');
    return new PortValueSingleMessage(body[0], Buffer.from(body.subarray(1)));
  }
}

export class PortValueCombinedMessage extends UpstreamMessage {
  static readonly TYPE = MessageType.PORT_VALUE_COMBINED;
  readonly type = PortValueCombinedMessage.TYPE;

  constructor(readonly port: number, readonly data: Buffer) {
    super();
  }

  body(): Buffer {
    return Buffer.concat([Buffer.from([this.port]), this.data]);
  }

  static decode(body: Buffer): PortValueCombinedMessage {
    requireLength(body, 1, 'Combined port value');
    return new PortValueCombinedMessage(body[0], Buffer.from(body.subarray(1)));
  }
}

export type PortValueMessage = PortValueSingleMessage | PortValueCombinedMessage;

// --- Virtual ports ---

/** Fire-and-forget: the hub answers with an attach/detach notification */
export class VirtualPortSetup extends DownstreamMessage {
  static readonly TYPE = MessageType.VIRTUAL_PORT_SETUP;
  readonly type = VirtualPortSetup.TYPE;
  readonly needsReply = false;

  constructor(readonly operation: number, readonly ports: readonly number[]) {
    super();
  }

  static connect(portA: number, portB: number): VirtualPortSetup {
    return new VirtualPortSetup(VirtualPortOperation.CONNECT, [portA, portB]);
  }

  static disconnect(port: number): VirtualPortSetup {
    return new VirtualPortSetup(VirtualPortOperation.DISCONNECT, [port]);
  }

  body(): Buffer {
    return Buffer.from([this.operation, ...this.ports]);
  }

  static decode(body: Buffer): VirtualPortSetup {
    requireLength(body, 2, 'Virtual port setup');
    if (body[0] === VirtualPortOperation.CONNECT) {
      requireLength(body, 3, 'Virtual port connect');
      return VirtualPortSetup.connect(body[1], body[2]);
    }
    if (body[0] === VirtualPortOperation.DISCONNECT) {
      return VirtualPortSetup.disconnect(body[1]);
    }
    throw new ProtocolError(`Unknown virtual port operation ${hexByte(body[0])}`);
  }
}

// --- Output ---

export class PortOutputCommand extends DownstreamMessage {
  static readonly TYPE = MessageType.PORT_OUTPUT;
  readonly type = PortOutputCommand.TYPE;
  readonly needsReply: boolean;

  constructor(
    readonly port: number,
    readonly subcommand: number,
    readonly parameters: Buffer,
    /** Request completion feedback and wait for it */
    readonly waitComplete = false,
  ) {
    super();
    this.needsReply = waitComplete;
  }

  get startupCompletion(): number {
    return STARTUP_IMMEDIATE | (this.waitComplete ? COMPLETION_FEEDBACK : 0);
  }

  body(): Buffer {
    return Buffer.concat([Buffer.from([this.port, this.startupCompletion, this.subcommand]), this.parameters]);
  }

  static decode(body: Buffer): PortOutputCommand {
    requireLength(body, 3, 'Port output command');
    const waitComplete = (body[1] & COMPLETION_FEEDBACK) !== 0;
    return new PortOutputCommand(body[0], body[2], Buffer.from(body.subarray(3)), waitComplete);
  }
}

const FINISHED_MASK = FeedbackStatus.COMPLETED | FeedbackStatus.DISCARDED | FeedbackStatus.IDLE;

export class PortOutputFeedbackMessage extends UpstreamMessage {
  static readonly TYPE = MessageType.PORT_OUTPUT_FEEDBACK;
  readonly type = PortOutputFeedbackMessage.TYPE;

  /** port → status bits */
  constructor(readonly statuses: ReadonlyMap<number, number>) {
    super();
  }

  static of(port: number, status: number): PortOutputFeedbackMessage {
    return new PortOutputFeedbackMessage(new Map([[port, status]]));
  }

  /** Command on the port finished: completed, discarded or port idle */
  isFinished(port: number): boolean {
    const status = this.statuses.get(port);
    return status !== undefined && (status & FINISHED_MASK) !== 0;
  }

  isDiscarded(port: number): boolean {
    return ((this.statuses.get(port) ?? 0) & FeedbackStatus.DISCARDED) !== 0;
  }

  isReplyTo(request: DownstreamMessage): boolean {
    return request instanceof PortOutputCommand && request.waitComplete && this.isFinished(request.port);
  }

  body(): Buffer {
    const bytes: number[] = [];
    for (const [port, status] of this.statuses) bytes.push(port, status);
    return Buffer.from(bytes);
  }

  static decode(body: Buffer): PortOutputFeedbackMessage {
    requireLength(body, 2, 'Port output feedback');
    const statuses = new Map<number, number>();
    for (let i = 0; i + 1 < body.length; i += 2) {
      statuses.set(body[i], body[i + 1]);
    }
    return new PortOutputFeedbackMessage(statuses);
  }
}
