import { ProtocolError } from '../errors';
import { toHex } from '../utils/hex';
import { HUB_ID } from './constants';

export interface Frame {
  type: number;
  body: Buffer;
}

/** Wrap a message body in the length / hub id / type header */
export function encodeFrame(type: number, body: Buffer): Buffer {
  const shortLength = body.length + 3;
  if (shortLength < 0x80) {
    return Buffer.concat([Buffer.from([shortLength, HUB_ID, type]), body]);
  }
  const longLength = body.length + 4;
  return Buffer.concat([
    Buffer.from([(longLength & 0x7f) | 0x80, longLength >> 7, HUB_ID, type]),
    body,
  ]);
}

/** Split a raw frame into its type byte and body. Throws on a truncated frame. */
export function readFrame(data: Buffer): Frame {
  const headerLength = data.length > 0 && (data[0] & 0x80) !== 0 ? 4 : 3;
  if (data.length < headerLength) {
    throw new ProtocolError(`Frame too short: ${toHex(data)}`);
  }
  return { type: data[headerLength - 1], body: data.subarray(headerLength) };
}

export abstract class Message {
  abstract readonly type: number;

  /** Bytes after the type byte */
  abstract body(): Buffer;

  encode(): Buffer {
    return encodeFrame(this.type, this.body());
  }

  toString(): string {
    return `${this.constructor.name}(${toHex(this.body())})`;
  }
}

/** Command sent from the driver to the hub */
export abstract class DownstreamMessage extends Message {
  /** Whether the hub answers this command with a reply that send() must wait for */
  abstract readonly needsReply: boolean;
}

/** Notification pushed by the hub */
export abstract class UpstreamMessage extends Message {
  /** True when this notification answers the given pending request */
  isReplyTo(_request: DownstreamMessage): boolean {
    return false;
  }
}

export interface MessageClass<T extends Message> {
  readonly TYPE: number;
  decode(body: Buffer): T;
  // never[] accepts any concrete constructor signature; used for instanceof narrowing
  new (...args: never[]): T;
}

export type UpstreamMessageClass<T extends UpstreamMessage = UpstreamMessage> = MessageClass<T>;
export type DownstreamMessageClass<T extends DownstreamMessage = DownstreamMessage> = MessageClass<T>;

export function requireLength(body: Buffer, length: number, what: string): void {
  if (body.length < length) {
    throw new ProtocolError(`${what}: expected at least ${length} bytes, got ${toHex(body)}`);
  }
}
