/**
 * Message codec: type-byte registries for both directions.
 *
 * The driver only decodes upstream frames; the downstream registry exists
 * for the in-process hub emulator, which plays the device side.
 */

import { ProtocolError } from '../errors';
import { hexByte, toHex } from '../utils/hex';
import {
  DownstreamMessage,
  DownstreamMessageClass,
  UpstreamMessage,
  UpstreamMessageClass,
  readFrame,
} from './base';
import {
  GenericErrorMessage,
  HubActionMessage,
  HubActionRequest,
  HubAlertMessage,
  HubAlertRequest,
  HubAttachedIOMessage,
  HubPropertiesMessage,
  HubPropertyRequest,
} from './hub-messages';
import {
  PortInputFormatMessage,
  PortInputFormatSetup,
  PortOutputCommand,
  PortOutputFeedbackMessage,
  PortValueCombinedMessage,
  PortValueSingleMessage,
  VirtualPortSetup,
} from './port-messages';

function registry<T extends DownstreamMessage | UpstreamMessage>(
  classes: Array<{ readonly TYPE: number; decode(body: Buffer): T }>,
): ReadonlyMap<number, (body: Buffer) => T> {
  return new Map(classes.map((cls) => [cls.TYPE, (body: Buffer) => cls.decode(body)]));
}

export const UPSTREAM_MESSAGES: readonly UpstreamMessageClass[] = [
  HubPropertiesMessage,
  HubActionMessage,
  HubAlertMessage,
  HubAttachedIOMessage,
  GenericErrorMessage,
  PortInputFormatMessage,
  PortValueSingleMessage,
  PortValueCombinedMessage,
  PortOutputFeedbackMessage,
];

export const DOWNSTREAM_MESSAGES: readonly DownstreamMessageClass[] = [
  HubPropertyRequest,
  HubActionRequest,
  HubAlertRequest,
  PortInputFormatSetup,
  VirtualPortSetup,
  PortOutputCommand,
];

const upstreamDecoders = registry<UpstreamMessage>([...UPSTREAM_MESSAGES]);
const downstreamDecoders = registry<DownstreamMessage>([...DOWNSTREAM_MESSAGES]);

/** Decode a notification frame. Unknown type bytes are a protocol violation. */
export function decodeUpstream(data: Buffer): UpstreamMessage {
  const { type, body } = readFrame(data);
  const decode = upstreamDecoders.get(type);
  if (!decode) {
    throw new ProtocolError(`Unknown upstream message type ${hexByte(type)}: ${toHex(data)}`);
  }
  return decode(body);
}

/** Decode a command frame (device side) */
export function decodeDownstream(data: Buffer): DownstreamMessage {
  const { type, body } = readFrame(data);
  const decode = downstreamDecoders.get(type);
  if (!decode) {
    throw new ProtocolError(`Unknown downstream message type ${hexByte(type)}: ${toHex(data)}`);
  }
  return decode(body);
}
