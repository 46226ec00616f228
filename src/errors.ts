/**
 * Driver error hierarchy
 *
 * ProtocolError and AttachmentError mean the driver and the device no longer
 * agree on state. They are thrown out of the notification path and are not
 * recovered from. The rest describe a single failed command.
 */

export class HubError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Undecodable frame or unknown message type: the stream can't be trusted after this */
export class ProtocolError extends HubError {}

/** Attach for an occupied port, or detach for a port that was never attached */
export class AttachmentError extends ProtocolError {
  constructor(message: string, readonly port: number) {
    super(message);
  }
}

/** A synchronous send was attempted while another one still waits for its reply */
export class PendingRequestError extends HubError {}

/** The hub answered a request with a generic error message */
export class CommandError extends HubError {
  constructor(message: string, readonly commandType: number, readonly errorCode: number) {
    super(message);
  }
}

export class ReplyTimeoutError extends HubError {
  constructor(message: string, readonly timeoutMs: number) {
    super(message);
  }
}

export class ConnectionClosedError extends HubError {}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
