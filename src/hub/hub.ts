/**
 * Hub
 *
 * Driver-side object for one connected hub. Sole user of the Connection:
 * every command goes out through send(), every notification comes in
 * through handleNotification().
 *
 * Synchronous requests: at most one command that needs a reply is in
 * flight. send() claims the reply slot before writing, and the
 * notification path offers each decoded message to the slot before
 * dispatching it to the handler table. A second synchronous send while
 * the slot is taken is rejected before any byte is written.
 *
 * Notification handling is synchronous from decode to the last handler,
 * so notifications are processed strictly in arrival order and the
 * peripheral set only ever changes inside handleNotification().
 *
 * Emits:
 *   'attached' (peripheral: Peripheral)
 *   'detached' (peripheral: Peripheral)
 *   'message'  (msg: UpstreamMessage) — every decoded notification, after dispatch
 *   'closed'   — connection released
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { Connection } from '../connection/connection';
import {
  DownstreamMessage,
  GenericErrorMessage,
  HubAction,
  HubActionMessage,
  HubActionRequest,
  HubAttachedIOMessage,
  HUB_HARDWARE_HANDLE,
  PortValueCombinedMessage,
  PortValueMessage,
  PortValueSingleMessage,
  UpstreamMessage,
  UpstreamMessageClass,
  decodeUpstream,
} from '../messages';
import { Peripheral, PeripheralHost, PeripheralRegistry } from '../peripherals';
import { ButtonHost } from '../peripherals/button';
import { AttachmentChange, AttachmentTracker } from './attachment-tracker';
import { ReplySlot } from './reply-slot';
import { CommandError, ConnectionClosedError, ProtocolError, toError } from '../errors';
import { getLogger } from '../logger';
import { hexByte, toHex } from '../utils/hex';

export const DEFAULT_REPLY_TIMEOUT_MS = 10_000;

export interface HubOptions {
  registry?: PeripheralRegistry;
  logger?: Logger;
  /** How long send() waits for a reply; 0 waits forever */
  replyTimeoutMs?: number;
}

interface HandlerEntry {
  type: number;
  handle: (msg: UpstreamMessage) => void;
}

export class Hub extends EventEmitter implements PeripheralHost, ButtonHost {
  protected readonly log: Logger;
  protected readonly tracker: AttachmentTracker;
  private readonly handlers: HandlerEntry[] = [];
  private readonly slot = new ReplySlot();
  private readonly replyTimeoutMs: number;
  private started = false;
  private closed = false;
  private closePromise: Promise<void> = Promise.resolve();

  constructor(readonly connection: Connection, options: HubOptions = {}) {
    super();
    this.log = options.logger ?? getLogger('Hub');
    this.replyTimeoutMs = options.replyTimeoutMs ?? DEFAULT_REPLY_TIMEOUT_MS;
    this.tracker = new AttachmentTracker(this, options.registry ?? new PeripheralRegistry(), this.log);

    this.addMessageHandler(HubAttachedIOMessage, (msg) => this.handleAttachmentChange(msg));
    this.addMessageHandler(PortValueSingleMessage, (msg) => this.handlePortValue(msg));
    this.addMessageHandler(PortValueCombinedMessage, (msg) => this.handlePortValue(msg));
    this.addMessageHandler(GenericErrorMessage, (msg) => this.handleError(msg));
    this.addMessageHandler(HubActionMessage, (msg) => this.handleAction(msg));
  }

  /** Attached peripherals by port (live view) */
  get peripherals(): ReadonlyMap<number, Peripheral> {
    return this.tracker.asMap();
  }

  /** The synchronous request currently waiting for its reply */
  get pendingRequest(): DownstreamMessage | undefined {
    return this.slot.request;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Install the notification handler and start receiving notifications */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    this.connection.setNotificationHandler((handle, data) => this.handleNotification(handle, data));
    await this.connection.enableNotifications();
  }

  /**
   * Append a handler for one upstream message class. Handlers run in
   * registration order; every matching handler sees every message.
   */
  addMessageHandler<T extends UpstreamMessage>(kind: UpstreamMessageClass<T>, handler: (msg: T) => void): void {
    this.handlers.push({
      type: kind.TYPE,
      handle: (msg) => {
        if (msg instanceof kind) handler(msg);
      },
    });
  }

  /**
   * Write a command. Commands that need a reply resolve with it; a generic
   * error reply rejects with CommandError. Others resolve once written.
   */
  async send(msg: DownstreamMessage): Promise<UpstreamMessage | undefined> {
    if (this.closed) {
      throw new ConnectionClosedError(`Hub is closed, cannot send ${msg.toString()}`);
    }
    this.log.debug({ command: msg.toString() }, 'Send message');
    const data = msg.encode();

    if (!msg.needsReply) {
      await this.connection.write(HUB_HARDWARE_HANDLE, data);
      return undefined;
    }

    const reply = this.slot.open(msg, this.replyTimeoutMs);
    const written = this.connection.write(HUB_HARDWARE_HANDLE, data).catch((err: unknown) => {
      if (!this.slot.fail(toError(err), msg)) {
        this.log.error({ err: toError(err), command: msg.toString() }, 'Write failed after request completed');
      }
    });
    const [response] = await Promise.all([reply, written]);
    this.log.debug({ reply: response.toString() }, 'Fetched sync reply');

    if (response instanceof GenericErrorMessage) {
      throw new CommandError(response.message(), response.commandType, response.errorCode);
    }
    return response;
  }

  /** send() for a command whose reply must be of class `kind` */
  async request<T extends UpstreamMessage>(msg: DownstreamMessage, kind: UpstreamMessageClass<T>): Promise<T> {
    if (!msg.needsReply) {
      throw new TypeError(`${msg.toString()} does not expect a reply`);
    }
    const reply = await this.send(msg);
    if (!(reply instanceof kind)) {
      throw new ProtocolError(`Expected ${kind.name} in reply to ${msg.toString()}, got ${String(reply)}`);
    }
    return reply;
  }

  /**
   * Entry point for the connection's notification delivery.
   * Throws ProtocolError (or AttachmentError) when the frame or the state
   * change it describes can't be reconciled with driver state.
   */
  handleNotification(handle: number, data: Buffer): void {
    this.log.debug({ handle, data: toHex(data) }, 'Notification');
    const msg = decodeUpstream(data);

    if (this.slot.offer(msg)) {
      this.log.debug({ reply: msg.toString() }, 'Found matching upstream message');
    }

    for (const entry of this.handlers) {
      if (entry.type === msg.type) entry.handle(msg);
    }
    this.emit('message', msg);
  }

  /** Ask the hub to drop the link; resolves once the connection is released */
  async disconnect(): Promise<void> {
    await this.requestAction(HubAction.DISCONNECT);
  }

  /** Ask the hub to power off; resolves once the connection is released */
  async switchOff(): Promise<void> {
    await this.requestAction(HubAction.SWITCH_OFF);
  }

  /** With a request still waiting the action cannot be sent; the link is released without it */
  private async requestAction(action: number): Promise<void> {
    if (this.closed) return;
    const pending = this.slot.request;
    if (pending) {
      this.log.warn({ pending: pending.toString() }, 'Request pending, closing without notifying the hub');
      await this.close();
      return;
    }
    try {
      await this.send(new HubActionRequest(action));
    } finally {
      await this.close();
    }
  }

  /**
   * Release the connection. Runs once; later calls return the same promise.
   * A request still waiting for its reply is rejected with ConnectionClosedError.
   */
  close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.closePromise = this.teardown();
    }
    return this.closePromise;
  }

  private async teardown(): Promise<void> {
    this.slot.fail(new ConnectionClosedError('Hub closed while waiting for a reply'));
    try {
      if (this.connection.isAlive()) {
        await this.connection.disconnect();
      }
    } finally {
      this.emit('closed');
    }
  }

  // --- Built-in handlers ---

  protected handleAttachmentChange(msg: HubAttachedIOMessage): AttachmentChange {
    const change = this.tracker.apply(msg);
    this.emit(change.kind, change.peripheral);
    return change;
  }

  private handlePortValue(msg: PortValueMessage): void {
    const peripheral = this.tracker.get(msg.port);
    if (!peripheral) {
      this.log.warn({ port: hexByte(msg.port) }, 'Notification on port with no device');
      return;
    }
    peripheral.queuePortData(msg);
  }

  private handleError(msg: GenericErrorMessage): void {
    this.log.warn(
      { commandType: hexByte(msg.commandType), errorCode: hexByte(msg.errorCode) },
      `Command error: ${msg.message()}`,
    );
    // An error that didn't name the pending command still ends it
    if (this.slot.fulfil(msg)) {
      this.log.debug('Error delivered to pending request');
    }
  }

  private handleAction(msg: HubActionMessage): void {
    if (msg.action === HubAction.UPSTREAM_DISCONNECT) {
      this.log.warn('Hub disconnects');
    } else if (msg.action === HubAction.UPSTREAM_SHUTDOWN) {
      this.log.warn('Hub switches off');
    } else {
      return;
    }
    this.close().catch((err: unknown) => {
      this.log.error({ err: toError(err) }, 'Connection teardown failed');
    });
  }
}
