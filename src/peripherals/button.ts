/**
 * Hub button
 *
 * Not a port device: the button state is a hub property. Enabling updates
 * makes the hub push a BUTTON property notification on every press and
 * release.
 *
 * Emits:
 *   'pressed'
 *   'released'
 */

import { EventEmitter } from 'events';
import {
  DownstreamMessage,
  HubProperty,
  HubPropertiesMessage,
  HubPropertyRequest,
  PropertyOperation,
  UpstreamMessage,
  UpstreamMessageClass,
} from '../messages';

export interface ButtonHost {
  send(msg: DownstreamMessage): Promise<UpstreamMessage | undefined>;
  addMessageHandler<T extends UpstreamMessage>(kind: UpstreamMessageClass<T>, handler: (msg: T) => void): void;
}

export class Button extends EventEmitter {
  private pressedState = false;

  constructor(private readonly hub: ButtonHost) {
    super();
    hub.addMessageHandler(HubPropertiesMessage, (msg) => this.handleProperty(msg));
  }

  get pressed(): boolean {
    return this.pressedState;
  }

  async enableUpdates(): Promise<void> {
    await this.hub.send(new HubPropertyRequest(HubProperty.BUTTON, PropertyOperation.UPD_ENABLE));
  }

  async disableUpdates(): Promise<void> {
    await this.hub.send(new HubPropertyRequest(HubProperty.BUTTON, PropertyOperation.UPD_DISABLE));
  }

  private handleProperty(msg: HubPropertiesMessage): void {
    if (msg.property !== HubProperty.BUTTON || msg.operation !== PropertyOperation.UPSTREAM_UPDATE) return;
    const pressed = msg.parameters.length > 0 && msg.parameters[0] !== 0;
    if (pressed === this.pressedState) return;
    this.pressedState = pressed;
    this.emit(pressed ? 'pressed' : 'released');
  }
}
