import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { EventEmitter } from 'events';
import { waitForPoweredOn } from '../connection/noble-connection';

/** Stands in for noble's adapter state and its stateChange event */
class FakeAdapter extends EventEmitter {
  constructor(public _state: string) {
    super();
  }

  change(state: string): void {
    this._state = state;
    this.emit('stateChange', state);
  }
}

describe('waitForPoweredOn', () => {
  it('resolves at once when the adapter is already on', async () => {
    const adapter = new FakeAdapter('poweredOn');
    await waitForPoweredOn(adapter, 10);
    assert.equal(adapter.listenerCount('stateChange'), 0);
  });

  it('waits for the adapter to power on and stops listening', async () => {
    const adapter = new FakeAdapter('unknown');
    const ready = waitForPoweredOn(adapter, 1000);

    adapter.change('poweredOff');
    assert.equal(adapter.listenerCount('stateChange'), 1);
    adapter.change('poweredOn');

    await ready;
    assert.equal(adapter.listenerCount('stateChange'), 0);
  });

  it('rejects with the last state after the timeout', async () => {
    const adapter = new FakeAdapter('unauthorized');
    await assert.rejects(waitForPoweredOn(adapter, 5), {
      message: 'Bluetooth adapter not powered on after 5ms (state: unauthorized)',
    });
    assert.equal(adapter.listenerCount('stateChange'), 0);
  });
});
