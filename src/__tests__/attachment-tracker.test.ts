import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { AttachmentTracker } from '../hub/attachment-tracker';
import { DeviceType, DownstreamMessage, HubAttachedIOMessage, UpstreamMessage } from '../messages';
import {
  Current,
  EncodedMotor,
  LEDRGB,
  Peripheral,
  PeripheralHost,
  PeripheralRegistry,
  TiltSensor,
} from '../peripherals';
import { AttachmentError } from '../errors';
import { LogLine, captureLogger } from './support/fakes';

const host: PeripheralHost = {
  async send(_msg: DownstreamMessage): Promise<UpstreamMessage | undefined> {
    return undefined;
  },
  async request(): Promise<never> {
    throw new Error('not used');
  },
};

class PiezoTone extends Peripheral {}

describe('AttachmentTracker', () => {
  let lines: LogLine[];
  let tracker: AttachmentTracker;

  beforeEach(() => {
    const captured = captureLogger('info');
    lines = captured.lines;
    tracker = new AttachmentTracker(host, new PeripheralRegistry(), captured.logger);
  });

  it('creates the registered class for each device type', () => {
    tracker.apply(HubAttachedIOMessage.attached(0x00, DeviceType.MOTOR_INTERNAL_TACHO));
    tracker.apply(HubAttachedIOMessage.attached(0x32, DeviceType.RGB_LIGHT));
    tracker.apply(HubAttachedIOMessage.attached(0x3a, DeviceType.TILT_INTERNAL));
    tracker.apply(HubAttachedIOMessage.attached(0x3b, DeviceType.CURRENT));

    assert.ok(tracker.get(0x00) instanceof EncodedMotor);
    assert.ok(tracker.get(0x32) instanceof LEDRGB);
    assert.ok(tracker.get(0x3a) instanceof TiltSensor);
    assert.ok(tracker.get(0x3b) instanceof Current);
    assert.deepEqual(tracker.ports(), [0x00, 0x32, 0x3a, 0x3b]);
  });

  it('reports the change it applied', () => {
    const attached = tracker.apply(HubAttachedIOMessage.attached(0x01, DeviceType.MOTOR));
    if (attached.kind !== 'attached') assert.fail('expected an attach');
    assert.equal(attached.deviceType, DeviceType.MOTOR);

    const detached = tracker.apply(HubAttachedIOMessage.detached(0x01));
    assert.equal(detached.kind, 'detached');
    assert.equal(detached.peripheral, attached.peripheral);
    assert.equal(tracker.size, 0);
  });

  it('passes virtual port members to the peripheral', () => {
    tracker.apply(HubAttachedIOMessage.attachedVirtual(0x10, DeviceType.MOTOR_INTERNAL_TACHO, 0x00, 0x01));
    const motor = tracker.get(0x10);
    assert.deepEqual(motor?.virtualPorts, [0x00, 0x01]);
    assert.equal(motor?.isVirtual, true);
    assert.equal(motor?.toString(), 'EncodedMotor on port 0x10 (0x00+0x01)');
  });

  it('falls back to a generic peripheral for unknown device types', () => {
    tracker.apply(HubAttachedIOMessage.attached(0x02, 0x0016));
    const peripheral = tracker.get(0x02);
    assert.equal(peripheral?.constructor, Peripheral);
    assert.equal(peripheral?.capability, 'generic');

    const warning = lines.find((l) => l.msg === 'No dedicated class for peripheral type, using generic peripheral');
    assert.equal(warning?.deviceType, '0x0016');
    assert.equal(warning?.port, '0x02');
  });

  it('uses classes registered for new device types', () => {
    const registry = new PeripheralRegistry().register(DeviceType.PIEZO_SOUND, PiezoTone);
    const custom = new AttachmentTracker(host, registry, captureLogger('silent').logger);
    custom.apply(HubAttachedIOMessage.attached(0x02, DeviceType.PIEZO_SOUND));
    assert.ok(custom.get(0x02) instanceof PiezoTone);
  });

  it('rejects an attach on an occupied port and keeps the existing peripheral', () => {
    tracker.apply(HubAttachedIOMessage.attached(0x00, DeviceType.MOTOR));
    const existing = tracker.get(0x00);

    assert.throws(
      () => tracker.apply(HubAttachedIOMessage.attached(0x00, DeviceType.VISION_SENSOR)),
      {
        name: 'AttachmentError',
        message: 'Attach event for port 0x00 which already holds Motor on port 0x00',
      },
    );
    assert.equal(tracker.get(0x00), existing);
  });

  it('rejects a detach for an unknown port', () => {
    assert.throws(
      () => tracker.apply(HubAttachedIOMessage.detached(0x03)),
      (err: unknown) => err instanceof AttachmentError
        && err.message === 'Detach event for port 0x03 with no attached peripheral',
    );
  });

  it('logs attach and detach', () => {
    tracker.apply(HubAttachedIOMessage.attached(0x3c, DeviceType.VOLTAGE));
    tracker.apply(HubAttachedIOMessage.detached(0x3c));
    assert.deepEqual(
      lines.map((l) => [l.msg, l.peripheral]),
      [
        ['Attached peripheral', 'Voltage on port 0x3c'],
        ['Detached peripheral', 'Voltage on port 0x3c'],
      ],
    );
  });
});
