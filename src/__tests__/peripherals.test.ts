import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import {
  DeviceType,
  DownstreamMessage,
  FeedbackStatus,
  HubProperty,
  HubPropertiesMessage,
  PortInputFormatMessage,
  PortInputFormatSetup,
  PortOutputCommand,
  PortOutputFeedbackMessage,
  PortValueSingleMessage,
  PropertyOperation,
  UpstreamMessage,
  UpstreamMessageClass,
} from '../messages';
import {
  Button,
  ButtonHost,
  Color,
  Current,
  EncodedMotor,
  EndState,
  LEDRGB,
  Motor,
  MotorMode,
  Peripheral,
  PeripheralHost,
  PeripheralRegistry,
  TiltMode,
  TiltSensor,
  VisionMode,
  VisionSensor,
  Voltage,
} from '../peripherals';
import { LogLine, captureLogger } from './support/fakes';

/** Records commands and answers requests from a queue of canned replies */
class FakeHost implements PeripheralHost, ButtonHost {
  readonly sent: DownstreamMessage[] = [];
  readonly replies: UpstreamMessage[] = [];
  private readonly handlers: Array<(msg: UpstreamMessage) => void> = [];

  async send(msg: DownstreamMessage): Promise<UpstreamMessage | undefined> {
    this.sent.push(msg);
    return msg.needsReply ? this.replies.shift() : undefined;
  }

  async request<T extends UpstreamMessage>(msg: DownstreamMessage, kind: UpstreamMessageClass<T>): Promise<T> {
    const reply = await this.send(msg);
    if (!(reply instanceof kind)) throw new Error(`No ${kind.name} queued`);
    return reply;
  }

  addMessageHandler<T extends UpstreamMessage>(kind: UpstreamMessageClass<T>, handler: (msg: T) => void): void {
    this.handlers.push((msg) => {
      if (msg instanceof kind) handler(msg);
    });
  }

  dispatch(msg: UpstreamMessage): void {
    for (const handler of this.handlers) handler(msg);
  }

  /** Frame bytes of the n-th command */
  frame(index: number): number[] {
    return [...this.sent[index].encode()];
  }
}

function value(port: number, bytes: number[]): PortValueSingleMessage {
  return new PortValueSingleMessage(port, Buffer.from(bytes));
}

describe('Peripherals', () => {
  let host: FakeHost;
  let lines: LogLine[];
  let options: { logger: ReturnType<typeof captureLogger>['logger'] };

  beforeEach(() => {
    host = new FakeHost();
    const captured = captureLogger('warn');
    lines = captured.lines;
    options = { logger: captured.logger };
  });

  // =========================================================================
  // Base class
  // =========================================================================

  describe('Peripheral', () => {
    it('keeps the last value and emits it', () => {
      const peripheral = new Peripheral(host, 0x02, options);
      const received: Buffer[] = [];
      peripheral.on('data', (data: Buffer) => received.push(data));

      peripheral.queuePortData(value(0x02, [0x01, 0x02]));
      assert.deepEqual([...(peripheral.lastValue ?? [])], [0x01, 0x02]);
      assert.equal(received.length, 1);
    });

    it('subscribe asks for notifications and records the mode', async () => {
      const peripheral = new Peripheral(host, 0x02, options);
      host.replies.push(new PortInputFormatMessage(0x02, 0x01, 5, true));

      await peripheral.subscribe(0x01, 5);
      assert.equal(peripheral.mode, 0x01);
      assert.deepEqual(host.frame(0), [0x0a, 0x00, 0x41, 0x02, 0x01, 0x05, 0x00, 0x00, 0x00, 0x01]);
    });

    it('unsubscribe turns notifications off for the subscribed mode', async () => {
      const peripheral = new Peripheral(host, 0x02, options);
      host.replies.push(new PortInputFormatMessage(0x02, 0x01, 1, true));
      await peripheral.subscribe(0x01);

      host.replies.push(new PortInputFormatMessage(0x02, 0x01, 1, false));
      await peripheral.unsubscribe();
      const last = host.sent[1];
      assert.ok(last instanceof PortInputFormatSetup);
      assert.equal(last.notify, false);
      assert.equal(peripheral.mode, undefined);
    });

    it('unsubscribe without a subscription sends nothing', async () => {
      await new Peripheral(host, 0x02, options).unsubscribe();
      assert.equal(host.sent.length, 0);
    });
  });

  // =========================================================================
  // Motors
  // =========================================================================

  describe('Motor', () => {
    it('drives a single port through direct mode data', async () => {
      await new Motor(host, 0x01, options).startPower(50);
      assert.deepEqual(host.frame(0), [0x08, 0x00, 0x81, 0x01, 0x10, 0x51, 0x00, 0x32]);
    });

    it('drives both motors of a virtual port in one command', async () => {
      await new Motor(host, 0x10, { ...options, virtualPorts: [0x00, 0x01] }).startPower(50, -50);
      assert.deepEqual(host.frame(0), [0x08, 0x00, 0x81, 0x10, 0x10, 0x02, 0x32, 0xce]);
    });

    it('clamps power to -100..100', async () => {
      const motor = new Motor(host, 0x01, options);
      await motor.startPower(150);
      await motor.startPower(-300);
      const first = host.sent[0];
      const second = host.sent[1];
      assert.ok(first instanceof PortOutputCommand && second instanceof PortOutputCommand);
      assert.equal(first.parameters.readInt8(1), 100);
      assert.equal(second.parameters.readInt8(1), -100);
    });

    it('stop sets power to zero', async () => {
      await new Motor(host, 0x01, options).stop();
      assert.deepEqual(host.frame(0), [0x08, 0x00, 0x81, 0x01, 0x10, 0x51, 0x00, 0x00]);
    });
  });

  describe('EncodedMotor', () => {
    it('rotateByAngle waits for completion feedback', async () => {
      const motor = new EncodedMotor(host, 0x00, options);
      host.replies.push(PortOutputFeedbackMessage.of(0x00, FeedbackStatus.COMPLETED | FeedbackStatus.IDLE));

      await motor.rotateByAngle(-90, 30);
      const command = host.sent[0];
      assert.ok(command instanceof PortOutputCommand);
      assert.equal(command.waitComplete, true);
      assert.deepEqual(
        host.frame(0),
        [0x0e, 0x00, 0x81, 0x00, 0x11, 0x0b, 0x5a, 0x00, 0x00, 0x00, 0xe2, 0x64, EndState.BRAKE, 0x00],
      );
      assert.equal(lines.length, 0);
    });

    it('warns when the hub discards the rotation', async () => {
      const motor = new EncodedMotor(host, 0x00, options);
      host.replies.push(PortOutputFeedbackMessage.of(0x00, FeedbackStatus.DISCARDED | FeedbackStatus.IDLE));

      await motor.rotateByAngle(45);
      assert.equal(lines[0].msg, 'Rotation discarded by hub');
      assert.equal(lines[0].port, '0x00');
    });

    it('tracks the angle while subscribed to angle mode', async () => {
      const motor = new EncodedMotor(host, 0x00, options);
      motor.queuePortData(value(0x00, [0x68, 0x01, 0x00, 0x00]));
      assert.equal(motor.angle, undefined);

      host.replies.push(new PortInputFormatMessage(0x00, MotorMode.ANGLE, 1, true));
      await motor.subscribe(MotorMode.ANGLE);
      motor.queuePortData(value(0x00, [0x68, 0x01, 0x00, 0x00]));
      assert.equal(motor.angle, 360);
    });
  });

  // =========================================================================
  // Sensors
  // =========================================================================

  describe('Sensors', () => {
    it('vision sensor reports the color index in color mode', async () => {
      const sensor = new VisionSensor(host, 0x02, options);
      sensor.queuePortData(value(0x02, [0x03]));
      assert.equal(sensor.color, undefined);

      host.replies.push(new PortInputFormatMessage(0x02, VisionMode.COLOR_INDEX, 1, true));
      await sensor.subscribe(VisionMode.COLOR_INDEX);
      sensor.queuePortData(value(0x02, [0x03]));
      assert.equal(sensor.color, 3);
    });

    it('tilt sensor decodes signed roll and pitch', async () => {
      const sensor = new TiltSensor(host, 0x3a, options);
      host.replies.push(new PortInputFormatMessage(0x3a, TiltMode.ANGLE_2AXIS, 1, true));
      await sensor.subscribe(TiltMode.ANGLE_2AXIS);
      sensor.queuePortData(value(0x3a, [0xfb, 0x0a]));
      assert.deepEqual(sensor.angles, { roll: -5, pitch: 10 });
    });

    it('current sensor scales full range to 2444 mA', () => {
      const sensor = new Current(host, 0x3b, options);
      sensor.queuePortData(value(0x3b, [0xff, 0x0f]));
      assert.equal(sensor.milliamps, 2444);
    });

    it('voltage sensor scales to volts', () => {
      const sensor = new Voltage(host, 0x3c, options);
      // 3893 = 0x0f35
      sensor.queuePortData(value(0x3c, [0x35, 0x0f]));
      assert.equal(sensor.volts, 9.6);
    });

    it('ignores short readings', () => {
      const sensor = new Voltage(host, 0x3c, options);
      sensor.queuePortData(value(0x3c, [0x35]));
      assert.equal(sensor.volts, undefined);
    });
  });

  // =========================================================================
  // LED
  // =========================================================================

  describe('LEDRGB', () => {
    it('sets a color index', async () => {
      const led = new LEDRGB(host, 0x32, options);
      await led.setColor(Color.RED);
      assert.deepEqual(host.frame(0), [0x08, 0x00, 0x81, 0x32, 0x10, 0x51, 0x00, 0x09]);
      assert.equal(led.color, Color.RED);
    });

    it('rejects indexes outside the color table', async () => {
      const led = new LEDRGB(host, 0x32, options);
      await assert.rejects(led.setColor(11), RangeError);
      await assert.rejects(led.setColor(1.5), RangeError);
      assert.equal(host.sent.length, 0);
      assert.equal(led.color, undefined);
    });
  });

  // =========================================================================
  // Button
  // =========================================================================

  describe('Button', () => {
    function buttonUpdate(state: number): HubPropertiesMessage {
      return new HubPropertiesMessage(HubProperty.BUTTON, PropertyOperation.UPSTREAM_UPDATE, Buffer.from([state]));
    }

    it('emits pressed and released on state changes only', () => {
      const button = new Button(host);
      const events: string[] = [];
      button.on('pressed', () => events.push('pressed'));
      button.on('released', () => events.push('released'));

      host.dispatch(buttonUpdate(1));
      host.dispatch(buttonUpdate(1));
      host.dispatch(buttonUpdate(0));

      assert.deepEqual(events, ['pressed', 'released']);
      assert.equal(button.pressed, false);
    });

    it('ignores other properties', () => {
      const button = new Button(host);
      host.dispatch(new HubPropertiesMessage(HubProperty.VOLTAGE_PERC, PropertyOperation.UPSTREAM_UPDATE, Buffer.from([1])));
      assert.equal(button.pressed, false);
    });

    it('enableUpdates and disableUpdates toggle property notifications', async () => {
      const button = new Button(host);
      await button.enableUpdates();
      await button.disableUpdates();
      assert.deepEqual(host.frame(0), [0x05, 0x00, 0x01, 0x02, 0x02]);
      assert.deepEqual(host.frame(1), [0x05, 0x00, 0x01, 0x02, 0x03]);
    });
  });

  // =========================================================================
  // Registry
  // =========================================================================

  describe('PeripheralRegistry', () => {
    it('resolves known codes and falls back for unknown ones', () => {
      const registry = new PeripheralRegistry();
      assert.deepEqual(registry.resolve(DeviceType.RGB_LIGHT), { ctor: LEDRGB, known: true });
      assert.deepEqual(registry.resolve(0x00ff), { ctor: Peripheral, known: false });
    });

    it('register adds or replaces a mapping', () => {
      const registry = new PeripheralRegistry().register(DeviceType.MOTOR, EncodedMotor);
      assert.equal(registry.resolve(DeviceType.MOTOR).ctor, EncodedMotor);
      assert.equal(new PeripheralRegistry().resolve(DeviceType.MOTOR).ctor, Motor);
    });
  });
});
