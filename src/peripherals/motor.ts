/**
 * Motors
 *
 * Motor drives a plain power output. EncodedMotor adds the tacho-based
 * commands. On a virtual (merged) port both outputs are driven by one
 * command, which is how the two built-in motors run in sync.
 */

import { OutputSubcommand, PortOutputCommand, PortOutputFeedbackMessage } from '../messages';
import { Capability, Peripheral } from './peripheral';

export const EndState = {
  FLOAT: 0,
  HOLD: 126,
  BRAKE: 127,
} as const;

export const MotorMode = {
  POWER: 0x00,
  SPEED: 0x01,
  ANGLE: 0x02,
} as const;

function clampPercent(value: number): number {
  return Math.max(-100, Math.min(100, Math.round(value)));
}

export class Motor extends Peripheral {
  readonly capability: Capability = 'motor';

  /**
   * Run at a power level in percent (-100..100, negative reverses).
   * On a virtual port `secondary` drives the second motor.
   */
  async startPower(power: number, secondary = power): Promise<void> {
    let subcommand: number;
    let parameters: Buffer;
    if (this.virtualPorts) {
      subcommand = OutputSubcommand.START_POWER_DUAL;
      parameters = Buffer.alloc(2);
      parameters.writeInt8(clampPercent(power), 0);
      parameters.writeInt8(clampPercent(secondary), 1);
    } else {
      subcommand = OutputSubcommand.WRITE_DIRECT_MODE_DATA;
      parameters = Buffer.alloc(2);
      parameters[0] = MotorMode.POWER;
      parameters.writeInt8(clampPercent(power), 1);
    }
    await this.hub.send(new PortOutputCommand(this.port, subcommand, parameters));
  }

  async stop(): Promise<void> {
    await this.startPower(0);
  }
}

export class EncodedMotor extends Motor {
  readonly capability: Capability = 'encoded-motor';
  private lastAngle: number | undefined;

  /** Cumulative angle in degrees, while subscribed to MotorMode.ANGLE */
  get angle(): number | undefined {
    return this.lastAngle;
  }

  protected onData(data: Buffer): void {
    if (this.mode === MotorMode.ANGLE && data.length >= 4) {
      this.lastAngle = data.readInt32LE(0);
    }
  }

  /**
   * Turn by `degrees` (sign gives direction) and resolve once the hub
   * reports the command finished.
   */
  async rotateByAngle(degrees: number, speed = 50, maxPower = 100, endState: number = EndState.BRAKE): Promise<void> {
    const direction = degrees < 0 ? -1 : 1;
    const parameters = Buffer.alloc(8);
    parameters.writeInt32LE(Math.abs(Math.round(degrees)), 0);
    parameters.writeInt8(clampPercent(direction * speed), 4);
    parameters[5] = Math.max(0, Math.min(100, Math.round(maxPower)));
    parameters[6] = endState;
    parameters[7] = 0x00; // no acceleration profile

    const feedback = await this.hub.request(
      new PortOutputCommand(this.port, OutputSubcommand.START_SPEED_FOR_DEGREES, parameters, true),
      PortOutputFeedbackMessage,
    );
    if (feedback.isDiscarded(this.port)) {
      this.log.warn({ degrees }, 'Rotation discarded by hub');
    }
  }
}
