/**
 * Sensors built into or attachable to the hub.
 *
 * Readings decode the most recent value notification; nothing is polled.
 * Subscribe to the relevant mode first.
 */

import { Capability, Peripheral } from './peripheral';

export const VisionMode = {
  COLOR_INDEX: 0x00,
  DISTANCE_INCHES: 0x01,
  COLOR_DISTANCE_FLOAT: 0x08,
} as const;

export class VisionSensor extends Peripheral {
  readonly capability: Capability = 'vision-sensor';

  /** Detected color index (0xff when nothing is detected) */
  get color(): number | undefined {
    if (this.mode !== VisionMode.COLOR_INDEX && this.mode !== VisionMode.COLOR_DISTANCE_FLOAT) return undefined;
    return this.lastValue?.[0];
  }
}

export const TiltMode = {
  ANGLE_2AXIS: 0x00,
  ORIENTATION: 0x01,
} as const;

export class TiltSensor extends Peripheral {
  readonly capability: Capability = 'tilt-sensor';

  /** Roll and pitch in degrees from the two-axis angle mode */
  get angles(): { roll: number; pitch: number } | undefined {
    const data = this.lastValue;
    if (this.mode !== TiltMode.ANGLE_2AXIS || !data || data.length < 2) return undefined;
    return { roll: data.readInt8(0), pitch: data.readInt8(1) };
  }
}

/** Full-scale raw reading of the hub's analogue sensors */
const RAW_FULL_SCALE_CURRENT = 4095;
const MAX_CURRENT_MA = 2444;
const RAW_AT_9600_MV = 3893;

export class Current extends Peripheral {
  readonly capability: Capability = 'current-sensor';
  private milliampsValue: number | undefined;

  get milliamps(): number | undefined {
    return this.milliampsValue;
  }

  protected onData(data: Buffer): void {
    if (data.length >= 2) {
      this.milliampsValue = (MAX_CURRENT_MA * data.readUInt16LE(0)) / RAW_FULL_SCALE_CURRENT;
    }
  }
}

export class Voltage extends Peripheral {
  readonly capability: Capability = 'voltage-sensor';
  private voltsValue: number | undefined;

  get volts(): number | undefined {
    return this.voltsValue;
  }

  protected onData(data: Buffer): void {
    if (data.length >= 2) {
      this.voltsValue = (9600 * data.readUInt16LE(0)) / RAW_AT_9600_MV / 1000;
    }
  }
}
