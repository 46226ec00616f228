/**
 * Peripheral Registry
 *
 * Maps the device type code from an attach event to the class that
 * represents it. New device types are registered here; the hub engine
 * never needs to know about them.
 */

import { DeviceType } from '../messages';
import { Peripheral, PeripheralHost, PeripheralOptions } from './peripheral';
import { EncodedMotor, Motor } from './motor';
import { Current, TiltSensor, Voltage, VisionSensor } from './sensors';
import { LEDRGB } from './led';

export type PeripheralConstructor = new (
  hub: PeripheralHost,
  port: number,
  options?: PeripheralOptions,
) => Peripheral;

export const DEFAULT_PERIPHERAL_TYPES: ReadonlyMap<number, PeripheralConstructor> = new Map<number, PeripheralConstructor>([
  [DeviceType.MOTOR, Motor],
  [DeviceType.MOTOR_EXTERNAL_TACHO, EncodedMotor],
  [DeviceType.MOTOR_INTERNAL_TACHO, EncodedMotor],
  [DeviceType.VISION_SENSOR, VisionSensor],
  [DeviceType.RGB_LIGHT, LEDRGB],
  [DeviceType.TILT_EXTERNAL, TiltSensor],
  [DeviceType.TILT_INTERNAL, TiltSensor],
  [DeviceType.CURRENT, Current],
  [DeviceType.VOLTAGE, Voltage],
]);

export interface ResolvedPeripheral {
  ctor: PeripheralConstructor;
  /** False when the fallback class was used for an unrecognized code */
  known: boolean;
}

export class PeripheralRegistry {
  private readonly types: Map<number, PeripheralConstructor>;

  constructor(
    types: ReadonlyMap<number, PeripheralConstructor> = DEFAULT_PERIPHERAL_TYPES,
    readonly fallback: PeripheralConstructor = Peripheral,
  ) {
    this.types = new Map(types);
  }

  register(deviceType: number, ctor: PeripheralConstructor): this {
    this.types.set(deviceType, ctor);
    return this;
  }

  has(deviceType: number): boolean {
    return this.types.has(deviceType);
  }

  resolve(deviceType: number): ResolvedPeripheral {
    const ctor = this.types.get(deviceType);
    return ctor ? { ctor, known: true } : { ctor: this.fallback, known: false };
  }
}
