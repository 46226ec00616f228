/**
 * Emulator barrel exports.
 *
 * Usage:
 *   import { HubEmulator } from './emulators';
 *   const hub = await MoveHub.connect(new HubEmulator());
 */

export { HubEmulator, MOVE_HUB_DEVICES } from './hub-emulator';
export type { EmulatedDevice, EmulatedWrite, EmulatorLogEntry, HubEmulatorOptions } from './hub-emulator';
