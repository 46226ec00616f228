import { OutputSubcommand, PortOutputCommand } from '../messages';
import { Capability, Peripheral } from './peripheral';

export const Color = {
  BLACK: 0,
  PINK: 1,
  PURPLE: 2,
  BLUE: 3,
  LIGHT_BLUE: 4,
  CYAN: 5,
  GREEN: 6,
  YELLOW: 7,
  ORANGE: 8,
  RED: 9,
  WHITE: 10,
} as const;

const COLOR_INDEX_MODE = 0x00;

export class LEDRGB extends Peripheral {
  readonly capability: Capability = 'rgb-light';
  private currentColor: number | undefined;

  get color(): number | undefined {
    return this.currentColor;
  }

  async setColor(color: number): Promise<void> {
    if (!Number.isInteger(color) || color < Color.BLACK || color > Color.WHITE) {
      throw new RangeError(`Color index out of range (0-10): ${color}`);
    }
    const parameters = Buffer.from([COLOR_INDEX_MODE, color]);
    await this.hub.send(new PortOutputCommand(this.port, OutputSubcommand.WRITE_DIRECT_MODE_DATA, parameters));
    this.currentColor = color;
  }
}
