import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { applyOverrides, formatPeripheralTable, parseArgs } from '../index';
import { parseConfig } from '../config';
import { EncodedMotor, LEDRGB, Peripheral, PeripheralHost } from '../peripherals';
import { captureLogger } from './support/fakes';

const argv = (...args: string[]) => ['node', 'brickhub', ...args];

describe('CLI', () => {
  describe('parseArgs', () => {
    it('defaults every flag to off', () => {
      assert.deepEqual(parseArgs(argv()), { emulate: false, verbose: false, demo: false, help: false });
    });

    it('reads long and short flags', () => {
      assert.deepEqual(parseArgs(argv('-c', 'bench.yml', '-e', '--verbose', '--demo')), {
        configPath: 'bench.yml',
        emulate: true,
        verbose: true,
        demo: true,
        help: false,
      });
    });

    it('rejects --config without a path', () => {
      assert.throws(() => parseArgs(argv('--config')), { message: '--config requires a file path' });
    });

    it('rejects unknown options', () => {
      assert.throws(() => parseArgs(argv('--fast')), { message: 'Unknown option: --fast' });
    });
  });

  describe('applyOverrides', () => {
    it('--emulate switches the transport and --verbose the log level', () => {
      const config = parseConfig({ connection: { name: 'Bench Hub' }, logging: { pretty: true } });
      const result = applyOverrides(config, { emulate: true, verbose: true, demo: false, help: false });

      assert.equal(result.connection.type, 'emulator');
      assert.equal(result.connection.name, 'Bench Hub');
      assert.deepEqual(result.logging, { pretty: true, level: 'debug' });
      assert.equal(config.connection.type, 'noble');
    });

    it('leaves the config alone without flags', () => {
      const config = parseConfig({});
      assert.deepEqual(applyOverrides(config, parseArgs(argv())), config);
    });
  });

  describe('formatPeripheralTable', () => {
    it('lists peripherals by port with their capability', () => {
      const host: PeripheralHost = {
        async send() {
          return undefined;
        },
        async request(): Promise<never> {
          throw new Error('not used');
        },
      };
      const logger = captureLogger('silent').logger;
      const peripherals = new Map<number, Peripheral>([
        [0x32, new LEDRGB(host, 0x32, { logger })],
        [0x00, new EncodedMotor(host, 0x00, { logger })],
      ]);

      assert.deepEqual(formatPeripheralTable(peripherals), [
        `    ${'EncodedMotor on port 0x00'.padEnd(48)} encoded-motor`,
        `    ${'LEDRGB on port 0x32'.padEnd(48)} rgb-light`,
      ]);
    });
  });
});
