#!/usr/bin/env node

/**
 * brickhub
 *
 * Connects to a Move Hub (over Bluetooth, or the built-in emulator), waits
 * for its devices, prints what it found and disconnects.
 *
 * Usage:
 *   brickhub                      # Use brickhub.yml in current directory
 *   brickhub --config ./my.yml    # Use a specific config file
 *   brickhub --emulate            # Talk to the in-process emulator
 *   brickhub --verbose            # Debug logging
 *   brickhub --demo               # Run a short LED and motor demo
 */

import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'pino';
import { Config, loadConfig } from './config';
import { createConnection } from './connection';
import { MoveHub } from './hub';
import { Color, Peripheral } from './peripherals';
import { getLogger, initLogger } from './logger';
import { toError } from './errors';

export interface CliOptions {
  configPath?: string;
  emulate: boolean;
  verbose: boolean;
  demo: boolean;
  help: boolean;
}

function printBanner(): void {
  console.log('');
  console.log('  brickhub');
  console.log('  Driver for Bluetooth LE Move Hubs');
  console.log('');
}

function printHelp(): void {
  console.log('  Options:');
  console.log('    --config, -c <path>   Path to config YAML file (default brickhub.yml)');
  console.log('    --emulate, -e         Use the in-process hub emulator');
  console.log('    --verbose, -v         Enable debug logging');
  console.log('    --demo                Blink the LED and turn the motors');
  console.log('    --help, -h            Show this help');
  console.log('');
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { emulate: false, verbose: false, demo: false, help: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c': {
        const value = argv[++i];
        if (!value) {
          throw new Error('--config requires a file path');
        }
        options.configPath = value;
        break;
      }
      case '--emulate':
      case '-e':
        options.emulate = true;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--demo':
        options.demo = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return options;
}

/** Apply command-line flags on top of the file config */
export function applyOverrides(config: Config, options: CliOptions): Config {
  return {
    ...config,
    connection: options.emulate ? { ...config.connection, type: 'emulator' } : config.connection,
    logging: options.verbose ? { ...config.logging, level: 'debug' } : config.logging,
  };
}

/** One line per attached peripheral, sorted by port */
export function formatPeripheralTable(peripherals: ReadonlyMap<number, Peripheral>): string[] {
  return Array.from(peripherals.values())
    .sort((a, b) => a.port - b.port)
    .map((p) => `    ${p.toString().padEnd(48)} ${p.capability}`);
}

function printStatus(hub: MoveHub): void {
  const { name, mac, voltagePercent, lowVoltage } = hub.info;
  console.log(`  Hub: ${name ?? '?'} (${mac ?? '?'})`);
  console.log(`  Battery: ${voltagePercent ?? '?'}%${lowVoltage ? ' LOW' : ''}`);
  console.log('');
  console.log(`  Peripherals (${hub.peripherals.size}):`);
  for (const line of formatPeripheralTable(hub.peripherals)) {
    console.log(line);
  }
  const missing = hub.missingDevices();
  if (missing.length > 0) {
    console.log(`  Missing: ${missing.join(', ')}`);
  }
  console.log('');
}

async function runDemo(hub: MoveHub, log: Logger): Promise<void> {
  const { led, motorAB, motorA, motorB } = hub;

  for (const color of [Color.RED, Color.YELLOW, Color.GREEN, Color.BLUE]) {
    await led?.setColor(color);
    await sleep(300);
  }

  if (motorAB) {
    log.info('Driving both motors forward');
    await motorAB.startPower(50);
    await sleep(1000);
    await motorAB.stop();
  }
  if (motorA && motorB) {
    await motorA.rotateByAngle(90, 30);
    await motorB.rotateByAngle(-90, 30);
  }

  await led?.setColor(Color.WHITE);
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv);
  printBanner();
  if (options.help) {
    printHelp();
    return;
  }

  const loaded = loadConfig(options.configPath);
  const config = applyOverrides(loaded.config, options);
  initLogger(config.logging);
  const log = getLogger('Main');
  log.info({ path: loaded.path }, loaded.found ? 'Loaded config' : 'No config file found, using defaults');

  const connection = await createConnection(config.connection);
  let hub: MoveHub | undefined;
  connection.on('error', (err: Error) => {
    log.error({ err }, 'Connection failed');
    process.exitCode = 1;
    hub?.close().catch((e: unknown) => log.error({ err: toError(e) }, 'Close failed'));
  });

  hub = await MoveHub.connect(connection, {
    replyTimeoutMs: config.hub.replyTimeoutMs,
    deviceWaitAttempts: config.hub.deviceWaitAttempts,
    deviceWaitIntervalMs: config.hub.deviceWaitIntervalMs,
  });

  const connected = hub;
  process.once('SIGINT', () => {
    log.info('Shutting down...');
    connected.close()
      .catch((err: unknown) => log.error({ err: toError(err) }, 'Close failed'))
      .finally(() => process.exit(0));
  });

  printStatus(connected);

  if (options.demo) {
    await runDemo(connected, log);
  }

  await connected.disconnect();
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().then(
    () => process.exit(),
    (err: unknown) => {
      console.error(`[Error] ${toError(err).message}`);
      process.exit(1);
    },
  );
}
