// SPDX-License-Identifier: Apache-2.0

/**
 * IoT Ledger CLI
 *
 * Usage:
 *   iot-ledger <command> [arguments] [--data-dir <path>] [--key-file <path>]
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  SigningKey,
  JournalLedger,
  LedgerError,
  registerDevice,
  deviceExists,
  getDevice,
  submitData,
  getDataRecord,
  listDataRecords,
  verifyData,
  auditJournal,
} from 'iot-ledger-node';

export const VERSION = '0.1.0';

const COMMANDS = {
  'register-device': ['deviceID', 'owner', 'location'],
  'device-exists': ['deviceID'],
  'get-device': ['deviceID'],
  'submit-data': ['deviceID', 'timestamp', 'data'],
  'get-data-record': ['deviceID', 'timestamp'],
  'list-data-records': ['deviceID'],
  'verify-data': ['deviceID', 'timestamp', 'verifierID', 'isValid'],
  'audit': [],
} as const satisfies Record<string, readonly string[]>;

export type LedgerCommand = keyof typeof COMMANDS;

export interface CliArgs {
  command: LedgerCommand | 'help' | 'version';
  operands: string[];
  dataDir?: string;
  keyFile?: string;
}

export class UsageError extends Error {
  name = 'UsageError';
}

function isLedgerCommand(value: string): value is LedgerCommand {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

function optionValue(args: string[], index: number, option: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${option} requires a value`);
  }
  return value;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { command: 'help', operands: [] };
  const positionals: string[] = [];
  let explicit: 'help' | 'version' | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--data-dir':
        result.dataDir = optionValue(args, ++i, arg);
        break;
      case '--key-file':
        result.keyFile = optionValue(args, ++i, arg);
        break;
      case '--help':
      case '-h':
        explicit = 'help';
        break;
      case '--version':
      case '-v':
        explicit ??= 'version';
        break;
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positionals.push(arg);
    }
  }

  if (explicit) {
    result.command = explicit;
    return result;
  }
  if (positionals.length === 0) return result;

  const [command, ...operands] = positionals;
  if (!isLedgerCommand(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }
  const expected: readonly string[] = COMMANDS[command];
  if (operands.length !== expected.length) {
    const usage = expected.map(name => `<${name}>`).join(' ');
    throw new UsageError(`Usage: iot-ledger ${command} ${usage}`.trimEnd());
  }
  result.command = command;
  result.operands = operands;
  return result;
}

function printHelp(): void {
  console.log(`
iot-ledger v${VERSION} - IoT device registry and data verification ledger

USAGE:
  iot-ledger register-device <deviceID> <owner> <location>
  iot-ledger device-exists <deviceID>
  iot-ledger get-device <deviceID>
  iot-ledger submit-data <deviceID> <timestamp> <data>
  iot-ledger get-data-record <deviceID> <timestamp>
  iot-ledger list-data-records <deviceID>
  iot-ledger verify-data <deviceID> <timestamp> <verifierID> <true|false>
  iot-ledger audit

OPTIONS:
  --data-dir <path>      Journal directory (default: ./iot-ledger-data)
  --key-file <path>      Signing key JSON file (default: ./iot-ledger-key.json)
  --help, -h             Show this help
  --version, -v          Show version

ENVIRONMENT:
  IOT_LEDGER_DATA_DIR    Default data directory
  IOT_LEDGER_KEY_FILE    Default key file path
`);
}

async function loadOrCreateKey(keyFile: string): Promise<SigningKey> {
  if (fs.existsSync(keyFile)) {
    const data: { keyId: string; privateKey: string } = JSON.parse(fs.readFileSync(keyFile, 'utf-8'));
    return SigningKey.fromSeedHex(data.privateKey, data.keyId);
  }

  const key = await SigningKey.generate('iot-ledger-key');
  const keyData = {
    keyId: key.keyId,
    privateKey: key.seedHex(),
    publicKey: key.publicKeyHex(),
    createdAt: new Date().toISOString(),
  };
  fs.mkdirSync(path.dirname(keyFile), { recursive: true });
  fs.writeFileSync(keyFile, JSON.stringify(keyData, null, 2));
  console.error(`Created new signing key: ${keyFile}`);
  return key;
}

function parseVerdict(value: string): boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new UsageError(`isValid must be "true" or "false", got "${value}"`);
}

async function execute(command: LedgerCommand, operands: string[], ledger: JournalLedger): Promise<unknown> {
  switch (command) {
    case 'register-device': {
      const [deviceID, owner, location] = operands;
      return registerDevice(ledger, deviceID, owner, location);
    }
    case 'device-exists': {
      const [deviceID] = operands;
      return { deviceID, exists: await deviceExists(ledger, deviceID) };
    }
    case 'get-device':
      return getDevice(ledger, operands[0]);
    case 'submit-data': {
      const [deviceID, timestamp, data] = operands;
      return submitData(ledger, deviceID, timestamp, data);
    }
    case 'get-data-record': {
      const [deviceID, timestamp] = operands;
      return getDataRecord(ledger, deviceID, timestamp);
    }
    case 'list-data-records':
      return listDataRecords(ledger, operands[0]);
    case 'verify-data': {
      const [deviceID, timestamp, verifierID, isValid] = operands;
      return verifyData(ledger, deviceID, timestamp, verifierID, parseVerdict(isValid));
    }
    case 'audit':
      return auditJournal(ledger);
  }
}

/** Runs one command and resolves to the process exit code. */
export async function run(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      return 2;
    }
    throw err;
  }

  switch (args.command) {
    case 'help':
      printHelp();
      return 0;

    case 'version':
      console.log(`iot-ledger v${VERSION}`);
      return 0;
  }

  const dataDir = args.dataDir ?? process.env.IOT_LEDGER_DATA_DIR ?? './iot-ledger-data';
  const keyFile = args.keyFile ?? process.env.IOT_LEDGER_KEY_FILE ?? './iot-ledger-key.json';

  try {
    const signingKey = await loadOrCreateKey(keyFile);
    const ledger = new JournalLedger(signingKey, { dataDir });
    const result = await execute(args.command, args.operands, ledger);
    console.log(JSON.stringify(result, null, 2));
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      return 2;
    }
    if (err instanceof LedgerError) {
      console.error(`Error [${err.code}]: ${err.message}`);
      return 1;
    }
    console.error('Error:', err instanceof Error ? err.message : err);
    return 1;
  }
}
