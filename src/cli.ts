#!/usr/bin/env node
/**
 * Command line front end: signs INPUT with the key pair in a PKCS#12 file
 * and writes the result to OUTPUT
 */
import { sign } from './sign';
import { parsePKCS12, PKCS7Signer } from './signer';
import type { KeyPair } from './signer';
import { readFileAsBuffer, writeBufferToFile } from './utils';
import { errorMessage } from './errors';
import { VERSION, DEFAULT_RESERVATION } from './constants';

export const USAGE = 'usage: pdf-incremental-sign [-h] [-V] [-r RESERVATION] ' +
  'INPUT-FILENAME OUTPUT-FILENAME PKCS12-PATH PKCS12-PASS';

/**
 * Exit codes, one per stage that can fail
 */
export const EXIT_CODES = {
  USAGE: 1,
  KEY_PAIR_READ: 2,
  KEY_PAIR_PARSE: 3,
  SIGN: 4,
  WRITE: 5
} as const;

export interface SignCommand {
  kind: 'sign';
  inputPath: string;
  outputPath: string;
  pkcs12Path: string;
  pkcs12Password: string;
  reservation: number;
}

export type ParsedArguments =
  | SignCommand
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

/**
 * Parses command line arguments, without the node and script paths
 */
export function parseArguments(argv: readonly string[]): ParsedArguments {
  const positional: string[] = [];
  let reservation = DEFAULT_RESERVATION;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }
    if (arg === '-V' || arg === '--version') {
      return { kind: 'version' };
    }
    if (arg === '--') {
      positional.push(...argv.slice(i + 1));
      break;
    }

    if (arg === '-r' || arg === '--reservation') {
      const value = argv[i + 1];
      if (value === undefined) {
        return { kind: 'error', message: `option ${arg} needs a value` };
      }
      if (!/^\d+$/.test(value)) {
        return { kind: 'error', message: `invalid reservation: ${value}` };
      }
      reservation = parseInt(value, 10);
      i++;
      continue;
    }
    if (arg.length > 1 && arg.startsWith('-')) {
      return { kind: 'error', message: `unknown option: ${arg}` };
    }
    positional.push(arg);
  }

  if (positional.length !== 4) {
    return { kind: 'error', message: 'expected exactly four arguments' };
  }
  const [inputPath, outputPath, pkcs12Path, pkcs12Password] = positional;
  return { kind: 'sign', inputPath, outputPath, pkcs12Path, pkcs12Password, reservation };
}

function die(status: number, message: string): never {
  const text = process.stderr.isTTY ? `\x1b[0;31m${message}\x1b[0m` : message;
  console.error(text);
  process.exit(status);
}

/**
 * Runs the whole signing pipeline, exiting with the matching code on failure
 */
export async function run(command: SignCommand): Promise<void> {
  let document: Buffer;
  try {
    document = await readFileAsBuffer(command.inputPath);
  } catch (err) {
    die(EXIT_CODES.USAGE, errorMessage(err));
  }

  let p12: Buffer;
  try {
    p12 = await readFileAsBuffer(command.pkcs12Path);
  } catch (err) {
    die(EXIT_CODES.KEY_PAIR_READ, errorMessage(err));
  }

  let keyPair: KeyPair;
  try {
    keyPair = parsePKCS12(p12, command.pkcs12Password);
  } catch (err) {
    die(EXIT_CODES.KEY_PAIR_PARSE, errorMessage(err));
  }

  let signed: Buffer;
  try {
    signed = sign(document, new PKCS7Signer(keyPair), { reservation: command.reservation });
  } catch (err) {
    die(EXIT_CODES.SIGN, `Error: ${errorMessage(err)}`);
  }

  try {
    await writeBufferToFile(command.outputPath, signed);
  } catch (err) {
    die(EXIT_CODES.WRITE, errorMessage(err));
  }
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  const args = parseArguments(argv);
  if (args.kind === 'help') {
    console.log(USAGE);
  } else if (args.kind === 'version') {
    console.log(VERSION);
  } else if (args.kind === 'error') {
    die(EXIT_CODES.USAGE, `${args.message}\n${USAGE}`);
  } else {
    await run(args);
  }
}

if (require.main === module) {
  main().catch((err: unknown) => die(EXIT_CODES.SIGN, errorMessage(err)));
}
