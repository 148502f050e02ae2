import * as fs from 'fs';
import { promisify } from 'util';

/**
 * File helpers for the command line front end
 */

/**
 * Reads a file as a buffer
 * @param filePath Path to the file
 * @returns Promise with the file buffer
 */
export async function readFileAsBuffer(filePath: string): Promise<Buffer> {
  const readFile = promisify(fs.readFile);
  return readFile(filePath);
}

/**
 * Writes a buffer to a file, replacing it
 * @param filePath Path to the file
 * @param data Bytes to write
 */
export async function writeBufferToFile(filePath: string, data: Buffer): Promise<void> {
  const writeFile = promisify(fs.writeFile);
  return writeFile(filePath, data, { mode: 0o666 });
}
