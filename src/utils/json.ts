import * as fs from 'node:fs';
import * as path from 'node:path';
import { InvalidPayloadError, PayloadNotFoundError } from '../errors.js';

/**
 * Read an assessment payload from disk.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  if (!fs.existsSync(filePath)) {
    throw new PayloadNotFoundError(path.basename(filePath));
  }

  const content = await fs.promises.readFile(filePath, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new InvalidPayloadError(`${path.basename(filePath)} is not valid JSON`, { cause: error });
  }
}
