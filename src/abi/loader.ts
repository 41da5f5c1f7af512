import * as fs from 'node:fs';
import { ABIError } from '../utils/errors.js';

/**
 * Read ABI text from a file, checking that it is JSON
 */
export function readAbiFile(filePath: string): string {
  try {
    if (!fs.existsSync(filePath)) {
      throw new ABIError(`ABI file not found: ${filePath}`);
    }

    const content = fs.readFileSync(filePath, 'utf-8');

    try {
      JSON.parse(content);
    } catch {
      throw new ABIError(`Invalid JSON in ABI file: ${filePath}`);
    }

    return content;
  } catch (error) {
    if (error instanceof ABIError) {
      throw error;
    }
    throw new ABIError(
      `Failed to read ABI file: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
