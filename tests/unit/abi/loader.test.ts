import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { readAbiFile } from '../../../src/abi/loader.js';
import { ABIError } from '../../../src/utils/errors.js';
import { ERC20_ABI } from '../../fixtures/abis.js';

describe('readAbiFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'log-lens-abi-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should return the file content', () => {
    const abiPath = path.join(tempDir, 'erc20.json');
    const content = JSON.stringify(ERC20_ABI);
    fs.writeFileSync(abiPath, content);

    expect(readAbiFile(abiPath)).toBe(content);
  });

  it('should throw ABIError for a missing file', () => {
    const abiPath = path.join(tempDir, 'missing.json');

    expect(() => readAbiFile(abiPath)).toThrow(ABIError);
    expect(() => readAbiFile(abiPath)).toThrow(`ABI file not found: ${abiPath}`);
  });

  it('should throw ABIError for a file that is not JSON', () => {
    const abiPath = path.join(tempDir, 'broken.json');
    fs.writeFileSync(abiPath, '[{"type": "event",');

    expect(() => readAbiFile(abiPath)).toThrow(`Invalid JSON in ABI file: ${abiPath}`);
  });

  it('should wrap read failures in ABIError', () => {
    expect(() => readAbiFile(tempDir)).toThrow(ABIError);
    expect(() => readAbiFile(tempDir)).toThrow(/Failed to read ABI file/);
  });
});
