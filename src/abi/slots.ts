import { getBytes, hexlify, toBigInt } from 'ethers';
import type { DecodedValue, NumericRange } from '../core/types.js';
import { MalformedInputError, OutOfBoundsError } from '../utils/errors.js';
import { validateHexString } from '../utils/validation.js';

export const SLOT_SIZE = 32;

const UINT128_LIMIT = 1n << 128n;

/**
 * Decodes hex text, with or without a 0x prefix, into bytes
 * @param field Name of the record field, used in error messages
 * @throws MalformedInputError for non-hex or odd-length text
 */
export function hexToBytes(value: string, field: string): Uint8Array {
  const clean = value.startsWith('0x') ? value.slice(2) : value;
  if (!validateHexString(clean)) {
    throw new MalformedInputError(`${field} is not a valid hex string: ${value}`, field);
  }
  return getBytes(`0x${clean}`);
}

/**
 * Returns the index-th 32-byte slot of a data blob
 * @throws OutOfBoundsError when the slot ends past the blob
 */
export function readSlot(bytes: Uint8Array, index: number): Uint8Array {
  const start = index * SLOT_SIZE;
  const end = start + SLOT_SIZE;
  if (end > bytes.length) {
    throw new OutOfBoundsError(
      `data slot ${index} needs bytes ${start}..${end} but data holds ${bytes.length}`,
      end,
      bytes.length
    );
  }
  return bytes.subarray(start, end);
}

/**
 * Returns topics[index] as a 32-byte slot
 * @throws OutOfBoundsError when the topic is missing or not 32 bytes wide
 */
export function readTopic(topics: readonly string[], index: number): Uint8Array {
  if (index >= topics.length) {
    throw new OutOfBoundsError(
      `topic ${index} is required but the log has ${topics.length} topics`,
      index + 1,
      topics.length
    );
  }

  const field = `topics[${index}]`;
  const slot = hexToBytes(topics[index], field);
  if (slot.length !== SLOT_SIZE) {
    throw new OutOfBoundsError(
      `${field} must be ${SLOT_SIZE} bytes, got ${slot.length}`,
      SLOT_SIZE,
      slot.length
    );
  }
  return slot;
}

/**
 * Renders one 32-byte slot as the display value for its declared type.
 * Types outside address, uint256, bool and bytes32 render as a fallback
 * string instead of failing.
 */
export function decodeSlot(
  type: string,
  slot: Uint8Array,
  numericRange: NumericRange = 'uint256'
): DecodedValue {
  switch (type) {
    case 'address':
      return hexlify(slot.subarray(SLOT_SIZE - 20));
    case 'uint256': {
      const value = toBigInt(slot);
      if (numericRange === 'uint128' && value >= UINT128_LIMIT) {
        return '0';
      }
      return value.toString();
    }
    case 'bool':
      return slot[SLOT_SIZE - 1] !== 0;
    case 'bytes32':
      return hexlify(slot);
    default:
      return `unsupported type: ${type}`;
  }
}
