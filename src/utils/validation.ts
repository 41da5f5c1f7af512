import { z } from 'zod';

export const hexStringSchema = z
  .string()
  .regex(/^(0x)?([a-fA-F0-9]{2})*$/, 'Invalid hex string');

export const blockNumberSchema = z.number().int().nonnegative();

// Extra fields on a record are carried through to the output untouched
export const logRecordSchema = z
  .object({
    transactionHash: z.string(),
    blockNumber: blockNumberSchema,
    topics: z.array(z.string()),
    data: z.string(),
  })
  .passthrough();

export const lensParametersSchema = z.object({
  abi: z.string(),
});

export function validateHexString(value: string): boolean {
  return hexStringSchema.safeParse(value).success;
}

export function validateBlockNumber(blockNumber: number): boolean {
  return blockNumberSchema.safeParse(blockNumber).success;
}
