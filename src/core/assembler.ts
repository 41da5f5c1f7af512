import type { DecodedArgument, LogRecord, OutputRecord } from './types.js';

/**
 * Merges the decoded fields into a copy of the input record.
 * Topic arguments come first and data arguments follow, each in the order
 * its decoder produced them.
 */
export function assembleOutput(
  record: LogRecord,
  signature: string,
  topicArguments: DecodedArgument[],
  dataArguments: DecodedArgument[]
): OutputRecord {
  return {
    ...record,
    hash: record.transactionHash,
    block: record.blockNumber.toString(),
    signature,
    arguments: [...topicArguments, ...dataArguments],
  };
}
