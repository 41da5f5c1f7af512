export interface ParameterDefinition {
  name: string;
  type: string;
  indexed: boolean;
}

export interface EventDefinition {
  name: string;
  inputs: ParameterDefinition[];
}

export interface LogRecord {
  transactionHash: string;
  blockNumber: number;
  topics: string[];
  data: string;
  [field: string]: unknown;
}

export type DecodedValue = string | boolean;

export interface DecodedArgument {
  name: string;
  type: string;
  value: DecodedValue;
}

export interface OutputRecord extends LogRecord {
  hash: string;
  block: string;
  signature: string;
  arguments: DecodedArgument[];
}

export interface EventMatch {
  definition: EventDefinition;
  signature: string;
}

/**
 * `uint256` renders every value exactly. `uint128` keeps the legacy policy
 * where a value wider than 128 bits renders as "0".
 */
export type NumericRange = 'uint256' | 'uint128';

/**
 * `indexed` gives each indexed parameter the next topic. `positional` reads
 * the topic at the parameter's declaration position, counting non-indexed
 * parameters too.
 */
export type TopicIndexing = 'indexed' | 'positional';

export interface DecoderOptions {
  numericRange?: NumericRange;
  topicIndexing?: TopicIndexing;
}
