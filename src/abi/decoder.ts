import { assembleOutput } from '../core/assembler.js';
import type {
  DecodedArgument,
  DecoderOptions,
  EventDefinition,
  LogRecord,
  NumericRange,
  OutputRecord,
  ParameterDefinition,
  TopicIndexing,
} from '../core/types.js';
import { OutOfBoundsError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { parseEventDefinitions } from './definitions.js';
import { matchEvent } from './signature.js';
import { SLOT_SIZE, decodeSlot, hexToBytes, readSlot, readTopic } from './slots.js';

export class EventDecoder {
  private readonly numericRange: NumericRange;
  private readonly topicIndexing: TopicIndexing;

  constructor(options: DecoderOptions = {}, private readonly logger?: Logger) {
    this.numericRange = options.numericRange ?? 'uint256';
    this.topicIndexing = options.topicIndexing ?? 'indexed';
  }

  /**
   * Decodes a log record against the events declared in the ABI text
   * @returns the output record, or null when the ABI does not parse or no
   * event signature matches topics[0]
   * @throws OutOfBoundsError when the log is missing topics or data slots
   * @throws MalformedInputError when a topic or the data is not hex
   */
  decode(record: LogRecord, abiText: string): OutputRecord | null {
    if (record.topics.length === 0) {
      throw new OutOfBoundsError('log has no signature topic', 1, 0);
    }

    const definitions = parseEventDefinitions(abiText);
    if (!definitions) {
      this.logger?.debug({ transactionHash: record.transactionHash }, 'ABI does not parse, passing record through');
      return null;
    }

    const match = matchEvent(record.topics[0], definitions);
    if (!match) {
      this.logger?.debug({ topic0: record.topics[0] }, 'No event signature matches topic0');
      return null;
    }

    this.logger?.debug({ signature: match.signature }, 'Matched event');

    const topicArguments = this.decodeTopics(match.definition, record.topics);
    const dataArguments = this.decodeData(match.definition, record.data);

    return assembleOutput(record, match.signature, topicArguments, dataArguments);
  }

  /**
   * Decodes the indexed parameters from topics[1..] in declaration order
   */
  decodeTopics(definition: EventDefinition, topics: readonly string[]): DecodedArgument[] {
    const indexed = definition.inputs.filter((input) => input.indexed);

    if (this.topicIndexing === 'indexed' && topics.length !== indexed.length + 1) {
      throw new OutOfBoundsError(
        `${definition.name} expects ${indexed.length + 1} topics, log has ${topics.length}`,
        indexed.length + 1,
        topics.length
      );
    }

    const decoded: DecodedArgument[] = [];
    let indexedCount = 0;

    definition.inputs.forEach((input, position) => {
      if (!input.indexed) {
        return;
      }

      const topicIndex =
        this.topicIndexing === 'positional' ? position + 1 : indexedCount + 1;
      indexedCount++;

      decoded.push(this.toArgument(input, readTopic(topics, topicIndex)));
    });

    return decoded;
  }

  /**
   * Decodes the non-indexed parameters from consecutive 32-byte data slots
   */
  decodeData(definition: EventDefinition, data: string): DecodedArgument[] {
    const inputs = definition.inputs.filter((input) => !input.indexed);
    const bytes = hexToBytes(data, 'data');

    const required = inputs.length * SLOT_SIZE;
    if (bytes.length < required) {
      throw new OutOfBoundsError(
        `${definition.name} needs ${required} bytes of data, log has ${bytes.length}`,
        required,
        bytes.length
      );
    }

    return inputs.map((input, index) => this.toArgument(input, readSlot(bytes, index)));
  }

  private toArgument(input: ParameterDefinition, slot: Uint8Array): DecodedArgument {
    return {
      name: input.name,
      type: input.type,
      value: decodeSlot(input.type, slot, this.numericRange),
    };
  }
}
