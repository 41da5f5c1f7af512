// Export core types
export type * from './core/types.js';

// Export lens module and stream sources
export { LensModule, drainSource } from './core/lens.js';
export type { LensModuleOptions, LensOutput, DrainSummary } from './core/lens.js';
export { createLineSource, createArraySource } from './core/stream.js';
export type { LogSource, StreamItem } from './core/stream.js';
export { assembleOutput } from './core/assembler.js';

// Export ABI utilities
export { ParameterStore } from './abi/parameters.js';
export type { LensParameters } from './abi/parameters.js';
export { parseEventDefinitions } from './abi/definitions.js';
export {
  canonicalSignature,
  signatureHash,
  matchEvent,
  describeEvents,
} from './abi/signature.js';
export type { EventDescription } from './abi/signature.js';
export { SLOT_SIZE, hexToBytes, readSlot, readTopic, decodeSlot } from './abi/slots.js';
export { EventDecoder } from './abi/decoder.js';
export { readAbiFile } from './abi/loader.js';

// Export configuration
export {
  parseConfig,
  loadConfigFile,
  resolveAbiText,
  toDecoderOptions,
} from './cli/config.js';
export type { Config, AbiConfig, DecoderConfig } from './cli/config.js';

// Export logger
export { createLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';

// Export errors
export {
  LogLensError,
  NotConfiguredError,
  OutOfBoundsError,
  MalformedInputError,
  ConfigError,
  ABIError,
} from './utils/errors.js';
