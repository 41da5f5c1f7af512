import { EventDecoder } from '../abi/decoder.js';
import { ParameterStore } from '../abi/parameters.js';
import { MalformedInputError, NotConfiguredError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { lensParametersSchema, logRecordSchema } from '../utils/validation.js';
import type { DecoderOptions, LogRecord } from './types.js';
import type { LogSource } from './stream.js';

export type LensOutput =
  | { kind: 'record'; value: Record<string, unknown> }
  | { kind: 'nil' }
  | { kind: 'end' }
  | { kind: 'error'; message: string };

export interface LensModuleOptions extends DecoderOptions {
  store?: ParameterStore;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLogRecord(value: Record<string, unknown>): LogRecord {
  const result = logRecordSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new MalformedInputError(`Invalid log record field ${field}: ${issue.message}`, field);
  }
  return result.data;
}

/**
 * Host boundary of the decoder: configured once through setParam, then
 * driven record by record through transform.
 */
export class LensModule {
  private readonly store: ParameterStore;
  private readonly decoder: EventDecoder;
  private readonly logger?: Logger;

  constructor(options: LensModuleOptions = {}) {
    const { store, logger, ...decoderOptions } = options;
    this.store = store ?? new ParameterStore();
    this.logger = logger;
    this.decoder = new EventDecoder(decoderOptions, logger);
  }

  /**
   * Stores the parameters document `{"abi": "<abi text>"}`.
   * The ABI text itself is not checked until a record is decoded.
   * @throws NotConfiguredError when the payload is null
   * @throws MalformedInputError when the payload is not that document
   */
  setParam(payload: string | null): void {
    if (payload === null) {
      throw new NotConfiguredError();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch (error) {
      throw new MalformedInputError(
        `Parameters are not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const result = lensParametersSchema.safeParse(parsed);
    if (!result.success) {
      throw new MalformedInputError('Parameters must be an object with a string "abi" field', 'abi');
    }

    this.store.set(result.data.abi);
  }

  /**
   * Decodes one raw record against the stored ABI.
   * Returns the record itself when the ABI does not parse or no event
   * matches.
   */
  decode(value: unknown): Record<string, unknown> {
    const abi = this.store.get();

    if (!isRecord(value)) {
      throw new MalformedInputError('Log record must be a JSON object');
    }

    return this.decoder.decode(parseLogRecord(value), abi) ?? value;
  }

  /**
   * Pulls the next item from the source and decodes it. Failures come back
   * as an error output; nothing thrown escapes.
   */
  transform(source: LogSource): LensOutput {
    try {
      const item = source.next();
      switch (item.kind) {
        case 'none':
          return { kind: 'nil' };
        case 'end':
          return { kind: 'end' };
        case 'some':
          return { kind: 'record', value: this.decode(item.value) };
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.debug({ error: message }, 'Failed to transform record');
      return { kind: 'error', message };
    }
  }
}

export interface DrainSummary {
  records: number;
  nils: number;
  errors: number;
}

/**
 * Runs transform until the source reports end of stream
 */
export function drainSource(
  lens: LensModule,
  source: LogSource,
  onRecord: (record: Record<string, unknown>) => void,
  onError: (message: string) => void
): DrainSummary {
  const summary: DrainSummary = { records: 0, nils: 0, errors: 0 };

  for (;;) {
    const output = lens.transform(source);
    switch (output.kind) {
      case 'end':
        return summary;
      case 'nil':
        summary.nils++;
        break;
      case 'record':
        summary.records++;
        onRecord(output.value);
        break;
      case 'error':
        summary.errors++;
        onError(output.message);
        break;
    }
  }
}
