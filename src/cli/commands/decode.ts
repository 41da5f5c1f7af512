import { Command } from 'commander';
import * as fs from 'node:fs';
import { loadConfigFile, resolveAbiText, toDecoderOptions } from '../config.js';
import { LensModule, drainSource } from '../../core/lens.js';
import { createLineSource } from '../../core/stream.js';
import { createLogger } from '../../utils/logger.js';
import { ABIError, ConfigError } from '../../utils/errors.js';

interface DecodeCommandOptions {
  config: string;
  input?: string;
  verbose: boolean;
}

/**
 * Create the decode command
 */
export function createDecodeCommand(): Command {
  const command = new Command('decode');

  command
    .description('Decode NDJSON event logs against the configured ABI and print NDJSON records')
    .option('-c, --config <path>', 'Path to configuration file', './log-lens.yaml')
    .option('-i, --input <path>', 'NDJSON file of log records (reads stdin when omitted)')
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action((options: DecodeCommandOptions) => {
      const logger = createLogger(options.verbose);

      try {
        logger.debug({ configPath: options.config }, 'Loading configuration');
        const config = loadConfigFile(options.config);
        const abi = resolveAbiText(config, options.config);

        const lens = new LensModule({ ...toDecoderOptions(config), logger });
        lens.setParam(JSON.stringify({ abi }));

        logger.debug({ input: options.input ?? 'stdin' }, 'Reading log records');
        const input = fs.readFileSync(options.input ?? 0, 'utf-8');

        const summary = drainSource(
          lens,
          createLineSource(input),
          (record) => {
            process.stdout.write(`${JSON.stringify(record)}\n`);
          },
          (message) => {
            logger.error({ error: message }, 'Failed to decode record');
          }
        );

        logger.info(summary, 'Decoding complete');
        process.exitCode = summary.errors > 0 ? 2 : 0;

      } catch (error) {
        if (error instanceof ConfigError) {
          logger.error({ error: error.message }, 'Configuration error');
          process.exitCode = 1;
        } else if (error instanceof ABIError) {
          logger.error({ error: error.message }, 'ABI error');
          process.exitCode = 4;
        } else {
          logger.error({
            error: error instanceof Error ? error.message : String(error),
          }, 'Unexpected error');
          process.exitCode = 1;
        }
      }
    });

  return command;
}
