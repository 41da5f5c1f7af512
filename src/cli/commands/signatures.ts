import { Command } from 'commander';
import { loadConfigFile, resolveAbiText } from '../config.js';
import { describeEvents } from '../../abi/signature.js';
import { createLogger } from '../../utils/logger.js';
import { ABIError, ConfigError } from '../../utils/errors.js';

interface SignaturesCommandOptions {
  config: string;
  verbose: boolean;
}

/**
 * Create the signatures command
 */
export function createSignaturesCommand(): Command {
  const command = new Command('signatures');

  command
    .description('List the canonical signature and topic hash of every event in the ABI')
    .option('-c, --config <path>', 'Path to configuration file', './log-lens.yaml')
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action((options: SignaturesCommandOptions) => {
      const logger = createLogger(options.verbose);

      try {
        const config = loadConfigFile(options.config);
        const events = describeEvents(resolveAbiText(config, options.config));

        if (events.length === 0) {
          logger.warn('No event definitions found in the ABI');
        }

        for (const event of events) {
          console.log(`${event.topic}  ${event.signature}`);
        }

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
