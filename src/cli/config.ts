import { z } from 'zod';
import * as yaml from 'yaml';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigError } from '../utils/errors.js';
import { readAbiFile } from '../abi/loader.js';
import type { DecoderOptions } from '../core/types.js';

// ABI source: a file path or the ABI text itself, never both
const AbiConfigSchema = z
  .object({
    path: z.string().min(1, 'ABI path must not be empty').optional(),
    inline: z.string().min(1, 'Inline ABI must not be empty').optional(),
  })
  .refine((abi) => (abi.path === undefined) !== (abi.inline === undefined), {
    message: 'Exactly one of abi.path or abi.inline is required',
  });

// Decoder configuration schema
const DecoderConfigSchema = z.object({
  numeric_range: z.enum(['uint256', 'uint128']).default('uint256'),
  topic_indexing: z.enum(['indexed', 'positional']).default('indexed'),
}).default({
  numeric_range: 'uint256',
  topic_indexing: 'indexed',
});

// Main config schema
const ConfigSchema = z.object({
  abi: AbiConfigSchema,
  decoder: DecoderConfigSchema,
});

// Export inferred type
export type Config = z.infer<typeof ConfigSchema>;
export type AbiConfig = z.infer<typeof AbiConfigSchema>;
export type DecoderConfig = z.infer<typeof DecoderConfigSchema>;

/**
 * Interpolates environment variables in a string using ${VAR_NAME} syntax
 * @throws ConfigError if a referenced environment variable is not set
 */
function interpolateEnvVars(str: string): string {
  return str.replace(/\$\{(\w+)\}/g, (_, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new ConfigError(
        `Environment variable ${varName} is not set. ` +
        `Please set it before running log-lens or remove it from the config.`
      );
    }
    return value;
  });
}

/**
 * Recursively interpolates environment variables in an object
 */
function interpolateObjectEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj);
  } else if (Array.isArray(obj)) {
    return obj.map(interpolateObjectEnvVars);
  } else if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateObjectEnvVars(value);
    }
    return result;
  }
  return obj;
}

/**
 * Parses and validates config from YAML content
 * @throws ConfigError if parsing or validation fails
 */
export function parseConfig(yamlContent: string): Config {
  let parsed: unknown;

  // Parse YAML
  try {
    parsed = yaml.parse(yamlContent);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse YAML configuration: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  if (!parsed || typeof parsed !== 'object') {
    throw new ConfigError('Configuration file is empty or invalid');
  }

  // Interpolate environment variables
  parsed = interpolateObjectEnvVars(parsed);

  // Validate with Zod schema
  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const issuePath = issue.path.join('.');
      return `  - ${issuePath ? issuePath + ': ' : ''}${issue.message}`;
    }).join('\n');

    throw new ConfigError(
      `Configuration validation failed:\n${issues}\n\n` +
      `Please check your config file and ensure all required fields are present and valid.`
    );
  }

  return result.data;
}

/**
 * Loads and parses config from a file
 * @throws ConfigError if file cannot be read or config is invalid
 */
export function loadConfigFile(filePath: string): Config {
  let content: string;

  // Read file
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new ConfigError(
        `Configuration file not found at path: ${filePath}\n` +
        `Please ensure the file exists and the path is correct.`
      );
    } else if (code === 'EACCES') {
      throw new ConfigError(
        `Permission denied when reading configuration file: ${filePath}\n` +
        `Please check file permissions.`
      );
    }
    throw new ConfigError(
      `Failed to read configuration file: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  // Parse config
  return parseConfig(content);
}

/**
 * Returns the ABI text a config points at. A relative abi.path resolves
 * against the directory of the config file.
 * @throws ABIError if the ABI file is missing or not JSON
 */
export function resolveAbiText(config: Config, configPath?: string): string {
  const { path: abiPath, inline } = config.abi;
  if (abiPath === undefined) {
    if (inline === undefined) {
      throw new ConfigError('Configuration has no ABI source');
    }
    return inline;
  }

  const baseDir = configPath ? path.dirname(configPath) : process.cwd();
  return readAbiFile(path.resolve(baseDir, abiPath));
}

export function toDecoderOptions(config: Config): DecoderOptions {
  return {
    numericRange: config.decoder.numeric_range,
    topicIndexing: config.decoder.topic_indexing,
  };
}
