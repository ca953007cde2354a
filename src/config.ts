import { TxCodecError, TxCodecErrorCodes } from './errors.js';

export type OutputFormat = 'text' | 'json';

export interface CliConfig {
  format: OutputFormat;
  verbose: boolean;
}

export interface CliOptions {
  format?: string;
  verbose?: boolean;
}

export const DEFAULT_CONFIG: CliConfig = {
  format: 'text',
  verbose: false,
};

function parseFormat(value: string): OutputFormat {
  if (value === 'text' || value === 'json') {
    return value;
  }
  throw new TxCodecError(
    TxCodecErrorCodes.InvalidFormat,
    `Unknown output format: ${value}`,
    'expected text or json'
  );
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Resolve CLI settings: explicit options, then TXCODEC_* environment variables, then defaults
 */
export function resolveConfig(
  options: CliOptions = {},
  env: NodeJS.ProcessEnv = process.env
): CliConfig {
  const format = options.format ?? env.TXCODEC_FORMAT;
  return {
    format: format ? parseFormat(format) : DEFAULT_CONFIG.format,
    verbose: options.verbose ?? parseFlag(env.TXCODEC_VERBOSE) ?? DEFAULT_CONFIG.verbose,
  };
}
