// Turns command-line flags into a rename configuration

import { ConfigurationError } from '../core/error-handler';
import { RenameConfigManager } from '../core/rename-config-manager';
import {
  OverLengthBehavior,
  RenameConfig,
  ReplacementCharacter,
} from '../core/rename-types';
import { SUPPORTED_OVER_LENGTH_BEHAVIORS, SUPPORTED_REPLACEMENT_CHARACTERS } from '../core/constants';

/**
 * Flags shared by every command that builds a configuration. A flag left
 * out keeps the value from the configuration file or environment.
 */
export interface RenameCommandOptions {
  config?: string;
  prefix?: string;
  suffix?: string;
  undescribed?: string;
  replacement?: string;
  removeTrailingNumbers?: boolean;
  correctCaps?: boolean;
  indexUnique?: boolean;
  overLength?: string;
  maxLength?: string;
  outputDir?: string;
  matchDirectory?: boolean;
}

function parseReplacement(value: string): ReplacementCharacter {
  const upper = value.toUpperCase();
  const choice = SUPPORTED_REPLACEMENT_CHARACTERS.find((candidate) => candidate === upper);
  if (!choice) {
    throw new ConfigurationError('Invalid replacement character', [
      `Replacement character must be one of: ${SUPPORTED_REPLACEMENT_CHARACTERS.join(', ').toLowerCase()}`,
    ]);
  }
  return choice;
}

function parseOverLength(value: string): OverLengthBehavior {
  const normalized = value.toUpperCase().replace(/-/g, '_');
  const behavior = SUPPORTED_OVER_LENGTH_BEHAVIORS.find((candidate) => candidate === normalized);
  if (!behavior) {
    throw new ConfigurationError('Invalid over-length behavior', [
      `Over-length behavior must be one of: ${SUPPORTED_OVER_LENGTH_BEHAVIORS.join(', ')
        .toLowerCase()
        .replace(/_/g, '-')}`,
    ]);
  }
  return behavior;
}

function parseMaxLength(value: string): number {
  const maxLength = Number(value);
  if (!Number.isInteger(maxLength)) {
    throw new ConfigurationError('Invalid maximum length', ['Maximum length must be an integer']);
  }
  return maxLength;
}

/**
 * Lay the given flags over a base configuration
 */
export function applyCommandOptions(base: RenameConfig, options: RenameCommandOptions): RenameConfig {
  const config: RenameConfig = { ...base };

  if (options.prefix !== undefined) config.prefix = options.prefix;
  if (options.suffix !== undefined) config.suffix = options.suffix;
  if (options.undescribed !== undefined) config.undescribed = options.undescribed;
  if (options.replacement !== undefined) {
    config.replacementCharacter = parseReplacement(options.replacement);
  }
  if (options.removeTrailingNumbers !== undefined) {
    config.removeTrailingNumbers = options.removeTrailingNumbers;
  }
  if (options.correctCaps !== undefined) config.correctCaps = options.correctCaps;
  if (options.indexUnique !== undefined) config.indexUnique = options.indexUnique;
  if (options.overLength !== undefined) {
    config.overLengthBehavior = parseOverLength(options.overLength);
  }
  if (options.maxLength !== undefined) config.maxLength = parseMaxLength(options.maxLength);
  if (options.outputDir !== undefined) config.outputDirectory = options.outputDir;
  if (options.matchDirectory !== undefined) config.matchDirectory = options.matchDirectory;

  return config;
}

/**
 * Configuration file (or environment and defaults when there is none),
 * then flags; validated and with the output directory resolved.
 */
export async function resolveConfig(
  options: RenameCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<RenameConfig> {
  const base = options.config
    ? await RenameConfigManager.loadConfigFromFile(options.config)
    : RenameConfigManager.createFromEnv(env);

  const config = applyCommandOptions(base, options);
  const validation = RenameConfigManager.validateConfig(config);
  if (!validation.isValid) {
    throw new ConfigurationError('Invalid configuration', validation.errors);
  }

  return RenameConfigManager.sanitizeConfig(config);
}
