// Rename configuration management: defaults, environment, files and snapshots

import * as fs from 'fs';
import * as path from 'path';
import { ConfigValidationResult } from '../types';
import {
  DEFAULT_RENAME_CONFIG,
  ENV_VARIABLES,
  FILENAME_LIMITS,
  SUPPORTED_OVER_LENGTH_BEHAVIORS,
  SUPPORTED_REPLACEMENT_CHARACTERS,
} from './constants';
import { ConfigurationError } from './error-handler';
import {
  ConfigurationSnapshot,
  OverLengthBehavior,
  RenameConfig,
  ReplacementCharacter,
  TreatedAffixes,
} from './rename-types';

function isReplacementCharacter(value: unknown): value is ReplacementCharacter {
  return SUPPORTED_REPLACEMENT_CHARACTERS.some((choice) => choice === value);
}

function isOverLengthBehavior(value: unknown): value is OverLengthBehavior {
  return SUPPORTED_OVER_LENGTH_BEHAVIORS.some((behavior) => behavior === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.trim().toLowerCase() === 'true';
}

export class RenameConfigManager {
  static createDefault(): RenameConfig {
    return { ...DEFAULT_RENAME_CONFIG };
  }

  /**
   * Create configuration from PHOTO_RENAMER_* environment variables
   */
  static createFromEnv(env: NodeJS.ProcessEnv = process.env): RenameConfig {
    const defaults = RenameConfigManager.createDefault();
    const replacement = env[ENV_VARIABLES.REPLACEMENT]?.toUpperCase();
    const overLength = env[ENV_VARIABLES.OVER_LENGTH]?.toUpperCase();
    const maxLength = env[ENV_VARIABLES.MAX_LENGTH];

    return {
      prefix: env[ENV_VARIABLES.PREFIX] ?? defaults.prefix,
      suffix: env[ENV_VARIABLES.SUFFIX] ?? defaults.suffix,
      undescribed: env[ENV_VARIABLES.UNDESCRIBED] || defaults.undescribed,
      replacementCharacter: isReplacementCharacter(replacement)
        ? replacement
        : defaults.replacementCharacter,
      removeTrailingNumbers:
        parseBoolean(env[ENV_VARIABLES.REMOVE_TRAILING_NUMBERS]) ?? defaults.removeTrailingNumbers,
      correctCaps: parseBoolean(env[ENV_VARIABLES.CORRECT_CAPS]) ?? defaults.correctCaps,
      indexUnique: parseBoolean(env[ENV_VARIABLES.INDEX_UNIQUE]) ?? defaults.indexUnique,
      overLengthBehavior: isOverLengthBehavior(overLength) ? overLength : defaults.overLengthBehavior,
      maxLength: maxLength ? parseInt(maxLength, 10) : defaults.maxLength,
      outputDirectory: env[ENV_VARIABLES.OUTPUT_DIRECTORY] || defaults.outputDirectory,
      matchDirectory: parseBoolean(env[ENV_VARIABLES.MATCH_DIRECTORY]) ?? defaults.matchDirectory,
    };
  }

  /**
   * Merge user configuration with defaults
   */
  static mergeWithDefaults(userConfig: Partial<RenameConfig>): RenameConfig {
    return {
      ...RenameConfigManager.createDefault(),
      ...userConfig,
    };
  }

  static validateConfig(config: RenameConfig): ConfigValidationResult {
    const errors: string[] = [];

    if (!isReplacementCharacter(config.replacementCharacter)) {
      errors.push(`Replacement character must be one of: ${SUPPORTED_REPLACEMENT_CHARACTERS.join(', ')}`);
    }

    if (!isOverLengthBehavior(config.overLengthBehavior)) {
      errors.push(`Over-length behavior must be one of: ${SUPPORTED_OVER_LENGTH_BEHAVIORS.join(', ')}`);
    }

    if (!Number.isInteger(config.maxLength)) {
      errors.push('Maximum length must be an integer');
    } else if (config.maxLength < FILENAME_LIMITS.MINIMUM_PATH) {
      errors.push(`Maximum length must be at least ${FILENAME_LIMITS.MINIMUM_PATH}`);
    } else if (config.maxLength > FILENAME_LIMITS.OS_MAX_PATH) {
      errors.push(`Maximum length cannot exceed ${FILENAME_LIMITS.OS_MAX_PATH}`);
    }

    if (!config.outputDirectory || config.outputDirectory.trim().length === 0) {
      errors.push('Output directory cannot be empty');
    } else if (RenameConfigManager.computeOsMaxLength(config.outputDirectory) < FILENAME_LIMITS.MINIMUM_PATH) {
      errors.push('Output directory path is too long to leave room for file names');
    }

    return {
      isValid: errors.length === 0,
      errors,
    };
  }

  /**
   * Clamp numeric values and fall back to defaults for unknown choices
   */
  static sanitizeConfig(config: RenameConfig): RenameConfig {
    const defaults = RenameConfigManager.createDefault();
    const maxLength = Number.isFinite(config.maxLength) ? Math.floor(config.maxLength) : defaults.maxLength;

    return {
      ...config,
      outputDirectory: path.resolve(config.outputDirectory.trim() || defaults.outputDirectory),
      maxLength: Math.max(FILENAME_LIMITS.MINIMUM_PATH, Math.min(FILENAME_LIMITS.OS_MAX_PATH, maxLength)),
      replacementCharacter: isReplacementCharacter(config.replacementCharacter)
        ? config.replacementCharacter
        : defaults.replacementCharacter,
      overLengthBehavior: isOverLengthBehavior(config.overLengthBehavior)
        ? config.overLengthBehavior
        : defaults.overLengthBehavior,
    };
  }

  /**
   * Room left for a file name once the output directory's path is counted
   */
  static computeOsMaxLength(outputDirectory: string): number {
    return FILENAME_LIMITS.OS_MAX_PATH - path.resolve(outputDirectory).length;
  }

  /**
   * Where an album read from `sourcePath` will be saved
   */
  static outputDirectoryFor(config: RenameConfig, sourcePath?: string): string {
    if (config.matchDirectory && sourcePath !== undefined) {
      return path.dirname(path.resolve(sourcePath));
    }
    return config.outputDirectory;
  }

  /**
   * Freeze the values a processing pass reads. With `matchDirectory`, the
   * operating system limit depends on the album's own directory.
   */
  static createSnapshot(config: RenameConfig, sourcePath?: string): ConfigurationSnapshot {
    return Object.freeze({
      prefix: config.prefix,
      suffix: config.suffix,
      undescribed: config.undescribed,
      replacementCharacter: config.replacementCharacter,
      removeTrailingNumbers: config.removeTrailingNumbers,
      correctCaps: config.correctCaps,
      indexUnique: config.indexUnique,
      overLengthBehavior: config.overLengthBehavior,
      userMaxLength: config.maxLength,
      osMaxLength: RenameConfigManager.computeOsMaxLength(
        RenameConfigManager.outputDirectoryFor(config, sourcePath)
      ),
    });
  }

  /**
   * Store the treated prefix, suffix and fallback name. The result equals
   * what the next pass would produce anyway, so no reprocessing is needed.
   */
  static applyTreatedAffixes(config: RenameConfig, affixes: TreatedAffixes): RenameConfig {
    return {
      ...config,
      prefix: affixes.prefix,
      suffix: affixes.suffix,
      undescribed: affixes.undescribed,
    };
  }

  static getConfigSummary(config: RenameConfig): Record<string, string | number | boolean> {
    return {
      Prefix: config.prefix || '(none)',
      Suffix: config.suffix || '(none)',
      'Undescribed Name': config.undescribed,
      'Replacement Character': config.replacementCharacter,
      'Remove Trailing Numbers': config.removeTrailingNumbers,
      'Correct Capitalization': config.correctCaps,
      'Index Unique Descriptions': config.indexUnique,
      'Over-Length Behavior': config.overLengthBehavior,
      'Maximum Length': config.maxLength,
      'Output Directory': config.outputDirectory,
      'Save Beside Record File': config.matchDirectory,
    };
  }

  static exportConfig(config: RenameConfig): string {
    return JSON.stringify(config, null, 2);
  }

  /**
   * Import configuration from a JSON string. Unknown keys are ignored;
   * known keys of the wrong type are reported.
   */
  static importConfig(configJson: string): RenameConfig {
    let parsed: unknown;
    try {
      parsed = JSON.parse(configJson);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid configuration JSON: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError('Invalid configuration JSON: expected an object');
    }

    const errors: string[] = [];
    const userConfig: Partial<RenameConfig> = {};

    for (const key of ['prefix', 'suffix', 'undescribed', 'outputDirectory'] as const) {
      const value = parsed[key];
      if (typeof value === 'string') {
        userConfig[key] = value;
      } else if (value !== undefined) {
        errors.push(`${key} must be a string`);
      }
    }

    for (const key of ['removeTrailingNumbers', 'correctCaps', 'indexUnique', 'matchDirectory'] as const) {
      const value = parsed[key];
      if (typeof value === 'boolean') {
        userConfig[key] = value;
      } else if (value !== undefined) {
        errors.push(`${key} must be a boolean`);
      }
    }

    if (typeof parsed.maxLength === 'number') {
      userConfig.maxLength = parsed.maxLength;
    } else if (parsed.maxLength !== undefined) {
      errors.push('maxLength must be a number');
    }

    if (isReplacementCharacter(parsed.replacementCharacter)) {
      userConfig.replacementCharacter = parsed.replacementCharacter;
    } else if (parsed.replacementCharacter !== undefined) {
      errors.push(`replacementCharacter must be one of: ${SUPPORTED_REPLACEMENT_CHARACTERS.join(', ')}`);
    }

    if (isOverLengthBehavior(parsed.overLengthBehavior)) {
      userConfig.overLengthBehavior = parsed.overLengthBehavior;
    } else if (parsed.overLengthBehavior !== undefined) {
      errors.push(`overLengthBehavior must be one of: ${SUPPORTED_OVER_LENGTH_BEHAVIORS.join(', ')}`);
    }

    if (errors.length > 0) {
      throw new ConfigurationError('Invalid configuration values', errors);
    }

    return RenameConfigManager.mergeWithDefaults(userConfig);
  }

  static async saveConfigToFile(config: RenameConfig, filePath: string): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(filePath, RenameConfigManager.exportConfig(config), 'utf8');
    } catch (error) {
      throw new ConfigurationError(
        `Failed to save configuration: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  static async loadConfigFromFile(filePath: string): Promise<RenameConfig> {
    let configJson: string;
    try {
      configJson = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load configuration: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
    return RenameConfigManager.importConfig(configJson);
  }
}
