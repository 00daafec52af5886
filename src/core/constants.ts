// Core constants and configuration defaults

export const SUPPORTED_REPLACEMENT_CHARACTERS = Object.freeze(['HYPHEN', 'COMMA', 'NOTHING'] as const);

export const SUPPORTED_OVER_LENGTH_BEHAVIORS = Object.freeze([
  'REFUSE',
  'WARN',
  'TRUNCATE',
  'DROP_VOWELS',
  'DO_NOTHING',
] as const);

export const DEFAULT_RENAME_CONFIG = {
  prefix: '',
  suffix: '',
  undescribed: 'Undescribed',
  replacementCharacter: 'HYPHEN' as const,
  removeTrailingNumbers: true,
  correctCaps: true,
  indexUnique: true,
  overLengthBehavior: 'WARN' as const,
  maxLength: 64,
  outputDirectory: '.',
  matchDirectory: false,
};

export const FILENAME_LIMITS = {
  /**
   * One less than the lowest maximum path length among the supported
   * platforms (Windows 260, Linux 255, macOS 1024).
   */
  OS_MAX_PATH: 254,
  /** Room for a " - 001" index plus two characters of description. */
  MINIMUM_PATH: 8,
  /** Preferred indexes above this are treated as no preference. */
  MAX_PREFERRED_INDEX: 299,
  /** Batches larger than this get three-digit indexes. */
  TWO_DIGIT_BATCH_LIMIT: 99,
};

/**
 * Characters refused in a filename on at least one major platform
 */
export const INVALID_FILENAME_CHARS = /[#%&{}\\<>?/$!'":@+`|=]/;

export const INDEX_SEPARATOR = ' - ';

export const PHOTO_FILE_EXTENSION = '.jpg';

export const REPROCESS_IDLE_DELAY = 1000;

export const ENV_VARIABLES = {
  PREFIX: 'PHOTO_RENAMER_PREFIX',
  SUFFIX: 'PHOTO_RENAMER_SUFFIX',
  UNDESCRIBED: 'PHOTO_RENAMER_UNDESCRIBED',
  REPLACEMENT: 'PHOTO_RENAMER_REPLACEMENT',
  REMOVE_TRAILING_NUMBERS: 'PHOTO_RENAMER_REMOVE_TRAILING_NUMBERS',
  CORRECT_CAPS: 'PHOTO_RENAMER_CORRECT_CAPS',
  INDEX_UNIQUE: 'PHOTO_RENAMER_INDEX_UNIQUE',
  OVER_LENGTH: 'PHOTO_RENAMER_OVER_LENGTH',
  MAX_LENGTH: 'PHOTO_RENAMER_MAX_LENGTH',
  OUTPUT_DIRECTORY: 'PHOTO_RENAMER_OUTPUT_DIRECTORY',
  MATCH_DIRECTORY: 'PHOTO_RENAMER_MATCH_DIRECTORY',
} as const;

export const LOG_LEVELS = {
  ERROR: 'ERROR',
  WARN: 'WARN',
  INFO: 'INFO',
  DEBUG: 'DEBUG',
} as const;
