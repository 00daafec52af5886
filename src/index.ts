// Main entry point for the photo renamer library

// Export all types and interfaces
export * from './types';
export * from './core';
export * from './services/local/photo-record-reader';
export * from './progress';

// Re-export commonly used types for convenience
export type {
  RenameConfig,
  ConfigurationSnapshot,
  TreatedAffixes,
  ReplacementCharacter,
  OverLengthBehavior,
} from './core/rename-types';

export {
  DEFAULT_RENAME_CONFIG,
  FILENAME_LIMITS,
  SUPPORTED_REPLACEMENT_CHARACTERS,
  SUPPORTED_OVER_LENGTH_BEHAVIORS,
} from './core/constants';
