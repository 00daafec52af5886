// Rename-specific types and interfaces

import { SUPPORTED_OVER_LENGTH_BEHAVIORS, SUPPORTED_REPLACEMENT_CHARACTERS } from './constants';

export type ReplacementCharacter = (typeof SUPPORTED_REPLACEMENT_CHARACTERS)[number];

export type OverLengthBehavior = (typeof SUPPORTED_OVER_LENGTH_BEHAVIORS)[number];

/**
 * User options as persisted between runs
 */
export interface RenameConfig {
  prefix: string;
  suffix: string;
  undescribed: string; // fallback name for photos without a description
  replacementCharacter: ReplacementCharacter;
  removeTrailingNumbers: boolean;
  correctCaps: boolean;
  indexUnique: boolean; // index descriptions that occur only once
  overLengthBehavior: OverLengthBehavior;
  maxLength: number;
  outputDirectory: string;
  matchDirectory: boolean; // save each album beside its record file
}

/**
 * Immutable view of the configuration taken before each processing pass.
 * `osMaxLength` is derived from the output directory's path length.
 */
export interface ConfigurationSnapshot {
  readonly prefix: string;
  readonly suffix: string;
  readonly undescribed: string;
  readonly replacementCharacter: ReplacementCharacter;
  readonly removeTrailingNumbers: boolean;
  readonly correctCaps: boolean;
  readonly indexUnique: boolean;
  readonly overLengthBehavior: OverLengthBehavior;
  readonly userMaxLength: number;
  readonly osMaxLength: number;
}

/**
 * Prefix, suffix and fallback text after invalid-character treatment
 */
export interface TreatedAffixes {
  prefix: string;
  suffix: string;
  undescribed: string;
}

/** Digits used to zero-pad an index. */
export type IndexWidth = 2 | 3;
