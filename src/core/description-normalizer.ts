// Per-photo transformation of an original description into a filename stem

import { FILENAME_LIMITS } from './constants';
import { FilenameSanitizer } from './filename-sanitizer';
import { Photo, PhotoStatus } from './photo';
import { ConfigurationSnapshot, TreatedAffixes } from './rename-types';

export interface NormalizationResult {
  /** Prefix, description and suffix joined, without an index. */
  description: string;
  status: PhotoStatus;
  /** Length including the room reserved for the index. */
  totalLength: number;
}

/** Characters reserved for " - NN" or " - NNN". */
export function indexSuffixWidthFor(batchSize: number): 5 | 6 {
  return batchSize > FILENAME_LIMITS.TWO_DIGIT_BATCH_LIMIT ? 6 : 5;
}

/**
 * Applies the configured naming rules to one description at a time.
 * Built once per pass; the treated affixes are shared by every photo.
 */
export class DescriptionNormalizer {
  private readonly config: ConfigurationSnapshot;
  private readonly replacement: string;
  private readonly indexSuffixWidth: number;
  readonly treatedAffixes: TreatedAffixes;

  constructor(config: ConfigurationSnapshot, batchSize: number) {
    this.config = config;
    this.replacement = FilenameSanitizer.replacementFor(config.replacementCharacter);
    this.indexSuffixWidth = indexSuffixWidthFor(batchSize);
    this.treatedAffixes = DescriptionNormalizer.treatAffixes(config);
  }

  /**
   * Remove invalid characters from the prefix, suffix and fallback name.
   * Edge spaces are kept: a prefix usually ends with one.
   */
  static treatAffixes(config: ConfigurationSnapshot): TreatedAffixes {
    const replacement = FilenameSanitizer.replacementFor(config.replacementCharacter);
    const treat = (text: string): string => {
      const replaced = FilenameSanitizer.replaceInvalidCharacters(text, replacement, { trim: false });
      return config.replacementCharacter === 'NOTHING'
        ? FilenameSanitizer.collapseWhitespace(replaced)
        : replaced;
    };

    return {
      prefix: treat(config.prefix),
      suffix: treat(config.suffix),
      undescribed: treat(config.undescribed),
    };
  }

  /**
   * Strip a bare trailing number first, then a parenthetical one, so that
   * "Bathroom 4 (51)" loses only the "(51)".
   */
  static removeTrailingNumbers(text: string): string {
    return text.replace(/[0-9]+$/, '').replace(/ *\([0-9]+\)$/, '');
  }

  /**
   * Lower-case everything, then capitalise the first character and every
   * letter that follows a space
   */
  static correctCapitalization(text: string): string {
    if (text.length === 0) {
      return text;
    }

    const lower = text.toLowerCase();
    const capitalized = lower.charAt(0).toUpperCase() + lower.substring(1);
    return capitalized.replace(/ ([a-z])/g, (_match, letter: string) => ` ${letter.toUpperCase()}`);
  }

  /**
   * Normalise a photo in place. Customized photos are left untouched.
   */
  normalize(photo: Photo): void {
    if (photo.customized) {
      return;
    }

    const result = this.normalizeText(photo.originalDescription);
    photo.setDescription(result.description);
    photo.setStatus(result.status);
    photo.assignedIndex = -1;
  }

  normalizeText(originalDescription: string): NormalizationResult {
    const config = this.config;
    let prefix = this.treatedAffixes.prefix;
    let suffix = this.treatedAffixes.suffix;
    let description = originalDescription;

    if (config.removeTrailingNumbers) {
      description = DescriptionNormalizer.removeTrailingNumbers(description);
    }

    if (config.correctCaps) {
      description = DescriptionNormalizer.correctCapitalization(description);
    }

    description = FilenameSanitizer.replaceInvalidCharacters(description, this.replacement);
    if (config.replacementCharacter === 'NOTHING') {
      description = FilenameSanitizer.collapseWhitespace(description);
    }

    // After the other steps, so that "   " also falls back
    if (description.length === 0) {
      description = this.treatedAffixes.undescribed;
    }

    const measure = (): number =>
      prefix.length + description.length + suffix.length + this.indexSuffixWidth;
    const limit = Math.min(config.userMaxLength, config.osMaxLength);
    let totalLength = measure();

    shortening: while (totalLength > limit) {
      const overflow = totalLength - limit;

      switch (config.overLengthBehavior) {
        case 'DROP_VOWELS':
          if (FilenameSanitizer.containsVowel(description)) {
            description = FilenameSanitizer.dropVowels(description);
            break;
          }
          if (FilenameSanitizer.containsVowel(suffix)) {
            suffix = FilenameSanitizer.dropVowels(suffix);
            break;
          }
          if (FilenameSanitizer.containsVowel(prefix)) {
            prefix = FilenameSanitizer.dropVowels(prefix);
            break;
          }
        // falls through: nothing left to disemvowel
        case 'TRUNCATE':
          if (description.length > 0) {
            description = FilenameSanitizer.truncateByCount(description, overflow);
          } else if (suffix.length > 0) {
            suffix = FilenameSanitizer.truncateByCount(suffix, overflow);
          } else if (prefix.length > 0) {
            prefix = FilenameSanitizer.truncateByCount(prefix, overflow);
          } else {
            break shortening;
          }
          break;
        case 'REFUSE':
        case 'WARN':
        case 'DO_NOTHING':
        default:
          break shortening;
      }

      totalLength = measure();
    }

    return {
      description: prefix + description + suffix,
      status: this.determineStatus(totalLength, limit),
      totalLength,
    };
  }

  private determineStatus(totalLength: number, limit: number): PhotoStatus {
    const behavior = this.config.overLengthBehavior;

    if (totalLength > FILENAME_LIMITS.OS_MAX_PATH) {
      return PhotoStatus.REFUSE_LENGTH;
    }
    if (totalLength > limit && behavior === 'REFUSE') {
      return PhotoStatus.REFUSE_LENGTH;
    }
    if (totalLength > limit && behavior !== 'DO_NOTHING') {
      return PhotoStatus.WARNING_LENGTH;
    }
    if (totalLength < FILENAME_LIMITS.MINIMUM_PATH) {
      return PhotoStatus.REFUSE_LENGTH;
    }
    return PhotoStatus.READY;
  }
}
