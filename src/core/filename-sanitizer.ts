// Text helpers for turning descriptions into safe filename stems

import { INVALID_FILENAME_CHARS } from './constants';
import { ReplacementCharacter } from './rename-types';

const VOWELS = /[aeiou]/i;
const ALL_VOWELS = /[aeiou]/gi;

export interface ReplaceOptions {
  /** Trim leading and trailing whitespace afterwards. Defaults to true. */
  trim?: boolean;
}

export class FilenameSanitizer {
  /**
   * The text that stands in for each invalid character
   */
  static replacementFor(choice: ReplacementCharacter): string {
    switch (choice) {
      case 'HYPHEN':
        return '-';
      case 'COMMA':
        return ',';
      case 'NOTHING':
      default:
        return '';
    }
  }

  /**
   * Replace every invalid filename character one for one
   */
  static replaceInvalidCharacters(
    text: string,
    replacement: string,
    options: ReplaceOptions = {}
  ): string {
    const replaced = text.replace(new RegExp(INVALID_FILENAME_CHARS.source, 'g'), replacement);
    return options.trim === false ? replaced : replaced.trim();
  }

  static containsInvalidCharacters(text: string): boolean {
    return INVALID_FILENAME_CHARS.test(text);
  }

  /**
   * Reduce every run of two or more spaces to a single space
   */
  static collapseWhitespace(text: string): string {
    let collapsed = text;
    while (collapsed.includes('  ')) {
      collapsed = collapsed.replace(/ {2}/g, ' ');
    }
    return collapsed;
  }

  static containsVowel(text: string): boolean {
    return VOWELS.test(text);
  }

  static dropVowels(text: string): string {
    return text.replace(ALL_VOWELS, '');
  }

  /**
   * Remove `count` characters from the end; empty when nothing would remain
   */
  static truncateByCount(text: string, count: number): string {
    if (count >= text.length) {
      return '';
    }
    return text.substring(0, text.length - count);
  }
}
