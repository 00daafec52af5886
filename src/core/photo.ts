// Photo record and status model

import { FILENAME_LIMITS } from './constants';

/**
 * Readiness or failure state of a photo. Declared in order of severity,
 * best to worst.
 */
export enum PhotoStatus {
  /** Written to the file system. */
  SAVED = 'saved',
  /** Default, starting state. */
  READY = 'ready',
  WARNING_LENGTH = 'warning_length',
  ERROR_MINOR = 'error_minor',
  REFUSE_LENGTH = 'refuse_length',
  /** Description contains an invalid symbol. */
  REFUSE_SYMBOL = 'refuse_symbol',
  /** Description duplicates another photo's. */
  REFUSE_DUPLICATE = 'refuse_duplicate',
  /** Error writing to or modifying the file. */
  ERROR_SEVERE = 'error_severe',
}

const STATUS_SEVERITY: readonly PhotoStatus[] = [
  PhotoStatus.SAVED,
  PhotoStatus.READY,
  PhotoStatus.WARNING_LENGTH,
  PhotoStatus.ERROR_MINOR,
  PhotoStatus.REFUSE_LENGTH,
  PhotoStatus.REFUSE_SYMBOL,
  PhotoStatus.REFUSE_DUPLICATE,
  PhotoStatus.ERROR_SEVERE,
];

export function isWorseThan(status: PhotoStatus, other: PhotoStatus): boolean {
  return STATUS_SEVERITY.indexOf(status) > STATUS_SEVERITY.indexOf(other);
}

export function isAtLeastAsBadAs(status: PhotoStatus, other: PhotoStatus): boolean {
  return status === other || isWorseThan(status, other);
}

/**
 * The more severe of two statuses; `a` on a tie
 */
export function worstStatus(a: PhotoStatus, b: PhotoStatus): PhotoStatus {
  return isWorseThan(b, a) ? b : a;
}

/**
 * A photo within an album, carrying its working filename candidate
 */
export class Photo {
  readonly sourceLocation: string;
  readonly originalDescription: string;
  readonly uploadDate: string;
  /** Index hinted by the original description, or -1. */
  readonly preferredIndex: number;

  status: PhotoStatus = PhotoStatus.READY;
  description: string;
  customized = false;
  /** Index given by the last allocation, or -1 when none was appended. */
  assignedIndex = -1;

  constructor(sourceLocation: string, originalDescription: string, uploadDate: string) {
    this.sourceLocation = sourceLocation;
    this.originalDescription = originalDescription;
    this.uploadDate = uploadDate;
    this.description = originalDescription;
    this.preferredIndex = Photo.parsePreferredIndex(originalDescription);
  }

  /**
   * Reads a trailing "(N)" or, failing that, a trailing bare "N" from a
   * description. Values above the preferred-index ceiling count as absent.
   */
  static parsePreferredIndex(description: string): number {
    const match = /\((\d+)\)$/.exec(description) ?? /(\d+)$/.exec(description);
    if (!match) {
      return -1;
    }

    const value = parseInt(match[1], 10);
    return value > FILENAME_LIMITS.MAX_PREFERRED_INDEX ? -1 : value;
  }

  setStatus(status: PhotoStatus): void {
    this.status = status;
  }

  setDescription(description: string): void {
    this.description = description;
  }

  /**
   * Replace the description with user text, exempting it from processing
   */
  customize(description: string): void {
    this.description = description;
    this.customized = true;
    this.assignedIndex = -1;
  }

  uncustomize(): void {
    this.customized = false;
  }
}
