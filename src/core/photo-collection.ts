// An album's photos together with the execution gate that guards downloading

import { Logger, RawPhotoRecord } from '../types';
import { BatchProcessor, BatchProcessorOptions, BatchProcessorResult } from './batch-processor';
import { FILENAME_LIMITS, PHOTO_FILE_EXTENSION } from './constants';
import { FilenameSanitizer } from './filename-sanitizer';
import { isAtLeastAsBadAs, Photo, PhotoStatus, worstStatus } from './photo';
import { ConfigurationSnapshot } from './rename-types';

export interface NamingPlanEntry {
  sourceLocation: string;
  fileName: string;
  uploadDate: string;
  status: PhotoStatus;
}

/**
 * The photos never change once the collection exists; only their
 * descriptions and statuses do. A new album means a new collection.
 */
export class PhotoCollection {
  private readonly photos: readonly Photo[];
  private readonly processor: BatchProcessor;
  private readonly logger: Logger;
  private executionBlocked = false;
  private lastResult?: BatchProcessorResult;

  constructor(photos: Photo[], logger: Logger, options: BatchProcessorOptions = {}) {
    this.photos = [...photos];
    this.logger = logger;
    this.processor = new BatchProcessor(logger, options);
  }

  static fromRecords(
    records: readonly RawPhotoRecord[],
    logger: Logger,
    options: BatchProcessorOptions = {}
  ): PhotoCollection {
    const photos = records.map((record) => new Photo(record.url, record.description, record.date));
    return new PhotoCollection(photos, logger, options);
  }

  get size(): number {
    return this.photos.length;
  }

  getPhoto(index: number): Photo {
    const photo = this.photos[index];
    if (!photo) {
      throw new RangeError(`No photo at index ${index}; the album has ${this.photos.length}`);
    }
    return photo;
  }

  getPhotos(): readonly Photo[] {
    return this.photos;
  }

  getLastResult(): BatchProcessorResult | undefined {
    return this.lastResult;
  }

  /**
   * Run a full naming pass and return the worst resulting status.
   * Customized photos are checked again afterwards, since the pass may have
   * given another photo the same name.
   */
  processDescriptions(config: ConfigurationSnapshot): PhotoStatus {
    const result = this.processor.process(this.photos, config);

    this.photos.forEach((photo, index) => {
      if (photo.customized) {
        photo.setStatus(this.validateCustomDescription(index, config));
      }
    });

    this.lastResult = {
      ...result,
      worstStatus: this.photos.reduce<PhotoStatus>((acc, photo) => worstStatus(acc, photo.status), PhotoStatus.READY),
    };
    this.checkData();
    return this.lastResult.worstStatus;
  }

  /**
   * Take a description typed by the user for one photo. The text is kept
   * as entered and the photo leaves automatic processing; its status
   * reflects whatever is wrong with the text.
   */
  customizePhoto(index: number, description: string, config: ConfigurationSnapshot): PhotoStatus {
    const photo = this.getPhoto(index);
    photo.customize(description);

    // Indexes of the remaining photos may depend on the batch as a whole
    this.processDescriptions(config);

    this.logger.debug(`Photo ${index + 1} customized`, { description, status: photo.status });
    return photo.status;
  }

  /**
   * Return a photo to automatic processing, then reprocess the batch
   */
  unCustomizePhoto(index: number, config: ConfigurationSnapshot): PhotoStatus {
    this.getPhoto(index).uncustomize();
    return this.processDescriptions(config);
  }

  /**
   * Record a download outcome for one photo
   */
  setPhotoStatus(index: number, status: PhotoStatus): void {
    this.getPhoto(index).setStatus(status);
    this.checkData();
  }

  /**
   * Reset every photo to READY before a download run
   */
  clearAllStatuses(): void {
    for (const photo of this.photos) {
      photo.setStatus(PhotoStatus.READY);
    }
    this.checkData();
  }

  isExecutionBlocked(): boolean {
    return this.executionBlocked;
  }

  getNamingPlan(): NamingPlanEntry[] {
    return this.photos.map((photo) => ({
      sourceLocation: photo.sourceLocation,
      fileName: photo.description + PHOTO_FILE_EXTENSION,
      uploadDate: photo.uploadDate,
      status: photo.status,
    }));
  }

  private validateCustomDescription(index: number, config: ConfigurationSnapshot): PhotoStatus {
    const description = this.getPhoto(index).description;
    const limit = Math.min(config.userMaxLength, config.osMaxLength);
    let status = PhotoStatus.READY;

    if (
      description.length > FILENAME_LIMITS.OS_MAX_PATH ||
      description.length < FILENAME_LIMITS.MINIMUM_PATH
    ) {
      status = PhotoStatus.REFUSE_LENGTH;
    } else if (description.length > limit) {
      if (config.overLengthBehavior === 'REFUSE') {
        status = PhotoStatus.REFUSE_LENGTH;
      } else if (config.overLengthBehavior !== 'DO_NOTHING') {
        status = PhotoStatus.WARNING_LENGTH;
      }
    }

    if (this.hasDuplicate(index)) {
      status = worstStatus(status, PhotoStatus.REFUSE_DUPLICATE);
    }
    if (FilenameSanitizer.containsInvalidCharacters(description)) {
      status = worstStatus(status, PhotoStatus.REFUSE_SYMBOL);
    }

    return status;
  }

  /**
   * Compares against the other photos' last committed descriptions
   */
  private hasDuplicate(index: number): boolean {
    const candidate = this.getPhoto(index).description.toLowerCase();
    return this.photos.some(
      (photo, other) => other !== index && photo.description.toLowerCase() === candidate
    );
  }

  /**
   * Block execution when any photo is at least as bad as ERROR_MINOR
   */
  private checkData(): void {
    this.executionBlocked = this.photos.some((photo) =>
      isAtLeastAsBadAs(photo.status, PhotoStatus.ERROR_MINOR)
    );
  }
}
