// Runs the naming pipeline over a whole album

import { Logger } from '../types';
import { FILENAME_LIMITS } from './constants';
import { DescriptionNormalizer } from './description-normalizer';
import { IndexAllocator } from './index-allocator';
import { Photo, PhotoStatus, worstStatus } from './photo';
import { ConfigurationSnapshot, IndexWidth, TreatedAffixes } from './rename-types';

export interface BatchProcessorOptions {
  /**
   * Called when treatment changed the prefix, suffix or fallback name, so a
   * configuration screen can show the stored values without reprocessing.
   */
  onAffixesTreated?: (affixes: TreatedAffixes) => void;
}

export interface BatchProcessorResult {
  /** Most severe status across the batch, never better than READY. */
  worstStatus: PhotoStatus;
  treatedAffixes: TreatedAffixes;
  processedPhotos: number;
  customizedPhotos: number;
  indexWidth: IndexWidth;
}

export function indexWidthFor(batchSize: number): IndexWidth {
  return batchSize > FILENAME_LIMITS.TWO_DIGIT_BATCH_LIMIT ? 3 : 2;
}

/**
 * Normalises every photo, then assigns indexes across the batch.
 *
 * A pass runs to completion synchronously and recomputes every
 * non-customized photo from its original description, so it can be
 * repeated whenever the configuration changes.
 */
export class BatchProcessor {
  private readonly logger: Logger;
  private readonly options: BatchProcessorOptions;

  constructor(logger: Logger, options: BatchProcessorOptions = {}) {
    this.logger = logger;
    this.options = options;
  }

  process(photos: readonly Photo[], config: ConfigurationSnapshot): BatchProcessorResult {
    const indexWidth = indexWidthFor(photos.length);
    const normalizer = new DescriptionNormalizer(config, photos.length);
    const allocator = new IndexAllocator(indexWidth);
    const treatedAffixes = normalizer.treatedAffixes;

    if (
      this.options.onAffixesTreated &&
      (treatedAffixes.prefix !== config.prefix ||
        treatedAffixes.suffix !== config.suffix ||
        treatedAffixes.undescribed !== config.undescribed)
    ) {
      this.options.onAffixesTreated(treatedAffixes);
    }

    let customizedPhotos = 0;
    for (const photo of photos) {
      if (photo.customized) {
        customizedPhotos++;
        continue;
      }
      normalizer.normalize(photo);
      allocator.registerPhoto(photo);
    }

    allocator.appendAllIndexes(config.indexUnique);

    const worst = photos.reduce((acc, photo) => worstStatus(acc, photo.status), PhotoStatus.READY);

    this.logger.debug(`Processed ${photos.length - customizedPhotos} photo descriptions`, {
      customizedPhotos,
      groups: allocator.groupCount,
      indexWidth,
      worstStatus: worst,
    });

    return {
      worstStatus: worst,
      treatedAffixes,
      processedPhotos: photos.length - customizedPhotos,
      customizedPhotos,
      indexWidth,
    };
  }
}
