// The albums named in one run, each processed against its own snapshot

import { Logger, RawPhotoRecord } from '../types';
import { BatchProcessorOptions } from './batch-processor';
import { NamingPlanEntry, PhotoCollection } from './photo-collection';
import { PhotoStatus, worstStatus } from './photo';
import { RenameConfigManager } from './rename-config-manager';
import { RenameConfig } from './rename-types';

interface Album {
  source: string;
  collection?: PhotoCollection;
  error?: string;
}

export interface AlbumPlan {
  source: string;
  outputDirectory: string;
  worstStatus: PhotoStatus;
  executionBlocked: boolean;
  error?: string;
  photos: NamingPlanEntry[];
}

/**
 * An album whose record file could not be read stays in the set as
 * ERROR_SEVERE, so the run as a whole cannot go ahead.
 */
export class AlbumSet {
  private readonly albums: Album[] = [];
  private readonly logger: Logger;
  private readonly options: BatchProcessorOptions;
  private config: RenameConfig;

  constructor(config: RenameConfig, logger: Logger, options: BatchProcessorOptions = {}) {
    this.config = config;
    this.logger = logger;
    this.options = options;
  }

  get size(): number {
    return this.albums.length;
  }

  getConfig(): RenameConfig {
    return this.config;
  }

  setConfig(config: RenameConfig): void {
    this.config = config;
  }

  addAlbum(source: string, records: readonly RawPhotoRecord[]): PhotoCollection {
    const collection = PhotoCollection.fromRecords(records, this.logger, this.options);
    this.albums.push({ source, collection });
    return collection;
  }

  addFailedAlbum(source: string, error: string): void {
    this.albums.push({ source, error });
  }

  getCollection(source: string): PhotoCollection | undefined {
    return this.albums.find((album) => album.source === source)?.collection;
  }

  outputDirectoryFor(source: string): string {
    return RenameConfigManager.outputDirectoryFor(this.config, source);
  }

  /**
   * Process every album and return the worst status across all of them
   */
  processAll(): PhotoStatus {
    let worst = PhotoStatus.READY;

    for (const album of this.albums) {
      const status = album.collection
        ? album.collection.processDescriptions(RenameConfigManager.createSnapshot(this.config, album.source))
        : PhotoStatus.ERROR_SEVERE;
      this.logger.debug('Album processed', { source: album.source, status });
      worst = worstStatus(worst, status);
    }

    return worst;
  }

  isExecutionBlocked(): boolean {
    return this.albums.some((album) => !album.collection || album.collection.isExecutionBlocked());
  }

  getPlans(): AlbumPlan[] {
    return this.albums.map((album) => {
      const outputDirectory = this.outputDirectoryFor(album.source);
      if (!album.collection) {
        return {
          source: album.source,
          outputDirectory,
          worstStatus: PhotoStatus.ERROR_SEVERE,
          executionBlocked: true,
          error: album.error,
          photos: [],
        };
      }
      return {
        source: album.source,
        outputDirectory,
        worstStatus: album.collection.getLastResult()?.worstStatus ?? PhotoStatus.READY,
        executionBlocked: album.collection.isExecutionBlocked(),
        photos: album.collection.getNamingPlan(),
      };
    });
  }
}
