// Reads photo records exported from an album archive as JSON

import * as fs from 'fs/promises';
import { Logger, RawPhotoRecord, Result } from '../../types';
import { PhotoSourceError } from '../../core/error-handler';

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

export interface RecordReadSummary {
  records: RawPhotoRecord[];
  skipped: number;
}

/**
 * Loads an array of `{ url, description, date }` objects. A bad entry is
 * skipped with a warning so one broken photo does not cost the album.
 */
export class PhotoRecordReader {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async readRecords(filePath: string): Promise<RecordReadSummary> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new PhotoSourceError(
        `Photo record file is missing or unreadable: ${error instanceof Error ? error.message : 'Unknown error'}`,
        filePath
      );
    }

    return this.parseRecords(content, filePath);
  }

  parseRecords(content: string, source = '<input>'): RecordReadSummary {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new PhotoSourceError(
        `Photo record file is not valid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
        source
      );
    }

    if (!Array.isArray(parsed)) {
      throw new PhotoSourceError('Photo record file must contain a JSON array', source);
    }

    const records: RawPhotoRecord[] = [];
    let skipped = 0;

    parsed.forEach((entry: unknown, position: number) => {
      const result = PhotoRecordReader.parseRecord(entry);
      if (result.success) {
        records.push(result.data);
      } else {
        skipped++;
        this.logger.warn(`Skipping photo record ${position + 1}: ${result.error}`, { source });
      }
    });

    if (records.length === 0) {
      throw new PhotoSourceError('No usable photo records were found', source);
    }

    this.logger.info(`Read ${records.length} photo records`, { source, skipped });
    return { records, skipped };
  }

  static parseRecord(entry: unknown): Result<RawPhotoRecord, string> {
    if (typeof entry !== 'object' || entry === null) {
      return { success: false, error: 'not an object' };
    }

    const url = 'url' in entry ? entry.url : undefined;
    const description = 'description' in entry ? entry.description : undefined;
    const date = 'date' in entry ? entry.date : undefined;

    if (typeof url !== 'string' || !isValidUrl(url)) {
      return { success: false, error: `invalid photo URL "${String(url)}"` };
    }
    if (typeof description !== 'string') {
      return { success: false, error: 'missing description' };
    }
    if (typeof date !== 'string') {
      return { success: false, error: 'missing upload date' };
    }

    return { success: true, data: { url, description, date } };
  }
}
