// Read-only row/column projection of a photo collection for display

import { PhotoCollection } from './photo-collection';
import { PhotoStatus } from './photo';

export interface PhotoRow {
  row: number;
  status: PhotoStatus;
  description: string;
  customized: boolean;
  sourceLocation: string;
  uploadDate: string;
}

export const PHOTO_TABLE_COLUMNS = ['Status', 'Photo Descriptions', 'Customized', 'Source', 'Uploaded'] as const;

export type PhotoTableColumn = (typeof PHOTO_TABLE_COLUMNS)[number];

export class PhotoTableView {
  private readonly collection: PhotoCollection;

  constructor(collection: PhotoCollection) {
    this.collection = collection;
  }

  getRowCount(): number {
    return this.collection.size;
  }

  getColumnCount(): number {
    return PHOTO_TABLE_COLUMNS.length;
  }

  getColumnName(column: number): PhotoTableColumn {
    const name = PHOTO_TABLE_COLUMNS[column];
    if (name === undefined) {
      throw new RangeError(`No column at index ${column}`);
    }
    return name;
  }

  getValueAt(row: number, column: number): string | boolean {
    const photo = this.collection.getPhoto(row);
    switch (this.getColumnName(column)) {
      case 'Status':
        return photo.status;
      case 'Photo Descriptions':
        return photo.description;
      case 'Customized':
        return photo.customized;
      case 'Source':
        return photo.sourceLocation;
      case 'Uploaded':
        return photo.uploadDate;
    }
  }

  /** Only the description column accepts edits. */
  isCellEditable(column: number): boolean {
    return this.getColumnName(column) === 'Photo Descriptions';
  }

  getRows(): PhotoRow[] {
    return this.collection.getPhotos().map((photo, row) => ({
      row,
      status: photo.status,
      description: photo.description,
      customized: photo.customized,
      sourceLocation: photo.sourceLocation,
      uploadDate: photo.uploadDate,
    }));
  }
}
