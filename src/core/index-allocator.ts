// Sequential index assignment across photos sharing a description

import { INDEX_SEPARATOR } from './constants';
import { Photo } from './photo';
import { IndexWidth } from './rename-types';

export function formatIndex(index: number, width: IndexWidth): string {
  return INDEX_SEPARATOR + String(index).padStart(width, '0');
}

/**
 * Photos registered under one description, split by whether they can
 * still get the index they prefer
 */
class DescriptionGroup {
  private readonly withPreference = new Map<number, Photo>();
  private readonly noPreference: Photo[] = [];

  register(photo: Photo): void {
    if (photo.preferredIndex >= 0 && !this.withPreference.has(photo.preferredIndex)) {
      this.withPreference.set(photo.preferredIndex, photo);
    } else {
      this.noPreference.push(photo);
    }
  }

  get size(): number {
    return this.withPreference.size + this.noPreference.length;
  }

  /**
   * Work out each member's index, in [1, size]
   */
  allocate(): Map<Photo, number> {
    const assigned = new Map<Photo, number>();
    const totalPhotos = this.size;
    let currentIndex = 1;
    let nextNoPreference = 0;

    // Honour preferences while there are photos without one to fill the gaps
    while (currentIndex <= totalPhotos) {
      const preferred = this.withPreference.get(currentIndex);
      if (preferred) {
        assigned.set(preferred, currentIndex);
      } else if (nextNoPreference < this.noPreference.length) {
        assigned.set(this.noPreference[nextNoPreference], currentIndex);
        nextNoPreference++;
      } else {
        break;
      }
      currentIndex++;
    }

    // Whatever still waits for its preference takes the next index in line
    const remaining = [...this.withPreference.entries()]
      .filter(([, photo]) => !assigned.has(photo))
      .sort(([a], [b]) => a - b);

    for (const [, photo] of remaining) {
      assigned.set(photo, currentIndex);
      currentIndex++;
    }

    return assigned;
  }
}

/**
 * Collects photos by case-insensitive description, then appends a unique,
 * gap-free index to every member of each group. Registration must be
 * complete before indexes are appended.
 */
export class IndexAllocator {
  private readonly groups = new Map<string, DescriptionGroup>();
  private readonly width: IndexWidth;
  private committed = false;

  constructor(width: IndexWidth) {
    this.width = width;
  }

  registerPhoto(photo: Photo): void {
    if (this.committed) {
      throw new Error('Indexes have already been appended; create a new allocator for another pass');
    }

    const key = photo.description.toLowerCase();
    let group = this.groups.get(key);
    if (!group) {
      group = new DescriptionGroup();
      this.groups.set(key, group);
    }
    group.register(photo);
  }

  get groupCount(): number {
    return this.groups.size;
  }

  /**
   * Append the allocated index to every registered description. A group of
   * one is left bare unless `indexUnique` is set.
   */
  appendAllIndexes(indexUnique: boolean): void {
    this.committed = true;

    for (const group of this.groups.values()) {
      if (!indexUnique && group.size === 1) {
        continue;
      }

      for (const [photo, index] of group.allocate()) {
        photo.setDescription(photo.description + formatIndex(index, this.width));
        photo.assignedIndex = index;
      }
    }
  }
}
