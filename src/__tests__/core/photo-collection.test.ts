import { ConsoleLogger } from '../../core/logger';
import { PhotoStatus } from '../../core/photo';
import { PhotoCollection } from '../../core/photo-collection';
import { ConfigurationSnapshot } from '../../core/rename-types';
import { RawPhotoRecord } from '../../types';

function snapshot(overrides: Partial<ConfigurationSnapshot> = {}): ConfigurationSnapshot {
  return {
    prefix: '',
    suffix: '',
    undescribed: 'Undescribed',
    replacementCharacter: 'HYPHEN',
    removeTrailingNumbers: true,
    correctCaps: true,
    indexUnique: true,
    overLengthBehavior: 'WARN',
    userMaxLength: 64,
    osMaxLength: 200,
    ...overrides,
  };
}

function records(...descriptions: string[]): RawPhotoRecord[] {
  return descriptions.map((description, i) => ({
    url: `https://example.com/photos/${i + 1}.jpg`,
    description,
    date: '2024-03-0' + (i + 1),
  }));
}

describe('PhotoCollection', () => {
  let collection: PhotoCollection;
  const config = snapshot();

  beforeEach(() => {
    collection = PhotoCollection.fromRecords(
      records('Beach 1', 'Beach 2', 'Sunset'),
      new ConsoleLogger('ERROR')
    );
    collection.processDescriptions(config);
  });

  it('should process every photo', () => {
    expect(collection.size).toBe(3);
    expect(collection.getPhotos().map((p) => p.description)).toEqual([
      'Beach - 01',
      'Beach - 02',
      'Sunset - 01',
    ]);
    expect(collection.getLastResult()?.worstStatus).toBe(PhotoStatus.READY);
    expect(collection.isExecutionBlocked()).toBe(false);
  });

  it('should reject an index outside the album', () => {
    expect(() => collection.getPhoto(3)).toThrow(RangeError);
  });

  describe('customizePhoto', () => {
    it('should accept valid custom text', () => {
      const status = collection.customizePhoto(2, 'Evening Sky', config);

      expect(status).toBe(PhotoStatus.READY);
      expect(collection.getPhoto(2).description).toBe('Evening Sky');
      expect(collection.getPhoto(2).customized).toBe(true);
      expect(collection.getPhoto(0).description).toBe('Beach - 01');
    });

    it('should refuse a duplicate of another description regardless of case', () => {
      const status = collection.customizePhoto(2, 'beach - 01', config);

      expect(status).toBe(PhotoStatus.REFUSE_DUPLICATE);
      expect(collection.isExecutionBlocked()).toBe(true);
      expect(collection.getLastResult()?.worstStatus).toBe(PhotoStatus.REFUSE_DUPLICATE);
    });

    it('should refuse invalid symbols', () => {
      expect(collection.customizePhoto(2, 'Sky: Evening', config)).toBe(PhotoStatus.REFUSE_SYMBOL);
    });

    it('should refuse text that is too short', () => {
      expect(collection.customizePhoto(2, 'Sky', config)).toBe(PhotoStatus.REFUSE_LENGTH);
    });

    it('should keep the most severe of several problems', () => {
      collection.customizePhoto(0, 'A:b test', config);

      expect(collection.customizePhoto(2, 'a:B test', config)).toBe(PhotoStatus.REFUSE_DUPLICATE);
    });

    it('should warn about text over the configured length', () => {
      const short = snapshot({ userMaxLength: 20 });

      expect(collection.customizePhoto(2, 'A very long custom description', short)).toBe(
        PhotoStatus.WARNING_LENGTH
      );
      expect(collection.isExecutionBlocked()).toBe(false);
    });

    it('should refuse over-length text when configured to refuse', () => {
      const refusing = snapshot({ userMaxLength: 20, overLengthBehavior: 'REFUSE' });

      expect(collection.customizePhoto(2, 'A very long custom description', refusing)).toBe(
        PhotoStatus.REFUSE_LENGTH
      );
    });
  });

  describe('names shared with a customized photo', () => {
    let pair: PhotoCollection;

    beforeEach(() => {
      pair = PhotoCollection.fromRecords(records('Beach', 'Beach'), new ConsoleLogger('ERROR'));
      pair.processDescriptions(config);
    });

    it('should refuse custom text that the next pass gives to another photo', () => {
      const status = pair.customizePhoto(0, 'Beach - 01', config);

      expect(pair.getPhoto(1).description).toBe('Beach - 01');
      expect(status).toBe(PhotoStatus.REFUSE_DUPLICATE);
      expect(pair.isExecutionBlocked()).toBe(true);
      expect(pair.getLastResult()?.worstStatus).toBe(PhotoStatus.REFUSE_DUPLICATE);
    });

    it('should refuse custom text once a configuration change produces the same name', () => {
      const album = PhotoCollection.fromRecords(records('Beach', 'Lake'), new ConsoleLogger('ERROR'));
      album.processDescriptions(config);
      expect(album.customizePhoto(1, 'Trip Beach', config)).toBe(PhotoStatus.READY);

      const worst = album.processDescriptions(snapshot({ prefix: 'Trip ', indexUnique: false }));

      expect(album.getPhoto(0).description).toBe('Trip Beach');
      expect(album.getPhoto(1).status).toBe(PhotoStatus.REFUSE_DUPLICATE);
      expect(worst).toBe(PhotoStatus.REFUSE_DUPLICATE);
      expect(album.isExecutionBlocked()).toBe(true);
    });

    it('should clear the refusal when the other photo is renamed', () => {
      pair.customizePhoto(0, 'Beach - 01', config);

      pair.customizePhoto(1, 'Beach At Dusk', config);

      expect(pair.getPhoto(0).status).toBe(PhotoStatus.READY);
      expect(pair.isExecutionBlocked()).toBe(false);
    });
  });

  it('should return a photo to automatic processing', () => {
    collection.customizePhoto(2, 'Sky: Evening', config);

    const worst = collection.unCustomizePhoto(2, config);

    expect(worst).toBe(PhotoStatus.READY);
    expect(collection.getPhoto(2).description).toBe('Sunset - 01');
    expect(collection.getPhoto(2).customized).toBe(false);
    expect(collection.isExecutionBlocked()).toBe(false);
  });

  describe('execution gate', () => {
    it('should block on errors but not on warnings', () => {
      collection.setPhotoStatus(0, PhotoStatus.WARNING_LENGTH);
      expect(collection.isExecutionBlocked()).toBe(false);

      collection.setPhotoStatus(0, PhotoStatus.ERROR_MINOR);
      expect(collection.isExecutionBlocked()).toBe(true);
    });

    it('should unblock once statuses are cleared', () => {
      collection.setPhotoStatus(1, PhotoStatus.ERROR_SEVERE);

      collection.clearAllStatuses();

      expect(collection.isExecutionBlocked()).toBe(false);
      expect(collection.getPhotos().every((p) => p.status === PhotoStatus.READY)).toBe(true);
    });

    it('should block when processing refuses a name', () => {
      const tiny = PhotoCollection.fromRecords(records('ab'), new ConsoleLogger('ERROR'));

      expect(tiny.processDescriptions(config)).toBe(PhotoStatus.REFUSE_LENGTH);
      expect(tiny.isExecutionBlocked()).toBe(true);
    });
  });

  it('should list the file name each photo would be saved under', () => {
    expect(collection.getNamingPlan()).toEqual([
      {
        sourceLocation: 'https://example.com/photos/1.jpg',
        fileName: 'Beach - 01.jpg',
        uploadDate: '2024-03-01',
        status: PhotoStatus.READY,
      },
      {
        sourceLocation: 'https://example.com/photos/2.jpg',
        fileName: 'Beach - 02.jpg',
        uploadDate: '2024-03-02',
        status: PhotoStatus.READY,
      },
      {
        sourceLocation: 'https://example.com/photos/3.jpg',
        fileName: 'Sunset - 01.jpg',
        uploadDate: '2024-03-03',
        status: PhotoStatus.READY,
      },
    ]);
  });
});
