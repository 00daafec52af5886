import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_RENAME_CONFIG } from '../../core/constants';
import { ConfigurationError } from '../../core/error-handler';
import { RenameConfigManager } from '../../core/rename-config-manager';

describe('RenameConfigManager', () => {
  describe('Default Configuration', () => {
    it('should create default configuration', () => {
      const config = RenameConfigManager.createDefault();

      expect(config).toEqual(DEFAULT_RENAME_CONFIG);
      expect(config.undescribed).toBe('Undescribed');
      expect(config.replacementCharacter).toBe('HYPHEN');
      expect(config.overLengthBehavior).toBe('WARN');
      expect(config.maxLength).toBe(64);
      expect(config.removeTrailingNumbers).toBe(true);
      expect(config.correctCaps).toBe(true);
      expect(config.indexUnique).toBe(true);
    });

    it('should fill missing values from the defaults', () => {
      const config = RenameConfigManager.mergeWithDefaults({ prefix: 'Trip ', maxLength: 80 });

      expect(config.prefix).toBe('Trip ');
      expect(config.maxLength).toBe(80);
      expect(config.suffix).toBe('');
    });
  });

  describe('Environment', () => {
    it('should read values from environment variables', () => {
      const config = RenameConfigManager.createFromEnv({
        PHOTO_RENAMER_PREFIX: 'Trip ',
        PHOTO_RENAMER_REPLACEMENT: 'comma',
        PHOTO_RENAMER_MAX_LENGTH: '80',
        PHOTO_RENAMER_INDEX_UNIQUE: 'false',
        PHOTO_RENAMER_OVER_LENGTH: 'drop_vowels',
      });

      expect(config.prefix).toBe('Trip ');
      expect(config.replacementCharacter).toBe('COMMA');
      expect(config.maxLength).toBe(80);
      expect(config.indexUnique).toBe(false);
      expect(config.overLengthBehavior).toBe('DROP_VOWELS');
      expect(config.correctCaps).toBe(true);
    });

    it('should ignore unknown choices', () => {
      const config = RenameConfigManager.createFromEnv({
        PHOTO_RENAMER_REPLACEMENT: 'dash',
        PHOTO_RENAMER_OVER_LENGTH: 'shrink',
      });

      expect(config.replacementCharacter).toBe('HYPHEN');
      expect(config.overLengthBehavior).toBe('WARN');
    });
  });

  describe('Validation', () => {
    it('should accept the defaults', () => {
      expect(RenameConfigManager.validateConfig(RenameConfigManager.createDefault())).toEqual({
        isValid: true,
        errors: [],
      });
    });

    it('should bound the maximum length', () => {
      const base = RenameConfigManager.createDefault();

      expect(RenameConfigManager.validateConfig({ ...base, maxLength: 5 }).errors).toEqual([
        'Maximum length must be at least 8',
      ]);
      expect(RenameConfigManager.validateConfig({ ...base, maxLength: 300 }).errors).toEqual([
        'Maximum length cannot exceed 254',
      ]);
      expect(RenameConfigManager.validateConfig({ ...base, maxLength: 10.5 }).errors).toEqual([
        'Maximum length must be an integer',
      ]);
    });

    it('should check the output directory', () => {
      const base = RenameConfigManager.createDefault();

      expect(RenameConfigManager.validateConfig({ ...base, outputDirectory: ' ' }).errors).toEqual([
        'Output directory cannot be empty',
      ]);
      expect(
        RenameConfigManager.validateConfig({ ...base, outputDirectory: '/' + 'a'.repeat(250) }).errors
      ).toEqual(['Output directory path is too long to leave room for file names']);
    });
  });

  describe('Snapshots', () => {
    it('should derive the operating system limit from the output directory', () => {
      expect(RenameConfigManager.computeOsMaxLength('/photos')).toBe(247);
    });

    it('should freeze the values a pass reads', () => {
      const snapshot = RenameConfigManager.createSnapshot({
        ...RenameConfigManager.createDefault(),
        maxLength: 40,
        outputDirectory: '/photos',
      });

      expect(snapshot.userMaxLength).toBe(40);
      expect(snapshot.osMaxLength).toBe(247);
      expect(Object.isFrozen(snapshot)).toBe(true);
    });

    it('should take the limit from the record file directory when matching directories', () => {
      const config = {
        ...RenameConfigManager.createDefault(),
        outputDirectory: '/photos',
        matchDirectory: true,
      };

      expect(RenameConfigManager.outputDirectoryFor(config, '/albums/summer/records.json')).toBe(
        '/albums/summer'
      );
      expect(RenameConfigManager.createSnapshot(config, '/albums/summer/records.json').osMaxLength).toBe(
        240
      );
      expect(RenameConfigManager.outputDirectoryFor(config)).toBe('/photos');
    });

    it('should keep the output directory when not matching directories', () => {
      const config = { ...RenameConfigManager.createDefault(), outputDirectory: '/photos' };

      expect(RenameConfigManager.outputDirectoryFor(config, '/albums/summer/records.json')).toBe(
        '/photos'
      );
      expect(RenameConfigManager.createSnapshot(config, '/albums/summer/records.json').osMaxLength).toBe(
        247
      );
    });

    it('should read the directory match from the environment', () => {
      expect(
        RenameConfigManager.createFromEnv({ PHOTO_RENAMER_MATCH_DIRECTORY: 'true' }).matchDirectory
      ).toBe(true);
      expect(RenameConfigManager.createFromEnv({}).matchDirectory).toBe(false);
    });

    it('should store treated affixes', () => {
      const config = RenameConfigManager.applyTreatedAffixes(
        { ...RenameConfigManager.createDefault(), prefix: 'A/B ' },
        { prefix: 'A-B ', suffix: '', undescribed: 'Undescribed' }
      );

      expect(config.prefix).toBe('A-B ');
    });
  });

  describe('Sanitization', () => {
    it('should clamp the maximum length and resolve the output directory', () => {
      const config = RenameConfigManager.sanitizeConfig({
        ...RenameConfigManager.createDefault(),
        maxLength: 500,
      });

      expect(config.maxLength).toBe(254);
      expect(config.outputDirectory).toBe(process.cwd());
    });
  });

  describe('Import and Export', () => {
    it('should import a partial configuration', () => {
      const config = RenameConfigManager.importConfig('{"suffix": " 2024", "correctCaps": false}');

      expect(config.suffix).toBe(' 2024');
      expect(config.correctCaps).toBe(false);
      expect(config.maxLength).toBe(64);
    });

    it('should report every value of the wrong type', () => {
      let caught: unknown;
      try {
        RenameConfigManager.importConfig(
          '{"prefix": 3, "maxLength": "long", "replacementCharacter": "DASH"}'
        );
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught instanceof ConfigurationError && caught.errors).toEqual([
        'prefix must be a string',
        'maxLength must be a number',
        'replacementCharacter must be one of: HYPHEN, COMMA, NOTHING',
      ]);
    });

    it('should reject malformed JSON', () => {
      expect(() => RenameConfigManager.importConfig('not json')).toThrow('Invalid configuration JSON');
      expect(() => RenameConfigManager.importConfig('[]')).toThrow(
        'Invalid configuration JSON: expected an object'
      );
    });

    it('should save and load a configuration file', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'photo-renamer-config-'));
      const filePath = path.join(dir, 'nested', 'config.json');
      const config = { ...RenameConfigManager.createDefault(), prefix: 'Trip ', overLengthBehavior: 'TRUNCATE' as const };

      try {
        await RenameConfigManager.saveConfigToFile(config, filePath);
        await expect(RenameConfigManager.loadConfigFromFile(filePath)).resolves.toEqual(config);
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });

    it('should fail to load a missing file', async () => {
      await expect(
        RenameConfigManager.loadConfigFromFile(path.join(os.tmpdir(), 'photo-renamer-missing.json'))
      ).rejects.toThrow('Failed to load configuration');
    });
  });

  it('should summarise the configuration for display', () => {
    const summary = RenameConfigManager.getConfigSummary(RenameConfigManager.createDefault());

    expect(summary.Prefix).toBe('(none)');
    expect(summary['Over-Length Behavior']).toBe('WARN');
    expect(summary['Maximum Length']).toBe(64);
  });
});
