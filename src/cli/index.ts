#!/usr/bin/env node

// CLI entry point
import { Command } from 'commander';
import { v4 as uuidv4 } from 'uuid';

import { AlbumSet } from '../core/album-set';
import { ErrorHandler, PhotoSourceError } from '../core/error-handler';
import { EnhancedLogger, parseLogLevel } from '../core/logger';
import { PhotoStatus } from '../core/photo';
import { RenameConfigManager } from '../core/rename-config-manager';
import { RenameConfig } from '../core/rename-types';
import { isPlanFormat, NamingPlanReporter, statusLabel, SUPPORTED_PLAN_FORMATS } from '../progress/naming-plan-reporter';
import { PhotoRecordReader } from '../services/local/photo-record-reader';
import { RenameCommandOptions, resolveConfig } from './options';

interface PlanCommandOptions extends RenameCommandOptions {
  format: string;
  logDir?: string;
  verbose?: boolean;
}

interface ConfigureCommandOptions extends RenameCommandOptions {
  save?: string;
}

function createLogger(verbose: boolean | undefined, logDir?: string): EnhancedLogger {
  return new EnhancedLogger({
    level: verbose ? 'DEBUG' : parseLogLevel(process.env.LOG_LEVEL, 'WARN'),
    sessionId: uuidv4(),
    ...(logDir !== undefined ? { enableFileLogging: true, logDirectory: logDir } : {}),
  });
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// Flags shared by the commands that build a configuration
function addRenameOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Start from a saved configuration file')
    .option('--prefix <text>', 'Text placed before every description')
    .option('--suffix <text>', 'Text placed after every description')
    .option('--undescribed <text>', 'Name used for photos without a description')
    .option('--replacement <character>', 'Stand-in for invalid characters (hyphen, comma, nothing)')
    .option('--remove-trailing-numbers', 'Strip numbers from the end of descriptions')
    .option('--no-remove-trailing-numbers', 'Keep numbers at the end of descriptions')
    .option('--correct-caps', 'Capitalise the first letter of every word')
    .option('--no-correct-caps', 'Leave capitalisation as written')
    .option('--index-unique', 'Index descriptions that occur only once')
    .option('--no-index-unique', 'Leave descriptions that occur only once without an index')
    .option(
      '--over-length <behavior>',
      'What to do with names that are too long (refuse, warn, truncate, drop-vowels, do-nothing)'
    )
    .option('--max-length <number>', 'Maximum file name length, index included')
    .option('--output-dir <directory>', 'Directory the photos will be saved to')
    .option('--match-directory', "Save each album in its record file's directory")
    .option('--no-match-directory', 'Save every album to the output directory');
}

function printConfigSummary(config: RenameConfig): void {
  console.log('⚙️  Rename Configuration');
  console.log('─'.repeat(60));
  for (const [key, value] of Object.entries(RenameConfigManager.getConfigSummary(config))) {
    console.log(`${key.padEnd(28)}${String(value)}`);
  }
  console.log('─'.repeat(60));
}

async function planCommand(records: string[], options: PlanCommandOptions): Promise<void> {
  const logger = createLogger(options.verbose, options.logDir);
  const errorHandler = new ErrorHandler(logger);

  try {
    if (!isPlanFormat(options.format)) {
      throw new Error(`Output format must be one of: ${SUPPORTED_PLAN_FORMATS.join(', ')}`);
    }
    const format = options.format;

    const albums: AlbumSet = new AlbumSet(await resolveConfig(options), logger.createChildLogger('batch'), {
      onAffixesTreated: (affixes) => {
        albums.setConfig(RenameConfigManager.applyTreatedAffixes(albums.getConfig(), affixes));
        logger.warn('Invalid characters were replaced in the prefix, suffix or undescribed name', affixes);
      },
    });
    const reader = new PhotoRecordReader(logger.createChildLogger('records'));

    // An unreadable file fails its own album; the others are still planned
    for (const source of records) {
      try {
        const { records: photoRecords } = await reader.readRecords(source);
        albums.addAlbum(source, photoRecords);
      } catch (error) {
        if (!(error instanceof PhotoSourceError)) throw error;
        const categorized = errorHandler.handleError(error, {
          operation: 'read_records',
          filePath: source,
          timestamp: new Date(),
        });
        console.error(`❌ ${categorized.userMessage}`);
        albums.addFailedAlbum(source, error.message);
      }
    }

    const worst = albums.processAll();
    console.log(NamingPlanReporter.renderAlbums(albums.getPlans(), format));

    if (albums.isExecutionBlocked()) {
      console.error(
        `❌ Some file names cannot be used (worst status: ${statusLabel(worst)}). Adjust the options and try again.`
      );
      process.exitCode = 1;
    } else if (worst === PhotoStatus.WARNING_LENGTH) {
      console.error('⚠️  Some file names are longer than the configured maximum length.');
    }
  } catch (error) {
    const categorized = errorHandler.handleError(toError(error), {
      operation: 'plan_names',
      filePath: records.join(', '),
      timestamp: new Date(),
    });
    console.error(`❌ ${categorized.userMessage}`);
    process.exitCode = 1;
  }
}

async function configureCommand(options: ConfigureCommandOptions): Promise<void> {
  const logger = createLogger(false);
  const errorHandler = new ErrorHandler(logger);

  try {
    const config = await resolveConfig(options);
    printConfigSummary(config);

    if (options.save) {
      await RenameConfigManager.saveConfigToFile(config, options.save);
      console.log(`✅ Configuration saved to ${options.save}`);
    }
  } catch (error) {
    const categorized = errorHandler.handleError(toError(error), {
      operation: 'configure',
      filePath: options.save ?? options.config,
      timestamp: new Date(),
    });
    console.error(`❌ ${categorized.userMessage}`);
    process.exitCode = 1;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('photo-renamer')
    .description('Turn photo descriptions into unique, file-system-safe file names')
    .version('1.0.0');

  addRenameOptions(
    program
      .command('plan')
      .description('Show the file name each photo would be saved under, album by album')
      .argument('<records...>', 'JSON files of { url, description, date } photo records, one per album')
  )
    .option('--format <format>', 'Output format (table, json, csv)', 'table')
    .option('--log-dir <directory>', 'Also write a JSON log file to this directory')
    .option('-v, --verbose', 'Log each processing step')
    .action(planCommand);

  addRenameOptions(
    program.command('configure').description('Show the resulting configuration and optionally save it')
  )
    .option('--save <file>', 'Save the configuration for future runs')
    .action(configureCommand);

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error('❌ Command failed:', toError(error).message);
      process.exitCode = 1;
    });
}
