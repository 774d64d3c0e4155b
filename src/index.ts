#!/usr/bin/env node
import { Command, Option } from 'commander';
import { loadConfig } from './config/index.js';
import { errorMessage } from './errors/index.js';
import { buildExpectedFiles, loadAllFiles, runPipeline } from './services/index.js';
import { createConsoleLogger, describeDateRange, isLogLevel, LOG_LEVELS } from './utils/index.js';
import { printProcessingSummary } from './writers/index.js';

interface RunOptions {
  config: string;
  dryRun?: boolean;
  overwrite?: boolean;
  logLevel: string;
}

interface InfoOptions {
  config: string;
  logLevel: string;
}

function fail(error: unknown): never {
  console.error(`\n❌ Error: ${errorMessage(error)}`);
  process.exit(1);
}

function logLevelOption(): Option {
  return new Option('--log-level <level>', 'Set logging level').choices(LOG_LEVELS).default('INFO');
}

const program = new Command();

program
  .name('metmerge')
  .description('Merge daily datalogger files into a continuous 30-minute series with WBGT heat-stress indicators')
  .version('1.0.0');

// RUN command - merge, derive and write outputs
program
  .command('run')
  .description('Merge daily files over the configured date range and write CSV, metadata and plots')
  .requiredOption('-c, --config <file>', 'Path to JSON or YAML configuration file')
  .option('--dry-run', 'Show what would be processed without actually running')
  .option('--overwrite', 'Overwrite existing output files')
  .addOption(logLevelOption())
  .action((options: RunOptions) => {
    try {
      const logger = createConsoleLogger(isLogLevel(options.logLevel) ? options.logLevel : 'INFO');
      const config = loadConfig(options.config);
      logger.info(`Loaded configuration from ${options.config}`);

      const result = runPipeline(config, {
        logger,
        dryRun: options.dryRun ?? false,
        overwrite: options.overwrite ?? false
      });

      if (result.status === 'dry-run') {
        console.log(`\n🔍 DRY RUN - Would process ${result.existing.length} files`);
        console.log(`   Missing ${result.missing.length} files`);
        console.log(`   Output files would be created in: ${config.outputDir}`);
        return;
      }

      printProcessingSummary(result.report);
      console.log('\n✅ Merge complete!');
    } catch (error) {
      fail(error);
    }
  });

// INFO command - show which daily files exist and what they contain
program
  .command('info')
  .description('List expected daily files for the configured range with their header and row counts')
  .requiredOption('-c, --config <file>', 'Path to JSON or YAML configuration file')
  .addOption(logLevelOption().default('WARNING'))
  .action((options: InfoOptions) => {
    try {
      const logger = createConsoleLogger(isLogLevel(options.logLevel) ? options.logLevel : 'WARNING');
      const config = loadConfig(options.config);
      const files = buildExpectedFiles(config.inputDir, config.range, config.filePrefix);

      console.log('\n📋 Daily File Summary');
      console.log(`  Input: ${config.inputDir}`);
      console.log(`  📅 Range: ${describeDateRange(config.range)} (${files.length} days)`);
      console.log('');

      let rows = 0;
      const { outcomes, counts } = loadAllFiles(files, logger);
      for (const outcome of outcomes) {
        const day = outcome.date.toFormat('yyyy-MM-dd');
        if (outcome.status === 'loaded') {
          rows += outcome.recordSet.rows.length;
          console.log(`  ✅ ${day}: ${outcome.header.columns.length} columns, ${outcome.recordSet.rows.length} rows`);
        } else if (outcome.status === 'missing') {
          console.log(`  ⚠️  ${day}: missing (${outcome.path})`);
        } else {
          console.log(`  ❌ ${day}: ${outcome.reason}`);
        }
      }

      console.log(`\n  📊 Loaded ${counts.loaded}, missing ${counts.missing}, failed ${counts.failed}`);
      console.log(`  📊 Total rows: ${rows}`);
    } catch (error) {
      fail(error);
    }
  });

program.parse();
