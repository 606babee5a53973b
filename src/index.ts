#!/usr/bin/env node
/**
 * Main entry point for the abandon call analysis
 */
import { parseArgs } from 'node:util';
import { logger, LogLevel, parseLogLevel } from './utils/index.js';
import { AbandonAnalysisProcessor } from './processors/abandonAnalysisProcessor.js';
import { env } from './config/env.js';

async function main() {
  const { values: args } = parseArgs({
    options: {
      acd: {
        type: 'string',
      },
      calls: {
        type: 'string',
      },
      output: {
        type: 'string',
      },
      report: {
        type: 'string',
      },
      'skip-json': {
        type: 'boolean',
      },
      verbose: {
        type: 'boolean',
      },
      help: {
        type: 'boolean',
      },
    },
  });

  if (args.help) {
    showHelp();
    return;
  }

  logger.setLevel(args.verbose ? LogLevel.DEBUG : parseLogLevel(env.logLevel));

  const acdSource = args.acd ?? env.acdLogSource;
  const callSource = args.calls ?? env.callLogSource;
  const outputDir = args.output ?? env.outputDir;
  const reportFilename = args.report ?? env.reportFilename;

  const separator = '='.repeat(60);
  logger.info(`\n${separator}`);
  logger.info('ABANDON CALL ANALYSIS');
  logger.info(separator);
  logger.info(`ACD log: ${acdSource}`);
  logger.info(`CALL log: ${callSource ?? '(none)'}`);
  logger.info(`Output directory: ${outputDir}`);
  logger.info(`Report file: ${reportFilename}`);
  logger.info(`${separator}\n`);

  try {
    const processor = new AbandonAnalysisProcessor({ httpTimeoutMs: env.httpTimeoutMs });

    const stats = await processor.run({
      acdSource,
      callSource,
      outputDir,
      reportFilename,
      writeJson: env.writeJsonSummary && !args['skip-json'],
    });

    if (stats.failedChecks > 0) {
      logger.warn(`\nCompleted with ${String(stats.failedChecks)} failed consistency checks`);
      process.exit(1);
    } else {
      logger.success('\nAnalysis complete!');
      process.exit(0);
    }
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('\nFatal error:', err.message);
    if (args.verbose && err.stack) {
      logger.error(err.stack);
    }
    process.exit(1);
  }
}

function showHelp() {
  console.log(`
Abandon Call Analysis

Usage:
  npm start                      Analyze the logs configured in .env
  npm start -- [options]         Analyze with specific options

Options:
  --acd <source>                 ACD log (.xlsx, .xls, .csv or http(s) CSV URL)
  --calls <source>               CALL details log (optional)
  --output <dir>                 Output directory
  --report <file>                Workbook filename
  --skip-json                    Do not write the JSON dump
  --verbose                      Enable verbose logging
  --help                         Show this help message

Examples:
  # Analyze one day of logs
  npm start -- --acd "data/ACD_18_Aug.xlsx" --calls "data/CALL_Details_18_Aug.xlsx"

  # ACD log only, verbose
  npm start -- --acd data/acd.csv --verbose

Environment Variables:
  See .env.example for the available settings

Output:
  ${env.outputDir}/${env.reportFilename} with sheets:
  - KPI Standard, Initial Abandon Report, Recovery Details
  - Final Phone Status, Team Leader Assignment, Daily Row Format
`);
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
