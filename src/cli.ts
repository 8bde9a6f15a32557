import { randomUUID } from 'crypto';
import { Command } from 'commander';
import type { Logger } from 'pino';
import { DriveAuditor } from './audit/driveAuditor';
import { loadConfig, logLevels, type LogLevel } from './config';
import { RemoteCallError } from './errors';
import { getDriveClient, getSheetsClient } from './google/auth';
import { DriveLister } from './google/driveLister';
import { SheetPublisher } from './google/sheetPublisher';
import { buildLogger, createLogger } from './logger';

export type CliOptions = {
  verbose?: boolean;
  logfile?: string;
  folders?: boolean;
  trashed?: boolean;
  sheet?: boolean;
  root?: string;
};

/** `-v` only ever lowers the threshold to info; a configured debug level stays. */
export function resolveLogLevel(verbose: boolean, configured: LogLevel): LogLevel {
  if (verbose && logLevels.indexOf(configured) > logLevels.indexOf('info')) {
    return 'info';
  }
  return configured;
}

export async function runAudit(
  credentialsPath: string,
  driveId: string,
  spreadsheetId: string,
  options: CliOptions,
  logger: Logger
): Promise<void> {
  const config = loadConfig();
  const auditor = new DriveAuditor(
    new DriveLister({
      drive: getDriveClient(credentialsPath),
      logger,
      pageSize: config.DRIVE_PAGE_SIZE,
    }),
    new SheetPublisher({
      sheets: getSheetsClient(credentialsPath),
      logger,
      spreadsheetId,
    }),
    logger
  );

  logger.info({ driveId }, `Starting file audit on drive ${driveId}`);
  const start = performance.now();

  const summary = await auditor.run({
    driveId,
    spreadsheetId,
    includeFolders: Boolean(options.folders),
    includeTrashed: Boolean(options.trashed),
    separateSheet: Boolean(options.sheet),
    rootFolderId: options.root,
  });

  const seconds = ((performance.now() - start) / 1000).toFixed(2);
  logger.info({ driveId, ...summary, seconds }, `File audit complete on drive ${driveId} in ${seconds} seconds`);
}

export function createProgram(): Command {
  return new Command()
    .name('drive-audit')
    .description('Google Shared Drive file audit')
    .argument('<credentials>', 'Service Account Credentials JSON File')
    .argument('<drive>', 'Google Shared Drive ID')
    .argument('<sheet>', 'Output Google Sheet ID')
    .option('-v, --verbose', 'Enable more verbose logging')
    .option('-l, --logfile <path>', 'Specify log file location')
    .option('-f, --folders', 'List folders as well as files')
    .option('-t, --trashed', 'List trashed items')
    .option('-s, --sheet', 'Output to separate sheet in spreadsheet')
    .option('-r, --root <folderId>', 'Specify root folder for output')
    .action(async (credentialsPath: string, driveId: string, spreadsheetId: string, options: CliOptions) => {
      let logger: Logger;
      try {
        logger = createLogger(
          randomUUID(),
          buildLogger({
            level: resolveLogLevel(Boolean(options.verbose), loadConfig().LOG_LEVEL),
            logFile: options.logfile,
          })
        );
      } catch (error) {
        console.error('Cannot open log destination:', error);
        process.exit(1);
      }

      try {
        await runAudit(credentialsPath, driveId, spreadsheetId, options, logger);
      } catch (error) {
        // remote failures are logged where they happen
        if (!(error instanceof RemoteCallError)) {
          logger.error({ err: error }, 'File audit failed');
        }
        process.exit(1);
      }
    });
}
