import type { Logger } from 'pino';
import { AuditError } from '../errors';
import type { DriveLister } from '../google/driveLister';
import { auditSheetTitle, type SheetPublisher } from '../google/sheetPublisher';
import { buildEntryIndex, findFolderName, resolveEntries } from './pathResolver';
import { buildReport } from './reportBuilder';
import type { AuditOptions, AuditSummary } from './types';

type DriveListerLike = Pick<DriveLister, 'listEntries' | 'getDriveName'>;
type SheetPublisherLike = Pick<SheetPublisher, 'ensureSheet' | 'publish'>;

export class DriveAuditor {
  constructor(
    private readonly lister: DriveListerLike,
    private readonly publisher: SheetPublisherLike,
    private readonly logger: Logger
  ) {}

  async run(options: AuditOptions): Promise<AuditSummary> {
    const { driveId, spreadsheetId, rootFolderId } = options;

    const entries = await this.lister.listEntries({
      driveId,
      includeTrashed: options.includeTrashed,
    });

    const index = buildEntryIndex(entries);
    const resolved = resolveEntries(entries, index, {
      onCycle: (entry, ancestry) => {
        this.logger.warn(
          { driveId, id: entry.id, name: entry.name, partialPath: ancestry.names },
          'Parent chain loops back on itself; path truncated'
        );
      },
    });

    let rootFolderName: string | undefined;
    if (rootFolderId !== undefined) {
      rootFolderName = findFolderName(index, rootFolderId);
      if (rootFolderName === undefined) {
        throw new AuditError(`Root folder ${rootFolderId} is not a folder in drive ${driveId}`);
      }
    }

    let sheetName: string | undefined;
    if (options.separateSheet) {
      const driveName = await this.lister.getDriveName(driveId);
      sheetName = await this.publisher.ensureSheet(auditSheetTitle(driveName, rootFolderName));
    }

    const grid = buildReport(resolved, {
      includeFolders: options.includeFolders,
      rootFolderName,
    });
    const rowCount = grid.length - 1;
    this.logger.info({ driveId, spreadsheetId, rowCount, sheetName }, 'Built report');
    if (rootFolderName !== undefined && rowCount === 0) {
      // only top-level folders match by path prefix
      this.logger.warn(
        { driveId, rootFolderId, rootFolderName },
        'Root folder scope matched no rows; the sheet will only hold the header'
      );
    }

    const updatedCells = await this.publisher.publish(grid, sheetName);

    return {
      entryCount: entries.length,
      rowCount,
      sheetName,
      updatedCells,
    };
  }
}
