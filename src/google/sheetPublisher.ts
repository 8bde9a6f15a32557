import type { sheets_v4 } from 'googleapis';
import type { Logger } from 'pino';
import type { ReportGrid } from '../audit/types';
import { callRemote } from '../errors';

export const REPORT_COLUMNS_RANGE = 'A:ZZ';

type SheetPublisherOptions = {
  sheets: sheets_v4.Sheets;
  logger: Logger;
  spreadsheetId: string;
};

/** A1 range over the report columns, scoped to a tab when one is named. */
export function reportRange(sheetName?: string): string {
  if (sheetName === undefined) {
    return REPORT_COLUMNS_RANGE;
  }
  return `'${sheetName.replace(/'/g, "''")}'!${REPORT_COLUMNS_RANGE}`;
}

export function auditSheetTitle(driveName: string, rootFolderName?: string): string {
  return rootFolderName ? `${driveName}/${rootFolderName}` : driveName;
}

export class SheetPublisher {
  constructor(private readonly options: SheetPublisherOptions) {}

  private get sheets(): sheets_v4.Sheets {
    return this.options.sheets;
  }

  private get spreadsheetId(): string {
    return this.options.spreadsheetId;
  }

  async ensureSheet(title: string): Promise<string> {
    const { logger } = this.options;
    const spreadsheetId = this.spreadsheetId;

    const response = await callRemote(logger, 'spreadsheets.get', { spreadsheetId }, () =>
      this.sheets.spreadsheets.get({ spreadsheetId, fields: 'sheets.properties.title' })
    );
    const titles = (response.data.sheets ?? []).map((sheet) => sheet.properties?.title);

    if (titles.includes(title)) {
      logger.debug({ spreadsheetId, title }, 'Sheet already exists');
      return title;
    }

    await callRemote(logger, 'spreadsheets.batchUpdate', { spreadsheetId, title }, () =>
      this.sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: [{ addSheet: { properties: { title } } }],
        },
      })
    );
    logger.info({ spreadsheetId, title }, 'Created sheet');
    return title;
  }

  async publish(grid: ReportGrid, sheetName?: string): Promise<number> {
    const { logger } = this.options;
    const spreadsheetId = this.spreadsheetId;
    const range = reportRange(sheetName);

    await callRemote(logger, 'values.clear', { spreadsheetId, range }, () =>
      this.sheets.spreadsheets.values.clear({ spreadsheetId, range })
    );
    logger.info({ spreadsheetId, range }, 'Cleared sheet');

    const response = await callRemote(logger, 'values.update', { spreadsheetId, range }, () =>
      this.sheets.spreadsheets.values.update({
        spreadsheetId,
        range,
        // formulas in the grid must be evaluated, not stored as text
        valueInputOption: 'USER_ENTERED',
        requestBody: {
          values: grid,
        },
      })
    );

    const updatedCells = response.data.updatedCells ?? 0;
    logger.info({ spreadsheetId, range, updatedCells }, 'Wrote cells to sheet');
    return updatedCells;
  }
}
