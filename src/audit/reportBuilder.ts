import type { ReportColumn, ReportGrid, ReportRow, ResolvedEntry } from './types';

export type ReportOptions = {
  includeFolders: boolean;
  rootFolderName?: string;
};

const BASE_COLUMNS: readonly ReportColumn[] = [
  'name',
  'createdTime',
  'modifiedTime',
  'lastModifyingUser',
  'path',
];

// Formula string literals escape a double quote by doubling it
function formulaString(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Cells are written as USER_ENTERED, so text that the sheet would parse as a
 * formula gets a leading apostrophe, which the sheet hides.
 */
export function literalText(value: string): string {
  return /^[=+\-@]/.test(value) ? `'${value}` : value;
}

export function hyperlink(url: string | undefined, label: string): string {
  if (!url) {
    return literalText(label);
  }
  return `=HYPERLINK(${formulaString(url)}, ${formulaString(label)})`;
}

/** `YYYY-MM-DD HH:MM:SS` in UTC; empty for missing or unparseable input. */
export function formatTimestamp(value: string | undefined): string {
  if (!value) {
    return '';
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return '';
  }
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function reportColumns(entries: readonly ResolvedEntry[]): ReportColumn[] {
  const hasTrashed = entries.some((entry) => entry.trashedTime !== undefined);
  return hasTrashed ? [...BASE_COLUMNS, 'trashedTime'] : [...BASE_COLUMNS];
}

export function selectEntries(
  entries: readonly ResolvedEntry[],
  options: ReportOptions
): ResolvedEntry[] {
  const { rootFolderName, includeFolders } = options;
  const rootPrefix = rootFolderName !== undefined ? `${rootFolderName}/` : undefined;

  return entries.filter((entry) => {
    if (rootPrefix !== undefined && !entry.path.startsWith(rootPrefix)) {
      return false;
    }
    return includeFolders || entry.kind !== 'folder';
  });
}

export function toReportRow(entry: ResolvedEntry): ReportRow {
  return {
    name: hyperlink(entry.webViewLink, entry.name),
    createdTime: formatTimestamp(entry.createdTime),
    modifiedTime: formatTimestamp(entry.modifiedTime),
    lastModifyingUser: literalText(entry.lastModifyingUser ?? ''),
    path: hyperlink(entry.location, entry.path),
    trashedTime: formatTimestamp(entry.trashedTime),
  };
}

export function buildReport(entries: readonly ResolvedEntry[], options: ReportOptions): ReportGrid {
  const columns = reportColumns(entries);
  const rows = selectEntries(entries, options).map(toReportRow);

  return [[...columns], ...rows.map((row) => columns.map((column) => row[column] ?? ''))];
}
