export type EntryKind = 'file' | 'folder';

/** One file or folder from the drive listing. */
export interface Entry {
  id: string;
  name: string;
  parentId?: string;
  mimeType: string;
  kind: EntryKind;
  createdTime?: string;
  modifiedTime?: string;
  lastModifyingUser?: string;
  trashedTime?: string;
  webViewLink?: string;
}

export interface ResolvedEntry extends Entry {
  /** Slash-joined ancestor names with a trailing slash, or `/` at the drive root. */
  path: string;
  /** URL of the parent folder. */
  location: string;
}

export type EntryIndex = ReadonlyMap<string, Entry>;

export type ReportColumn =
  | 'name'
  | 'createdTime'
  | 'modifiedTime'
  | 'lastModifyingUser'
  | 'path'
  | 'trashedTime';

export type ReportRow = Partial<Record<ReportColumn, string>>;

export type ReportGrid = string[][];

export type AuditOptions = {
  driveId: string;
  spreadsheetId: string;
  includeFolders: boolean;
  includeTrashed: boolean;
  separateSheet: boolean;
  rootFolderId?: string;
};

export type AuditSummary = {
  entryCount: number;
  rowCount: number;
  sheetName?: string;
  updatedCells: number;
};
