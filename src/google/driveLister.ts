import type { drive_v3 } from 'googleapis';
import type { Logger } from 'pino';
import type { Entry } from '../audit/types';
import { callRemote } from '../errors';

export const DEFAULT_PAGE_SIZE = 1000;

const LIST_FIELDS =
  'nextPageToken, files(id, mimeType, name, createdTime, modifiedTime, lastModifyingUser(displayName), trashedTime, webViewLink, parents)';

type DriveListerOptions = {
  drive: drive_v3.Drive;
  logger: Logger;
  pageSize?: number;
};

export type ListEntriesOptions = {
  driveId: string;
  includeTrashed: boolean;
};

// API fields come back as `string | null | undefined`
const optional = (value: string | null | undefined): string | undefined => value ?? undefined;

export function toEntry(file: drive_v3.Schema$File): Entry | undefined {
  if (!file.id) {
    return undefined;
  }
  const mimeType = file.mimeType ?? '';
  return {
    id: file.id,
    name: file.name ?? '',
    parentId: optional(file.parents?.[0]),
    mimeType,
    kind: mimeType.includes('folder') ? 'folder' : 'file',
    createdTime: optional(file.createdTime),
    modifiedTime: optional(file.modifiedTime),
    lastModifyingUser: optional(file.lastModifyingUser?.displayName),
    trashedTime: optional(file.trashedTime),
    webViewLink: optional(file.webViewLink),
  };
}

export class DriveLister {
  private readonly pageSize: number;

  constructor(private readonly options: DriveListerOptions) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  private get drive(): drive_v3.Drive {
    return this.options.drive;
  }

  private get logger(): Logger {
    return this.options.logger;
  }

  async listEntries({ driveId, includeTrashed }: ListEntriesOptions): Promise<Entry[]> {
    const entries: Entry[] = [];
    let pageToken: string | undefined;
    let page = 0;

    do {
      const params: drive_v3.Params$Resource$Files$List = {
        corpora: 'drive',
        driveId,
        fields: LIST_FIELDS,
        includeItemsFromAllDrives: true,
        pageSize: this.pageSize,
        supportsAllDrives: true,
        ...(includeTrashed ? {} : { q: 'trashed = false' }),
        ...(pageToken ? { pageToken } : {}),
      };

      const response = await callRemote(this.logger, 'files.list', { driveId, page }, () =>
        this.drive.files.list(params)
      );

      for (const file of response.data.files ?? []) {
        const entry = toEntry(file);
        if (!entry) {
          this.logger.warn({ driveId, file }, 'Skipping item without id');
          continue;
        }
        entries.push(entry);
      }

      pageToken = optional(response.data.nextPageToken);
      page += 1;
      this.logger.debug({ driveId, page, total: entries.length, hasMore: Boolean(pageToken) }, 'Fetched page');
    } while (pageToken);

    this.logger.info({ driveId, total: entries.length }, 'Found files');
    return entries;
  }

  async getDriveName(driveId: string): Promise<string> {
    const response = await callRemote(this.logger, 'drives.get', { driveId }, () =>
      this.drive.drives.get({ driveId, fields: 'name' })
    );
    return response.data.name ?? driveId;
  }
}
