import type { Entry, EntryIndex, ResolvedEntry } from './types';

export const ROOT_PATH = '/';

export function folderUrl(folderId: string): string {
  return `https://drive.google.com/drive/folders/${folderId}`;
}

export function buildEntryIndex(entries: readonly Entry[]): EntryIndex {
  return new Map(entries.map((entry) => [entry.id, entry]));
}

export type Ancestry = {
  /** Ancestor names from the top of the indexed chain down to the immediate parent. */
  names: string[];
  cyclic: boolean;
};

export function resolveAncestry(entry: Entry, index: EntryIndex): Ancestry {
  const names: string[] = [];
  const visited = new Set<string>([entry.id]);
  let parentId = entry.parentId;

  while (parentId !== undefined) {
    const parent = index.get(parentId);
    if (!parent) {
      break;
    }
    if (visited.has(parent.id)) {
      return { names: names.reverse(), cyclic: true };
    }
    visited.add(parent.id);
    names.push(parent.name);
    parentId = parent.parentId;
  }

  return { names: names.reverse(), cyclic: false };
}

function joinPath(names: readonly string[]): string {
  if (names.length === 0) {
    return ROOT_PATH;
  }
  return names.map((name) => `${name}/`).join('');
}

export function resolvePath(entry: Entry, index: EntryIndex): string {
  return joinPath(resolveAncestry(entry, index).names);
}

export type ResolveListener = {
  onCycle?: (entry: Entry, ancestry: Ancestry) => void;
};

export function resolveEntries(
  entries: readonly Entry[],
  index: EntryIndex,
  listener: ResolveListener = {}
): ResolvedEntry[] {
  return entries.map((entry) => {
    const ancestry = resolveAncestry(entry, index);
    if (ancestry.cyclic) {
      listener.onCycle?.(entry, ancestry);
    }
    return {
      ...entry,
      path: joinPath(ancestry.names),
      location: entry.parentId ? folderUrl(entry.parentId) : '',
    };
  });
}

export function findFolderName(index: EntryIndex, folderId: string): string | undefined {
  const folder = index.get(folderId);
  return folder?.kind === 'folder' ? folder.name : undefined;
}
