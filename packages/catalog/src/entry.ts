export interface EntryAction {
  /** `default` for the main Exec line, otherwise the `[Desktop Action <id>]` id */
  id: string;
  label: string;
  /** Exec template with field codes still unexpanded */
  exec: string;
}

/**
 * One indexed application. Entries handed out by the index are deeply frozen.
 */
export interface Entry {
  /** Desktop-file id; stable across rescans for the same source path */
  id: string;
  sourcePath: string;
  mtimeMs: number;
  name: string;
  genericName?: string;
  description?: string;
  categories: readonly string[];
  keywords: readonly string[];
  /** Never empty; the `default` action comes first */
  actions: readonly EntryAction[];
  /** Icon name or path as written in the descriptor */
  icon?: string;
  /** Resolved icon file, when one was found */
  iconPath?: string;
  terminal: boolean;
  /** Name, generic name and keywords, whitespace-collapsed */
  searchText: string;
}

export const DEFAULT_ACTION_ID = 'default';

export function buildSearchText(
  name: string,
  genericName: string | undefined,
  keywords: readonly string[],
): string {
  return [name, genericName ?? '', ...keywords].join(' ').replace(/\s+/g, ' ').trim();
}

/**
 * Deep-freezes a copy of `entry`. Optional fields that are `undefined` are
 * dropped, so a frozen entry compares equal to its cached JSON form.
 */
export function freezeEntry(entry: Entry): Entry {
  const frozen: Entry = {
    id: entry.id,
    sourcePath: entry.sourcePath,
    mtimeMs: entry.mtimeMs,
    name: entry.name,
    categories: Object.freeze([...entry.categories]),
    keywords: Object.freeze([...entry.keywords]),
    actions: Object.freeze(entry.actions.map((action) => Object.freeze({ ...action }))),
    terminal: entry.terminal,
    searchText: entry.searchText,
  };
  if (entry.genericName !== undefined) frozen.genericName = entry.genericName;
  if (entry.description !== undefined) frozen.description = entry.description;
  if (entry.icon !== undefined) frozen.icon = entry.icon;
  if (entry.iconPath !== undefined) frozen.iconPath = entry.iconPath;
  return Object.freeze(frozen);
}

export function findAction(entry: Entry, actionId: string): EntryAction | undefined {
  return entry.actions.find((action) => action.id === actionId);
}
