import { ParseError } from '@swiftlaunch/shared';
import { DEFAULT_ACTION_ID, buildSearchText, type Entry, type EntryAction } from '../entry';

const MAIN_GROUP = 'Desktop Entry';
const ACTION_GROUP_PREFIX = 'Desktop Action ';

/** Key/value pairs of one group; localized keys are stored verbatim, e.g. `Name[fr]`. */
export type DesktopGroup = ReadonlyMap<string, string>;

export interface DesktopFile {
  groups: ReadonlyMap<string, DesktopGroup>;
}

/**
 * Outcome of turning a parsed file into an index entry. Files that parse
 * but must not be shown (NoDisplay, Hidden, not an application) still
 * occupy their desktop-file id.
 */
export type DesktopOutcome =
  | { kind: 'entry'; entry: Entry }
  | { kind: 'hidden'; reason: string };

/**
 * Parses the group/key structure of a desktop file.
 * Only the structure is checked; keys are not validated against any schema.
 */
export function parseDesktopFile(content: string, sourcePath: string): DesktopFile {
  const groups = new Map<string, Map<string, string>>();
  let current: Map<string, string> | null = null;

  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '' || line.startsWith('#')) continue;

    if (line.startsWith('[')) {
      if (!line.endsWith(']')) {
        throw new ParseError(sourcePath, `line ${i + 1}: unterminated group header`);
      }
      const name = line.slice(1, -1);
      if (groups.has(name)) {
        throw new ParseError(sourcePath, `line ${i + 1}: duplicate group [${name}]`);
      }
      current = new Map();
      groups.set(name, current);
      continue;
    }

    const eq = line.indexOf('=');
    if (eq <= 0) {
      throw new ParseError(sourcePath, `line ${i + 1}: expected key=value`);
    }
    if (!current) {
      throw new ParseError(sourcePath, `line ${i + 1}: key outside of any group`);
    }
    const key = line.slice(0, eq).trim();
    // First occurrence wins
    if (!current.has(key)) {
      current.set(key, line.slice(eq + 1).trim());
    }
  }

  if (!groups.has(MAIN_GROUP)) {
    throw new ParseError(sourcePath, `missing [${MAIN_GROUP}] group`);
  }
  return { groups };
}

export function unescapeValue(raw: string): string {
  return raw.replace(/\\([sntr\\])/g, (_match, code: string) => {
    switch (code) {
      case 's':
        return ' ';
      case 'n':
        return '\n';
      case 't':
        return '\t';
      case 'r':
        return '\r';
      default:
        return '\\';
    }
  });
}

/** Splits a `;`-separated list, honouring `\;` escapes. */
export function splitList(raw: string): string[] {
  const items: string[] = [];
  let item = '';
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (ch === '\\' && raw[i + 1] === ';') {
      item += ';';
      i++;
    } else if (ch === ';') {
      items.push(item);
      item = '';
    } else {
      item += ch;
    }
  }
  items.push(item);
  return items.map((value) => unescapeValue(value).trim()).filter((value) => value.length > 0);
}

/**
 * Locale keys to try for a POSIX locale, most specific first.
 * `fr_FR.UTF-8@euro` gives `fr_FR@euro`, `fr_FR`, `fr@euro`, `fr`.
 */
export function localeCandidates(locale: string | undefined): string[] {
  if (!locale || locale === 'C' || locale === 'POSIX') return [];
  const match = /^([^_.@]+)(?:_([^.@]+))?(?:\.[^@]*)?(?:@(.+))?$/.exec(locale);
  if (!match) return [];
  const [, lang, country, modifier] = match;
  const candidates: string[] = [];
  if (country && modifier) candidates.push(`${lang}_${country}@${modifier}`);
  if (country) candidates.push(`${lang}_${country}`);
  if (modifier) candidates.push(`${lang}@${modifier}`);
  candidates.push(lang);
  return candidates;
}

function readLocalized(group: DesktopGroup, key: string, locales: string[]): string | undefined {
  for (const locale of locales) {
    const value = group.get(`${key}[${locale}]`);
    if (value !== undefined) return value;
  }
  return group.get(key);
}

function readString(group: DesktopGroup, key: string, locales: string[]): string | undefined {
  const raw = readLocalized(group, key, locales);
  if (raw === undefined) return undefined;
  const value = unescapeValue(raw).trim();
  return value === '' ? undefined : value;
}

function readList(group: DesktopGroup, key: string, locales: string[] = []): string[] {
  const raw = readLocalized(group, key, locales);
  return raw === undefined ? [] : splitList(raw);
}

function readBoolean(group: DesktopGroup, key: string): boolean {
  return group.get(key) === 'true';
}

export interface EntryContext {
  id: string;
  sourcePath: string;
  mtimeMs: number;
  locale?: string;
}

/**
 * Builds an index entry from a parsed desktop file.
 * Throws ParseError when an application entry has no Name.
 */
export function toDesktopOutcome(file: DesktopFile, context: EntryContext): DesktopOutcome {
  const main = file.groups.get(MAIN_GROUP);
  if (!main) {
    throw new ParseError(context.sourcePath, `missing [${MAIN_GROUP}] group`);
  }
  const locales = localeCandidates(context.locale);

  const type = main.get('Type');
  if (type !== 'Application') {
    return { kind: 'hidden', reason: type ? `Type=${type}` : 'missing Type' };
  }
  if (readBoolean(main, 'Hidden')) return { kind: 'hidden', reason: 'Hidden' };
  if (readBoolean(main, 'NoDisplay')) return { kind: 'hidden', reason: 'NoDisplay' };

  const exec = readString(main, 'Exec', []);
  if (!exec) return { kind: 'hidden', reason: 'missing Exec' };

  const name = readString(main, 'Name', locales);
  if (!name) {
    throw new ParseError(context.sourcePath, 'missing Name');
  }

  const actions: EntryAction[] = [{ id: DEFAULT_ACTION_ID, label: 'Launch', exec }];
  for (const actionId of readList(main, 'Actions')) {
    const group = file.groups.get(`${ACTION_GROUP_PREFIX}${actionId}`);
    if (!group || actionId === DEFAULT_ACTION_ID) continue;
    const actionExec = readString(group, 'Exec', []);
    const label = readString(group, 'Name', locales);
    if (!actionExec || !label) continue;
    actions.push({ id: actionId, label, exec: actionExec });
  }

  const genericName = readString(main, 'GenericName', locales);
  const keywords = readList(main, 'Keywords', locales);

  return {
    kind: 'entry',
    entry: {
      id: context.id,
      sourcePath: context.sourcePath,
      mtimeMs: context.mtimeMs,
      name,
      genericName,
      description: readString(main, 'Comment', locales),
      categories: readList(main, 'Categories'),
      keywords,
      actions,
      icon: readString(main, 'Icon', []),
      terminal: readBoolean(main, 'Terminal'),
      searchText: buildSearchText(name, genericName, keywords),
    },
  };
}

/**
 * Desktop-file id of a file below an applications directory:
 * `kde4/konsole.desktop` becomes `kde4-konsole.desktop`.
 */
export function desktopFileId(relativePath: string): string {
  return relativePath.split(/[\\/]/).join('-');
}
