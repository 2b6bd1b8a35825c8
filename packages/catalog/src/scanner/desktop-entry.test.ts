import { describe, it, expect } from 'vitest';
import { ParseError } from '@swiftlaunch/shared';
import {
  parseDesktopFile,
  toDesktopOutcome,
  splitList,
  unescapeValue,
  localeCandidates,
  desktopFileId,
} from './desktop-entry';

const context = { id: 'org.example.Files.desktop', sourcePath: '/apps/files.desktop', mtimeMs: 1000 };

function outcomeOf(content: string, locale?: string) {
  return toDesktopOutcome(parseDesktopFile(content, context.sourcePath), { ...context, locale });
}

describe('parseDesktopFile', () => {
  it('collects groups and keeps the first value of a repeated key', () => {
    const file = parseDesktopFile(
      ['# comment', '[Desktop Entry]', 'Name = Files', 'Name=Ignored', '', '[Desktop Action x]', 'Exec=x'].join(
        '\n',
      ),
      context.sourcePath,
    );
    expect(file.groups.get('Desktop Entry')?.get('Name')).toBe('Files');
    expect(file.groups.get('Desktop Action x')?.get('Exec')).toBe('x');
  });

  it('rejects a file without a main group', () => {
    expect(() => parseDesktopFile('[Other]\nName=x', context.sourcePath)).toThrow(
      '/apps/files.desktop: missing [Desktop Entry] group',
    );
  });

  it('rejects keys before any group', () => {
    expect(() => parseDesktopFile('Name=x\n[Desktop Entry]', context.sourcePath)).toThrow(ParseError);
  });

  it('rejects lines that are not key=value', () => {
    expect(() => parseDesktopFile('[Desktop Entry]\nthis is not valid', context.sourcePath)).toThrow(
      '/apps/files.desktop: line 2: expected key=value',
    );
  });
});

describe('toDesktopOutcome', () => {
  it('builds an entry with actions, keywords and search text', () => {
    const outcome = outcomeOf(
      [
        '[Desktop Entry]',
        'Type=Application',
        'Name=Files',
        'GenericName=File Manager',
        'Comment=Access and organize files',
        'Exec=nautilus --new-window %U',
        'Icon=org.example.Files',
        'Categories=GNOME;Utility;Core;',
        'Keywords=folder;explorer;',
        'Actions=new-window;missing;',
        '',
        '[Desktop Action new-window]',
        'Name=New Window',
        'Exec=nautilus --new-window',
      ].join('\n'),
    );

    expect(outcome).toEqual({
      kind: 'entry',
      entry: {
        id: 'org.example.Files.desktop',
        sourcePath: '/apps/files.desktop',
        mtimeMs: 1000,
        name: 'Files',
        genericName: 'File Manager',
        description: 'Access and organize files',
        categories: ['GNOME', 'Utility', 'Core'],
        keywords: ['folder', 'explorer'],
        actions: [
          { id: 'default', label: 'Launch', exec: 'nautilus --new-window %U' },
          { id: 'new-window', label: 'New Window', exec: 'nautilus --new-window' },
        ],
        icon: 'org.example.Files',
        terminal: false,
        searchText: 'Files File Manager folder explorer',
      },
    });
  });

  it('prefers the most specific localized value', () => {
    const content = [
      '[Desktop Entry]',
      'Type=Application',
      'Exec=files',
      'Name=Files',
      'Name[fr]=Fichiers',
      'Name[fr_CA]=Fichiers (CA)',
    ].join('\n');

    const name = (locale?: string) => {
      const outcome = outcomeOf(content, locale);
      return outcome.kind === 'entry' ? outcome.entry.name : null;
    };
    expect(name('fr_CA.UTF-8')).toBe('Fichiers (CA)');
    expect(name('fr_FR.UTF-8')).toBe('Fichiers');
    expect(name('de_DE')).toBe('Files');
    expect(name(undefined)).toBe('Files');
  });

  it('hides entries that must not be listed', () => {
    const base = ['[Desktop Entry]', 'Name=Tool', 'Exec=tool'];
    expect(outcomeOf([...base, 'Type=Link'].join('\n'))).toEqual({ kind: 'hidden', reason: 'Type=Link' });
    expect(outcomeOf([...base, 'Type=Application', 'NoDisplay=true'].join('\n'))).toEqual({
      kind: 'hidden',
      reason: 'NoDisplay',
    });
    expect(outcomeOf([...base, 'Type=Application', 'Hidden=true'].join('\n'))).toEqual({
      kind: 'hidden',
      reason: 'Hidden',
    });
    expect(outcomeOf('[Desktop Entry]\nType=Application\nName=Tool')).toEqual({
      kind: 'hidden',
      reason: 'missing Exec',
    });
  });

  it('throws ParseError for an application without a name', () => {
    expect(() => outcomeOf('[Desktop Entry]\nType=Application\nExec=tool')).toThrow(
      '/apps/files.desktop: missing Name',
    );
  });

  it('reads Terminal=true', () => {
    const outcome = outcomeOf('[Desktop Entry]\nType=Application\nName=Top\nExec=top\nTerminal=true');
    expect(outcome.kind === 'entry' && outcome.entry.terminal).toBe(true);
  });
});

describe('value helpers', () => {
  it('unescapes the desktop-entry escapes', () => {
    expect(unescapeValue('a\\sb\\nc\\td\\\\e')).toBe('a b\nc\td\\e');
  });

  it('splits lists with escaped separators', () => {
    expect(splitList('one;two\\;three;;four;')).toEqual(['one', 'two;three', 'four']);
  });

  it('derives locale candidates', () => {
    expect(localeCandidates('sr_RS.UTF-8@latin')).toEqual(['sr_RS@latin', 'sr_RS', 'sr@latin', 'sr']);
    expect(localeCandidates('C')).toEqual([]);
  });

  it('maps subdirectories into the desktop-file id', () => {
    expect(desktopFileId('kde4/konsole.desktop')).toBe('kde4-konsole.desktop');
  });
});
