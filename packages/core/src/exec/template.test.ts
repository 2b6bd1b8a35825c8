import { describe, it, expect } from 'vitest';
import { expandExec, tokenizeExec } from './template';

const ctx = { name: 'Text Editor', icon: 'editor', sourcePath: '/apps/editor.desktop' };

describe('tokenizeExec', () => {
  it('splits on whitespace and groups quoted arguments', () => {
    expect(tokenizeExec('editor  --title "My Notes" %F')).toEqual(['editor', '--title', 'My Notes', '%F']);
  });

  it('honours backslash escapes', () => {
    expect(tokenizeExec('sh -c "echo \\"hi\\"" a\\ b')).toEqual(['sh', '-c', 'echo "hi"', 'a b']);
  });

  it('keeps an empty quoted argument', () => {
    expect(tokenizeExec('app ""')).toEqual(['app', '']);
  });

  it('rejects an unterminated quote', () => {
    expect(() => tokenizeExec('app "open')).toThrow('Unterminated quote in Exec line: app "open');
  });
});

describe('expandExec', () => {
  it('expands file lists and single files', () => {
    expect(expandExec('editor %F', { ...ctx, args: ['/a.txt', '/b.txt'] })).toEqual(['editor', '/a.txt', '/b.txt']);
    expect(expandExec('viewer %u', { ...ctx, args: ['/a.png', '/b.png'] })).toEqual(['viewer', '/a.png']);
  });

  it('drops file codes when there is nothing to open', () => {
    expect(expandExec('editor %U --new-window %f', ctx)).toEqual(['editor', '--new-window']);
  });

  it('expands icon, name, location and literal percent', () => {
    expect(expandExec('editor %i --class=%c --desktop %k 100%%', ctx)).toEqual([
      'editor',
      '--icon',
      'editor',
      '--class=Text Editor',
      '--desktop',
      '/apps/editor.desktop',
      '100%',
    ]);
  });

  it('removes deprecated codes', () => {
    expect(expandExec('editor %d %m --x%v', ctx)).toEqual(['editor', '--x']);
  });

  it('omits %i when the entry has no icon', () => {
    expect(expandExec('editor %i', { name: 'Text Editor', sourcePath: '/apps/editor.desktop' })).toEqual(['editor']);
  });

  it('rejects a template with no command left', () => {
    expect(() => expandExec('%f', ctx)).toThrow('Exec line has no command: %f');
  });
});
