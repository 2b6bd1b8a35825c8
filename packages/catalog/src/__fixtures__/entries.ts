import type { Entry } from '../entry';

export function makeEntry(id: string, name: string, overrides: Partial<Entry> = {}): Entry {
  return {
    id,
    sourcePath: `/apps/${id}`,
    mtimeMs: 1,
    name,
    categories: [],
    keywords: [],
    actions: [{ id: 'default', label: 'Launch', exec: name.toLowerCase() }],
    terminal: false,
    searchText: name,
    ...overrides,
  };
}
