import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, RegistryError } from '@swiftlaunch/shared';
import { loadApp, safeLoadApp } from './loader';
import type { App, AppContext, AppExport } from './interfaces';

function createCtx(): AppContext {
  return { logger: new ConsoleLogger('silent'), config: { mode: 'test' } };
}

function searchApp(id: string): App {
  return { id, search: { list: vi.fn(async () => []) } };
}

describe('loadApp', () => {
  it('constructs a valid app with its context', async () => {
    const app = searchApp('calc');
    const createApp = vi.fn(() => app);
    const ctx = createCtx();

    const loaded = await loadApp(
      { manifest: { id: 'calc', sdkVersion: { minVersion: 1 }, capabilities: ['search'] }, createApp },
      ctx,
    );

    expect(loaded).toBe(app);
    expect(createApp).toHaveBeenCalledWith(ctx);
  });

  it('rejects an invalid manifest and keeps the id when present', async () => {
    const appExport: AppExport = {
      manifest: { id: 'bad', sdkVersion: { minVersion: 1 }, capabilities: [] },
      createApp: () => searchApp('bad'),
    };

    await expect(loadApp(appExport, createCtx())).rejects.toThrow('App "bad": Invalid app manifest');
  });

  it('rejects an incompatible SDK version', async () => {
    const appExport: AppExport = {
      manifest: { id: 'future', sdkVersion: { minVersion: 2 }, capabilities: ['search'] },
      createApp: () => searchApp('future'),
    };

    await expect(loadApp(appExport, createCtx())).rejects.toThrow(
      'App "future": App "future" requires SDK version 2, but current SDK version is 1.',
    );
  });

  it('wraps a throwing factory in a RegistryError', async () => {
    const appExport: AppExport = {
      manifest: { id: 'broken', sdkVersion: { minVersion: 1 }, capabilities: ['search'] },
      createApp: () => {
        throw new Error('missing database');
      },
    };

    const error = await loadApp(appExport, createCtx()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RegistryError);
    expect(error instanceof RegistryError && error.message).toBe('App "broken": construction failed: missing database');
  });

  it('rejects an app that lacks a declared capability', async () => {
    const appExport: AppExport = {
      manifest: { id: 'calc', sdkVersion: { minVersion: 1 }, capabilities: ['search', 'action'] },
      createApp: () => searchApp('calc'),
    };

    await expect(loadApp(appExport, createCtx())).rejects.toThrow(
      'App "calc": declares the action capability but does not provide it',
    );
  });

  it('rejects an app whose id differs from its manifest', async () => {
    const appExport: AppExport = {
      manifest: { id: 'calc', sdkVersion: { minVersion: 1 }, capabilities: ['search'] },
      createApp: () => searchApp('calculator'),
    };

    await expect(loadApp(appExport, createCtx())).rejects.toThrow('App "calc": created App reports id "calculator"');
  });
});

describe('safeLoadApp', () => {
  it('returns a failure result instead of throwing', async () => {
    const result = await safeLoadApp(
      {
        manifest: { id: 'future', sdkVersion: { minVersion: 3 }, capabilities: ['search'] },
        createApp: () => searchApp('future'),
      },
      createCtx(),
    );

    expect(result).toEqual({
      success: false,
      appId: 'future',
      error: 'App "future": App "future" requires SDK version 3, but current SDK version is 1.',
    });
  });
});
