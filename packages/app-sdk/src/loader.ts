/**
 * App Loader Utilities
 *
 * Helpers for validating and constructing Apps at startup.
 */

import { RegistryError, toError } from '@swiftlaunch/shared';
import { isVersionCompatible, getVersionMismatchError } from './version';
import type { App, AppCapability, AppContext, AppExport, AppManifest } from './interfaces';

const CAPABILITIES: readonly AppCapability[] = ['search', 'action'];

/**
 * Result of loading an App
 */
export type LoadAppResult<T extends App = App> =
  | { success: true; app: T; manifest: AppManifest }
  | { success: false; appId: string; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Validate an App manifest
 */
export function validateManifest(manifest: unknown): manifest is AppManifest {
  if (!isRecord(manifest)) {
    return false;
  }
  const { id, sdkVersion, capabilities } = manifest;
  return (
    typeof id === 'string' &&
    id.length > 0 &&
    isRecord(sdkVersion) &&
    typeof sdkVersion.minVersion === 'number' &&
    (sdkVersion.maxVersion === undefined || typeof sdkVersion.maxVersion === 'number') &&
    Array.isArray(capabilities) &&
    capabilities.length > 0 &&
    capabilities.every((c) => CAPABILITIES.some((known) => known === c))
  );
}

/**
 * Validate and construct an App from its export.
 * Throws RegistryError when the manifest is invalid, the SDK version does
 * not match, the factory throws, or the App lacks a declared capability.
 */
export async function loadApp<T extends App>(appExport: AppExport<T>, ctx: AppContext): Promise<T> {
  const rawManifest: unknown = appExport.manifest;
  const appId = isRecord(rawManifest) && typeof rawManifest.id === 'string' ? rawManifest.id : 'unknown';

  if (!validateManifest(rawManifest)) {
    throw new RegistryError(appId, 'Invalid app manifest');
  }
  const manifest = rawManifest;

  if (!isVersionCompatible(manifest.sdkVersion)) {
    throw new RegistryError(manifest.id, getVersionMismatchError(manifest.id, manifest.sdkVersion));
  }

  let app: T;
  try {
    app = await appExport.createApp(ctx);
  } catch (err) {
    throw new RegistryError(manifest.id, `construction failed: ${toError(err).message}`, { cause: err });
  }

  if (app.id !== manifest.id) {
    throw new RegistryError(manifest.id, `created App reports id "${app.id}"`);
  }
  for (const capability of manifest.capabilities) {
    if (!app[capability]) {
      throw new RegistryError(manifest.id, `declares the ${capability} capability but does not provide it`);
    }
  }
  return app;
}

/**
 * Load an App, returning a result object instead of throwing
 */
export async function safeLoadApp<T extends App>(
  appExport: AppExport<T>,
  ctx: AppContext,
): Promise<LoadAppResult<T>> {
  try {
    const app = await loadApp(appExport, ctx);
    return { success: true, app, manifest: appExport.manifest };
  } catch (error) {
    const appId = error instanceof RegistryError ? error.appId : 'unknown';
    return { success: false, appId, error: toError(error).message };
  }
}
