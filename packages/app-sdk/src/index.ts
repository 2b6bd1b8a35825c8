/**
 * @swiftlaunch/app-sdk
 *
 * Interfaces for building launcher Apps: search providers, action providers,
 * or both.
 */

export {
  SDK_VERSION,
  isVersionCompatible,
  getVersionMismatchError,
  type SdkVersionRange,
} from './version';

export type {
  AppConfig,
  AppContext,
  Candidate,
  CandidateAction,
  SearchContext,
  SearchProvider,
  ActionContext,
  ActionOutcome,
  ActionProvider,
  AppCapability,
  App,
  AppManifest,
  AppExport,
  Logger,
} from './interfaces';

export { loadApp, safeLoadApp, validateManifest, type LoadAppResult } from './loader';
