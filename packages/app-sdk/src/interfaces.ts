/**
 * App SDK Interfaces
 *
 * An App is a value with an optional search capability and an optional
 * action capability. The coordinator dispatches on which of the two are
 * present; there is no base class to extend.
 */

import type { CancellationToken, Logger } from '@swiftlaunch/shared';
import type { SdkVersionRange } from './version';

export type { Logger };

// ============================================================================
// Common Types
// ============================================================================

/**
 * App configuration passed at construction.
 * Apps can define their own config shape extending this.
 */
export type AppConfig = Record<string, unknown>;

/**
 * Context handed to an App factory at startup.
 */
export interface AppContext {
  logger: Logger;
  config: AppConfig;
}

/** An action a candidate offers, as shown to the user. */
export interface CandidateAction {
  id: string;
  label: string;
}

/**
 * One search result produced by an App. `score` is on the App's own scale;
 * the coordinator normalizes it before merging with other Apps.
 */
export interface Candidate {
  /** Unique within the producing App */
  id: string;
  title: string;
  subtitle?: string;
  iconPath?: string;
  score: number;
  /** Matched character positions in `title`, for highlighting */
  positions: readonly number[];
  actions: readonly CandidateAction[];
}

// ============================================================================
// Capabilities
// ============================================================================

/**
 * Context for a single search round.
 */
export interface SearchContext {
  sessionId: string;
  /** Cancelled when the session issues a newer query */
  token: CancellationToken;
  logger: Logger;
}

export interface SearchProvider {
  /**
   * Candidates for `query`. A provider that notices its token was cancelled
   * may return early with anything; the result is discarded.
   */
  list(query: string, ctx: SearchContext): Promise<Candidate[]>;
}

export interface ActionContext {
  sessionId: string;
  logger: Logger;
}

/**
 * Result of running an action. A failure is reported, never thrown, so it
 * can be shown in the session.
 */
export type ActionOutcome =
  | {
      status: 'launched';
      /** Opaque handle of the spawned process, when there is one */
      pid?: number;
    }
  | {
      status: 'failed';
      reason: string;
    };

export interface ActionProvider {
  act(candidate: Candidate, actionId: string, ctx: ActionContext): Promise<ActionOutcome>;
}

export type AppCapability = 'search' | 'action';

/**
 * A pluggable result and action provider.
 */
export interface App {
  readonly id: string;
  readonly search?: SearchProvider;
  readonly action?: ActionProvider;
  /**
   * A query starting with this prefix goes to this App alone, with the
   * prefix stripped.
   */
  readonly exclusivePrefix?: string;
  /** Called once when the daemon shuts down. */
  shutdown?(): Promise<void>;
}

// ============================================================================
// Manifest
// ============================================================================

export interface AppManifest {
  id: string;
  sdkVersion: SdkVersionRange;
  /** Capabilities the created App must provide */
  capabilities: AppCapability[];
}

/**
 * What an App module exports: a manifest plus a factory.
 */
export interface AppExport<T extends App = App> {
  manifest: AppManifest;
  createApp: (ctx: AppContext) => T | Promise<T>;
}
