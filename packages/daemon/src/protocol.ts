import { z } from 'zod';
import { IpcError, LauncherError, type ErrorCode } from '@swiftlaunch/shared';

/**
 * Wire format between the daemon and its clients: one JSON object per line
 * in both directions. Every response carries the id of the request it
 * answers; a line that cannot be parsed far enough to find an id is
 * answered with `id: null`.
 */

export const PROTOCOL_VERSION = 1;

const RequestIdSchema = z.number().int().nonnegative();
const SessionIdSchema = z.string().min(1);

export const RequestSchema = z.discriminatedUnion('type', [
  z.object({ id: RequestIdSchema, type: z.literal('ping') }),
  z.object({ id: RequestIdSchema, type: z.literal('open'), sessionId: SessionIdSchema.optional() }),
  z.object({ id: RequestIdSchema, type: z.literal('input'), sessionId: SessionIdSchema, query: z.string() }),
  z.object({ id: RequestIdSchema, type: z.literal('move'), sessionId: SessionIdSchema, delta: z.number().int() }),
  z.object({
    id: RequestIdSchema,
    type: z.literal('activate'),
    sessionId: SessionIdSchema,
    actionId: z.string().min(1).optional(),
  }),
  z.object({ id: RequestIdSchema, type: z.literal('view'), sessionId: SessionIdSchema }),
  z.object({ id: RequestIdSchema, type: z.literal('close'), sessionId: SessionIdSchema }),
  z.object({ id: RequestIdSchema, type: z.literal('status') }),
  z.object({ id: RequestIdSchema, type: z.literal('rescan') }),
  z.object({ id: RequestIdSchema, type: z.literal('goodbye') }),
]);

export type Request = z.infer<typeof RequestSchema>;
export type RequestType = Request['type'];
type WithoutId<T> = T extends unknown ? Omit<T, 'id'> : never;
/** A request as the caller writes it; the client assigns the id. */
export type RequestBody = WithoutId<Request>;

const ERROR_CODES = [
  'ConfigError',
  'UsageError',
  'ParseError',
  'ScanError',
  'IndexError',
  'MatchTimeout',
  'CacheVersionMismatch',
  'ActionLaunchFailure',
  'RegistryError',
  'DaemonBindError',
  'IpcError',
  'UnknownError',
] as const satisfies readonly ErrorCode[];

export const ErrorBodySchema = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
  details: z.union([z.record(z.unknown()), z.string()]).optional(),
});

export type ErrorBody = z.infer<typeof ErrorBodySchema>;

export const ResponseSchema = z.discriminatedUnion('ok', [
  z.object({ id: RequestIdSchema, ok: z.literal(true), result: z.unknown() }),
  z.object({ id: RequestIdSchema.nullable(), ok: z.literal(false), error: ErrorBodySchema }),
]);

export type Response = z.infer<typeof ResponseSchema>;

// Results, per request type

export const PingResultSchema = z.object({ pong: z.literal(true), protocol: z.number().int(), pid: z.number().int() });

const CandidateSchema = z.object({
  id: z.string(),
  title: z.string(),
  subtitle: z.string().optional(),
  iconPath: z.string().optional(),
  score: z.number(),
  positions: z.array(z.number().int()),
  actions: z.array(z.object({ id: z.string(), label: z.string() })),
});

export const SessionViewSchema = z.object({
  sessionId: z.string(),
  status: z.enum(['idle', 'pending', 'completed', 'cancelled']),
  query: z.string(),
  token: z.number().int(),
  resultsQuery: z.string().nullable(),
  results: z.array(z.object({ appId: z.string(), candidate: CandidateSchema, score: z.number() })),
  selection: z.number().int(),
  owner: z.string().nullable(),
  error: z.string().nullable(),
});

export type SessionViewResult = z.infer<typeof SessionViewSchema>;

export const ActionOutcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('launched'), pid: z.number().int().optional() }),
  z.object({ status: z.literal('failed'), reason: z.string() }),
]);

export const ActivateResultSchema = z.object({ outcome: ActionOutcomeSchema, view: SessionViewSchema });

export const CloseResultSchema = z.object({ closed: z.literal(true) });

const ScanSummarySchema = z.object({
  generation: z.number().int(),
  added: z.number().int(),
  updated: z.number().int(),
  removed: z.number().int(),
  entries: z.number().int(),
  reused: z.number().int(),
  skipped: z.number().int(),
  durationMs: z.number(),
});

export const StatusResultSchema = z.object({
  uptimeMs: z.number(),
  index: z.object({
    generation: z.number().int(),
    entries: z.number().int(),
    directories: z.array(z.string()),
    pendingTasks: z.number().int(),
    lastScan: ScanSummarySchema.nullable(),
    restartPending: z.boolean(),
  }),
  apps: z.array(z.string()),
  sessions: z.number().int(),
  watched: z.array(z.string()),
});

export type StatusResult = z.infer<typeof StatusResultSchema>;

/** `null` when the rescan task failed; the daemon retries it on its own. */
export const RescanResultSchema = ScanSummarySchema.nullable();

export const GoodbyeResultSchema = z.object({ bye: z.literal(true) });

export function encodeMessage(message: Request | Response): string {
  return `${JSON.stringify(message)}\n`;
}

export type ParsedRequest =
  | { success: true; request: Request }
  | { success: false; id: number | null; error: IpcError };

/** Parses one request line. On failure the id is recovered when the line carries one. */
export function parseRequest(line: string): ParsedRequest {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    return { success: false, id: null, error: new IpcError('Request is not valid JSON', { cause: err }) };
  }

  const result = RequestSchema.safeParse(raw);
  if (result.success) {
    return { success: true, request: result.data };
  }
  const idResult = z.object({ id: RequestIdSchema }).safeParse(raw);
  const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
  return {
    success: false,
    id: idResult.success ? idResult.data.id : null,
    error: new IpcError(`Invalid request: ${issues}`),
  };
}

export function toErrorBody(error: Error): ErrorBody {
  if (error instanceof LauncherError) {
    const body: ErrorBody = { code: error.code, message: error.message };
    if (error.details !== undefined) body.details = error.details;
    return body;
  }
  return { code: 'UnknownError', message: error.message };
}

export function fromErrorBody(body: ErrorBody): LauncherError {
  return new LauncherError(body.code, body.message, body.details === undefined ? {} : { details: body.details });
}
