/**
 * Request descriptor and outcome types for the orchestration core.
 *
 * Every execution of a descriptor yields exactly one Outcome; each variant
 * carries only the fields relevant to its category.
 */

/** HTTP methods the transport accepts. */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Methods that must carry a body. */
export const BODY_REQUIRED_METHODS: ReadonlySet<HttpMethod> = new Set(['POST', 'PUT', 'PATCH']);

/** Methods that must not carry a body. */
export const BODY_FORBIDDEN_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'HEAD']);

/** Caller-facing flags on a logical call. */
export interface RequestOptions {
  /** Render the request instead of sending it. */
  dryRun?: boolean;
  /** Follow continuation until exhausted, without the page size or page ceiling. */
  skipPaginationLimit?: boolean;
  /** Do not resolve or refresh the session (endpoints that need none). */
  skipSessionCheck?: boolean;
  /** Target is a collection resource: aggregate pages. */
  collection?: boolean;
  /** Target requires a session bound to a workspace. */
  workspaceScoped?: boolean;
}

/** Input accepted by createDescriptor(). */
export interface DescriptorInput extends RequestOptions {
  method: string;
  uri: string;
  body?: unknown;
  query?: Record<string, string | number | boolean>;
  headers?: Record<string, string>;
}

/** One logical call. Frozen once created. */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly uri: string;
  readonly body?: unknown;
  readonly query: Readonly<Record<string, string>>;
  readonly headers: Readonly<Record<string, string>>;
  readonly options: Readonly<Required<RequestOptions>>;
}

/** Structured detail of a failure. */
export interface DiagnosticDetail {
  message: string;
  code?: string;
  status?: number;
  attempts?: number;
}

/** Per-item result inside a partial-success response. */
export interface SubItemResult {
  id?: string;
  status: string;
  succeeded: boolean;
  errorCode?: string;
  message?: string;
}

/** Request rendered for display in dry-run mode. */
export interface RenderedRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: unknown;
}

export type FailureReason =
  | 'business'
  | 'transient-exhausted'
  | 'pagination-exhausted'
  | 'invalid-response';

export type AuthenticationReason =
  | 'no-session'
  | 'refresh-failed'
  | 'rejected'
  | 'workspace-required';

export interface CompleteOutcome<T = unknown> {
  kind: 'complete';
  data: T;
  status: number;
  pages: number;
  attempts: number;
}

export interface PartialSuccessOutcome {
  kind: 'partial-success';
  status: number;
  items: SubItemResult[];
  data: unknown;
  detail: DiagnosticDetail;
}

export interface FailedOutcome {
  kind: 'failed';
  reason: FailureReason;
  detail: DiagnosticDetail;
}

export interface AuthenticationOutcome {
  kind: 'authentication';
  reason: AuthenticationReason;
  detail: DiagnosticDetail;
}

export interface CancelledOutcome {
  kind: 'cancelled';
  pagesFetched: number;
  itemsFetched: number;
  detail: DiagnosticDetail;
}

export interface DryRunOutcome {
  kind: 'dry-run';
  request: RenderedRequest;
}

export interface InvalidOutcome {
  kind: 'invalid';
  issues: string[];
  detail: DiagnosticDetail;
}

export type Outcome<T = unknown> =
  | CompleteOutcome<T>
  | PartialSuccessOutcome
  | FailedOutcome
  | AuthenticationOutcome
  | CancelledOutcome
  | DryRunOutcome
  | InvalidOutcome;

export type OutcomeKind = Outcome['kind'];

/** Outcomes that carry failure detail. */
export type FailureOutcome = Exclude<Outcome, CompleteOutcome | DryRunOutcome>;

/** Narrow an outcome to one that carries failure detail. */
export function isFailureOutcome(outcome: Outcome): outcome is FailureOutcome {
  return outcome.kind !== 'complete' && outcome.kind !== 'dry-run';
}
