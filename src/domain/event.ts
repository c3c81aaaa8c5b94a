/**
 * Core domain types for CI webhook events.
 *
 * The wire payload is flat and all-optional; inside the service an event is
 * one variant of a closed union keyed by `family`, carrying only the
 * sub-records that family uses. These types carry no framework dependencies.
 */

/** Normalized build state. Anything the CI reports outside this set is `unknown`. */
export type BuildState = 'running' | 'passed' | 'failed' | 'canceled' | 'unknown';

/** Normalized annotation style. Anything outside the known set is `other`. */
export type AnnotationStyle = 'success' | 'warning' | 'error' | 'info' | 'other';

export interface Build {
  readonly number?: number;
  readonly state: BuildState;
  /** The triggering commit message. */
  readonly message?: string;
  /** Full commit SHA. */
  readonly commit?: string;
  readonly webUrl?: string;
}

export interface Job {
  readonly name?: string;
  readonly command?: string;
  /** Absent while the job has not reported an exit code. */
  readonly exitStatus?: number;
  readonly webUrl?: string;
}

export interface RepositoryProvider {
  /** Explicit web URL of the repository. */
  readonly repositoryUrl?: string;
  /** Bare `owner/repo` slug. */
  readonly repositorySlug?: string;
}

export interface Pipeline {
  readonly name?: string;
  /** `git@github.com:owner/repo.git` or `https://github.com/owner/repo.git`. */
  readonly repository?: string;
  readonly provider?: RepositoryProvider;
}

export interface Agent {
  readonly name?: string;
  readonly hostname?: string;
}

export interface Annotation {
  readonly style: AnnotationStyle;
  readonly context?: string;
}

export const BUILD_ACTIONS = [
  'started',
  'scheduled',
  'created',
  'running',
  'blocked',
  'unblocked',
  'canceled',
  'rebuilt',
  'finished',
  'passed',
  'failed',
] as const;

export const JOB_ACTIONS = [
  'finished',
  'started',
  'scheduled',
  'canceled',
  'retried',
  'timed_out',
  'assigned',
] as const;

export const AGENT_ACTIONS = ['connected', 'disconnected'] as const;
export const ANNOTATION_ACTIONS = ['created', 'updated', 'deleted'] as const;
export const PIPELINE_ACTIONS = ['created', 'updated', 'deleted'] as const;

export type BuildAction = (typeof BUILD_ACTIONS)[number];
export type JobAction = (typeof JOB_ACTIONS)[number];
export type AgentAction = (typeof AGENT_ACTIONS)[number];
export type AnnotationAction = (typeof ANNOTATION_ACTIONS)[number];
export type PipelineAction = (typeof PIPELINE_ACTIONS)[number];

/** Fields every variant carries. `kind` is the raw event name from the webhook. */
interface EventBase {
  readonly kind: string;
  readonly pipeline?: Pipeline;
}

export interface BuildEvent extends EventBase {
  readonly family: 'build';
  readonly action: BuildAction;
  readonly build?: Build;
}

export interface JobEvent extends EventBase {
  readonly family: 'job';
  readonly action: JobAction;
  readonly job?: Job;
}

export interface AgentEvent extends EventBase {
  readonly family: 'agent';
  readonly action: AgentAction;
  readonly agent?: Agent;
}

export interface AnnotationEvent extends EventBase {
  readonly family: 'annotation';
  readonly action: AnnotationAction;
  readonly annotation?: Annotation;
}

export interface PipelineEvent extends EventBase {
  readonly family: 'pipeline';
  readonly action: PipelineAction;
}

/** Any event name the service has no dedicated handling for. */
export interface UnknownEvent extends EventBase {
  readonly family: 'unknown';
}

export type CiEvent =
  | BuildEvent
  | JobEvent
  | AgentEvent
  | AnnotationEvent
  | PipelineEvent
  | UnknownEvent;
