import {
  BUILD_ACTIONS,
  JOB_ACTIONS,
  AGENT_ACTIONS,
  ANNOTATION_ACTIONS,
  PIPELINE_ACTIONS,
} from '../domain/index.js';
import type {
  CiEvent,
  Build,
  BuildState,
  Job,
  Pipeline,
  Agent,
  Annotation,
  AnnotationStyle,
} from '../domain/index.js';
import type { WebhookPayload, WebhookPipeline } from './event-schema.js';

const BUILD_STATES: readonly BuildState[] = ['running', 'passed', 'failed', 'canceled'];
const ANNOTATION_STYLES: readonly AnnotationStyle[] = ['success', 'warning', 'error', 'info'];

/** `null` on the wire and a missing key mean the same thing. */
function opt<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

function pick<T extends string>(values: readonly T[], raw: string): T | undefined {
  return values.find((v) => v === raw);
}

function toBuildState(raw: string | null | undefined): BuildState {
  return (raw != null && pick(BUILD_STATES, raw)) || 'unknown';
}

function toAnnotationStyle(raw: string | null | undefined): AnnotationStyle {
  return (raw != null && pick(ANNOTATION_STYLES, raw)) || 'other';
}

function toBuild(raw: WebhookPayload['build']): Build | undefined {
  if (raw == null) return undefined;
  return {
    number: opt(raw.number),
    state: toBuildState(raw.state),
    message: opt(raw.message),
    commit: opt(raw.commit),
    webUrl: opt(raw.web_url),
  };
}

function toJob(raw: WebhookPayload['job']): Job | undefined {
  if (raw == null) return undefined;
  return {
    name: opt(raw.name),
    command: opt(raw.command),
    exitStatus: opt(raw.exit_status),
    webUrl: opt(raw.web_url),
  };
}

function toPipeline(raw: WebhookPipeline | null | undefined): Pipeline | undefined {
  if (raw == null) return undefined;
  const provider = raw.provider;
  return {
    name: opt(raw.name),
    repository: opt(raw.repository),
    provider: provider == null
      ? undefined
      : {
          repositoryUrl: opt(provider.repository_url),
          repositorySlug: opt(provider.settings?.repository),
        },
  };
}

function toAgent(raw: WebhookPayload['agent']): Agent | undefined {
  if (raw == null) return undefined;
  return { name: opt(raw.name), hostname: opt(raw.hostname) };
}

function toAnnotation(raw: WebhookPayload['annotation']): Annotation | undefined {
  if (raw == null) return undefined;
  return { style: toAnnotationStyle(raw.style), context: opt(raw.context) };
}

/**
 * Converts a validated wire payload into the tagged event union.
 *
 * The event name is split at its first `.` into family and action. A family
 * or action outside the known sets yields an `unknown` event that keeps the
 * raw name. Sub-records unrelated to the resolved family are dropped.
 */
export function normalizeEvent(payload: WebhookPayload): CiEvent {
  const kind = payload.event;
  const pipeline = toPipeline(payload.pipeline);

  const dot = kind.indexOf('.');
  const family = dot === -1 ? kind : kind.slice(0, dot);
  const action = dot === -1 ? '' : kind.slice(dot + 1);

  switch (family) {
    case 'build': {
      const a = pick(BUILD_ACTIONS, action);
      if (a) return { family: 'build', action: a, kind, pipeline, build: toBuild(payload.build) };
      break;
    }
    case 'job': {
      const a = pick(JOB_ACTIONS, action);
      if (a) return { family: 'job', action: a, kind, pipeline, job: toJob(payload.job) };
      break;
    }
    case 'agent': {
      const a = pick(AGENT_ACTIONS, action);
      if (a) return { family: 'agent', action: a, kind, pipeline, agent: toAgent(payload.agent) };
      break;
    }
    case 'annotation': {
      const a = pick(ANNOTATION_ACTIONS, action);
      if (a) {
        return { family: 'annotation', action: a, kind, pipeline, annotation: toAnnotation(payload.annotation) };
      }
      break;
    }
    case 'pipeline': {
      const a = pick(PIPELINE_ACTIONS, action);
      if (a) return { family: 'pipeline', action: a, kind, pipeline };
      break;
    }
  }

  return { family: 'unknown', kind, pipeline };
}
