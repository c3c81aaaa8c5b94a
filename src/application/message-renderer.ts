import type {
  CiEvent,
  BuildEvent,
  JobEvent,
  AgentEvent,
  AnnotationEvent,
  PipelineEvent,
  Build,
  Job,
  RenderedNotification,
} from '../domain/index.js';
import {
  BUILD_TRANSITION_LABELS,
  buildResultLabel,
  annotationStyleIcon,
  ANNOTATION_FALLBACK_ICON,
  DELETED_ICON,
} from './icons.js';
import type { BuildTransition, StatusLabel } from './icons.js';
import { resolveRepoUrl } from './repo-url.js';

/** Returned for events that must not be forwarded. */
export const FILTERED = '';

const MAX_COMMAND_LENGTH = 40;
const TRUNCATED_COMMAND_LENGTH = 37;
const SHORT_SHA_LENGTH = 7;

/** Build actions whose message quotes the triggering commit. */
const QUOTES_COMMIT: ReadonlySet<BuildTransition> = new Set<BuildTransition>(['started', 'scheduled', 'created']);

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

function buildLink(build: Build): string {
  return `[#${build.number ?? 0}](${build.webUrl ?? '#'})`;
}

function buildLine(label: StatusLabel, build: Build | undefined): string {
  if (!build) return `${label.icon} Build ${label.verb}`;
  return `${label.icon} Build ${buildLink(build)} ${label.verb}`;
}

/**
 * Name shown for a job: its name, else the first line of its command
 * (shortened past 40 characters), else "unnamed job".
 */
export function jobDisplayName(job: Job): string {
  const name = job.name;
  if (name !== undefined && !isBlank(name)) return name;

  const firstLine = (job.command ?? '').split(/\r?\n/, 1)[0]?.trim() ?? '';
  if (firstLine === '') return 'unnamed job';

  const chars = Array.from(firstLine);
  if (chars.length > MAX_COMMAND_LENGTH) {
    return `${chars.slice(0, TRUNCATED_COMMAND_LENGTH).join('')}...`;
  }
  return firstLine;
}

/** ` ([abcdef1](<repo>/commit/<sha>))`, or '' when commit or repository is unknown. */
function commitLink(event: BuildEvent, commit: string | undefined): string {
  if (commit === undefined) return '';
  const repoUrl = resolveRepoUrl(event.pipeline);
  if (repoUrl === undefined) return '';
  const shortSha = Array.from(commit).slice(0, SHORT_SHA_LENGTH).join('');
  return ` ([${shortSha}](${repoUrl}/commit/${commit}))`;
}

function renderBuild(event: BuildEvent): string {
  const { action, build } = event;

  switch (action) {
    case 'finished':
    case 'passed':
    case 'failed':
      // Result comes from the reported state, not from the event name.
      if (!build) return '✅ Build finished';
      return buildLine(buildResultLabel(build.state), build);
    default: {
      const header = buildLine(BUILD_TRANSITION_LABELS[action], build);
      if (!build || !QUOTES_COMMIT.has(action) || isBlank(build.message)) return header;
      return `${header}\n> ${build.message}${commitLink(event, build.commit)}`;
    }
  }
}

function renderJob(event: JobEvent): string {
  if (event.action !== 'finished') return FILTERED;

  const job = event.job;
  if (!job) return FILTERED;

  let label: StatusLabel;
  if (job.exitStatus === undefined) {
    // No exit code on a finished job is unusual enough to surface.
    label = { icon: '❓', verb: 'finished' };
  } else if (job.exitStatus === 0) {
    return FILTERED;
  } else {
    label = { icon: '❌', verb: 'failed' };
  }

  return `${label.icon} Job ['${jobDisplayName(job)}'](${job.webUrl ?? '#'}) ${label.verb}`;
}

function renderAgent(event: AgentEvent): string {
  const label: StatusLabel = event.action === 'connected'
    ? { icon: '🟢', verb: 'connected' }
    : { icon: '🔴', verb: 'disconnected' };

  const agent = event.agent;
  if (!agent) return `${label.icon} Agent ${label.verb}`;
  return `${label.icon} Agent '${agent.name ?? 'unknown'}' ${label.verb} (${agent.hostname ?? 'unknown host'})`;
}

function renderAnnotation(event: AnnotationEvent): string {
  const { action, annotation } = event;
  const icon = action === 'deleted'
    ? DELETED_ICON
    : annotation ? annotationStyleIcon(annotation.style) : ANNOTATION_FALLBACK_ICON;

  if (!annotation) return `${icon} Annotation ${action}`;
  return `${icon} Annotation ${action}: ${annotation.context ?? 'annotation'}`;
}

const PIPELINE_ICONS: Readonly<Record<PipelineEvent['action'], string>> = {
  created: '🆕',
  updated: '📝',
  deleted: DELETED_ICON,
};

function renderPipeline(event: PipelineEvent): string {
  const icon = PIPELINE_ICONS[event.action];
  if (!event.pipeline) return `${icon} Pipeline ${event.action}`;
  return `${icon} Pipeline '${event.pipeline.name ?? 'unknown'}' ${event.action}`;
}

/**
 * Renders the chat message for an event.
 *
 * Returns `FILTERED` ('') for events that are noise: successful jobs and
 * every job state other than "finished". Never throws; missing
 * sub-records fall back to generic wording.
 */
export function renderMessage(event: CiEvent): string {
  switch (event.family) {
    case 'build':
      return renderBuild(event);
    case 'job':
      return renderJob(event);
    case 'agent':
      return renderAgent(event);
    case 'annotation':
      return renderAnnotation(event);
    case 'pipeline':
      return renderPipeline(event);
    case 'unknown':
      return `📢 Buildkite event: ${event.kind}`;
    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
}

/** `<pipeline name> - Build`, or `Build` when no pipeline name is known. */
export function formatTopic(event: CiEvent): string {
  const name = event.pipeline?.name;
  if (name === undefined || isBlank(name)) return 'Build';
  return `${name} - Build`;
}

export function renderEvent(event: CiEvent): RenderedNotification {
  return { message: renderMessage(event), topic: formatTopic(event) };
}
