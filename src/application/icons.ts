import type { AnnotationStyle, BuildAction, BuildState } from '../domain/index.js';

/** Status glyph and verb shown after the build link. */
export interface StatusLabel {
  readonly icon: string;
  readonly verb: string;
}

/** Build actions that announce a state change rather than a final result. */
export type BuildTransition = Exclude<BuildAction, 'finished' | 'passed' | 'failed'>;

export const BUILD_TRANSITION_LABELS: Readonly<Record<BuildTransition, StatusLabel>> = {
  started: { icon: '🔄', verb: 'started' },
  scheduled: { icon: '📅', verb: 'scheduled' },
  created: { icon: '🆕', verb: 'created' },
  running: { icon: '🏃', verb: 'running' },
  blocked: { icon: '🚫', verb: 'blocked' },
  unblocked: { icon: '🟢', verb: 'unblocked' },
  canceled: { icon: '⏹️', verb: 'canceled' },
  rebuilt: { icon: '🔁', verb: 'rebuilt' },
};

const BUILD_RESULT_LABELS: Partial<Readonly<Record<BuildState, StatusLabel>>> = {
  passed: { icon: '✅', verb: 'passed' },
  failed: { icon: '❌', verb: 'failed' },
  canceled: { icon: '⏹️', verb: 'canceled' },
};

const BUILD_RESULT_FALLBACK: StatusLabel = { icon: '❓', verb: 'finished' };

/** Icon and verb for a finished build. States without an entry read as "finished". */
export function buildResultLabel(state: BuildState): StatusLabel {
  return BUILD_RESULT_LABELS[state] ?? BUILD_RESULT_FALLBACK;
}

const ANNOTATION_STYLE_ICONS: Partial<Readonly<Record<AnnotationStyle, string>>> = {
  success: '✅',
  warning: '⚠️',
  error: '❌',
  info: 'ℹ️',
};

export const ANNOTATION_FALLBACK_ICON = '📝';
export const DELETED_ICON = '🗑️';

export function annotationStyleIcon(style: AnnotationStyle): string {
  return ANNOTATION_STYLE_ICONS[style] ?? ANNOTATION_FALLBACK_ICON;
}
