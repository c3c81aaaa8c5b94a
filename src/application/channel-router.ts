import type { CiEvent } from '../domain/index.js';

/** Pipeline name prefixes that fan out into a per-project channel. */
const PROJECT_PREFIXES = ['lang-', 'keyboard-'] as const;

/**
 * Picks the channel an event is posted to.
 *
 * A pipeline named `lang-<project>-…` or `keyboard-<project>-…`
 * (case-insensitive) goes to the lower-cased `<project>` channel;
 * everything else goes to `defaultChannel`.
 */
export function routeChannel(event: CiEvent, defaultChannel: string): string {
  const name = event.pipeline?.name?.toLowerCase();
  if (name === undefined) return defaultChannel;

  if (!PROJECT_PREFIXES.some((prefix) => name.startsWith(prefix))) {
    return defaultChannel;
  }

  const [, project] = name.split('-');
  return project ?? defaultChannel;
}
