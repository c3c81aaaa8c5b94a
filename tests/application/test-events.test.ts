import { describe, it, expect } from 'vitest';
import { buildTestScenario, SCENARIOS } from '../../src/application/test-events.js';
import { webhookPayloadSchema } from '../../src/application/event-schema.js';
import { renderEvent } from '../../src/application/message-renderer.js';
import { routeChannel } from '../../src/application/channel-router.js';
import { UnknownScenarioError } from '../../src/domain/index.js';
import { makeEvent } from '../helpers.js';

describe('buildTestScenario', () => {
  it.each(SCENARIOS)('%s produces valid webhook payloads', (scenario) => {
    const payloads = buildTestScenario(scenario, 7);
    expect(payloads.length).toBeGreaterThan(0);
    for (const payload of payloads) {
      expect(webhookPayloadSchema.safeParse(payload).success).toBe(true);
    }
  });

  it('sends the full sequence for "all"', () => {
    const payloads = buildTestScenario('all', 123);
    expect(payloads.map((p) => p.event)).toEqual([
      'build.started',
      'job.finished',
      'job.finished',
      'build.finished',
    ]);
    expect(payloads.map((p) => p.job?.exit_status ?? p.build?.state)).toEqual([
      'running',
      0,
      1,
      'passed',
    ]);
  });

  it('ends "scenario" with a failed build', () => {
    const payloads = buildTestScenario('scenario', 123);
    expect(payloads.at(-1)?.build?.state).toBe('failed');
  });

  it('uses the requested build number', () => {
    const [payload] = buildTestScenario('build-canceled', 55);
    expect(payload?.build?.number).toBe(55);
    expect(payload?.build?.web_url).toBe('https://buildkite.com/example-org/sample-pipeline/builds/55');
  });

  it('renders the started build with a commit link', () => {
    const [payload] = buildTestScenario('build-started', 123);
    if (!payload) throw new Error('expected a payload');

    expect(renderEvent(makeEvent(payload))).toEqual({
      message:
        '🔄 Build [#123](https://buildkite.com/example-org/sample-pipeline/builds/123) started\n'
        + '> Add login form validation '
        + '([a1b2c3d](https://github.com/example-org/example-repo/commit/a1b2c3d4e5f60718293a4b5c6d7e8f9012345678))',
      topic: 'Sample Pipeline - Build',
    });
  });

  it('routes the routing scenarios to per-project channels', () => {
    const [lang] = buildTestScenario('lang-routing', 1);
    const [keyboard] = buildTestScenario('keyboard-routing', 1);
    if (!lang || !keyboard) throw new Error('expected payloads');

    expect(routeChannel(makeEvent(lang), 'builds')).toBe('sample');
    expect(routeChannel(makeEvent(keyboard), 'builds')).toBe('sample');
  });

  it('rejects unknown scenario names', () => {
    expect(() => buildTestScenario('build-exploded', 1)).toThrow(UnknownScenarioError);
    expect(() => buildTestScenario('build-exploded', 1)).toThrow(
      'Unknown event type: build-exploded. Valid types: build-started, build-passed, build-failed, '
      + 'build-canceled, job-passed, job-failed, all, scenario, lang-routing, keyboard-routing',
    );
  });
});
