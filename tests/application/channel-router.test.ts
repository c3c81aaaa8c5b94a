import { describe, it, expect } from 'vitest';
import { routeChannel } from '../../src/application/channel-router.js';
import { makeEvent } from '../helpers.js';

function eventForPipeline(name: string) {
  return makeEvent({ event: 'build.started', build: { number: 1 }, pipeline: { name } });
}

describe('routeChannel', () => {
  it('routes lang- pipelines to their project channel', () => {
    expect(routeChannel(eventForPipeline('lang-foo-x-private'), 'default')).toBe('foo');
  });

  it('routes keyboard- pipelines to their project channel', () => {
    expect(routeChannel(eventForPipeline('keyboard-bar-public'), 'default')).toBe('bar');
  });

  it('matches the prefix case-insensitively and lower-cases the channel', () => {
    expect(routeChannel(eventForPipeline('Lang-Baz-Something'), 'default')).toBe('baz');
    expect(routeChannel(eventForPipeline('Keyboard-Bar-Public'), 'default')).toBe('bar');
  });

  it('keeps the default for other pipelines', () => {
    expect(routeChannel(eventForPipeline('regular-pipeline'), 'buildkite')).toBe('buildkite');
  });

  it('requires the prefix at the start of the name', () => {
    expect(routeChannel(eventForPipeline('my-lang-foo'), 'buildkite')).toBe('buildkite');
    expect(routeChannel(eventForPipeline('language-foo'), 'buildkite')).toBe('buildkite');
  });

  it('keeps the default without a pipeline', () => {
    const event = makeEvent({ event: 'agent.connected', agent: { name: 'a' } });
    expect(routeChannel(event, 'default')).toBe('default');
  });

  it('keeps the default when the pipeline has no name', () => {
    const event = makeEvent({ event: 'pipeline.created', pipeline: { slug: 'lang-foo' } });
    expect(routeChannel(event, 'default')).toBe('default');
  });

  it('routes on the pipeline name whatever the event kind', () => {
    const event = makeEvent({ event: 'job.finished', job: { exit_status: 1 }, pipeline: { name: 'lang-sami' } });
    expect(routeChannel(event, 'default')).toBe('sami');
  });
});
