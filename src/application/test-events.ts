import { UnknownScenarioError } from '../domain/index.js';
import type { WebhookPayload, WebhookPipeline } from './event-schema.js';

/**
 * Synthetic webhook payloads for exercising a running server.
 *
 * Every payload uses the wire shape, so it travels through the same
 * validation and normalization as a real delivery.
 */

export const SCENARIOS = [
  'build-started',
  'build-passed',
  'build-failed',
  'build-canceled',
  'job-passed',
  'job-failed',
  'all',
  'scenario',
  'lang-routing',
  'keyboard-routing',
] as const;

export type Scenario = (typeof SCENARIOS)[number];

type FinishedState = 'passed' | 'failed' | 'canceled';

const ORG_URL = 'https://buildkite.com/example-org';
const API_URL = 'https://api.buildkite.com/v2/organizations/example-org/pipelines';

function pipeline(slug: string, name: string): WebhookPipeline {
  return {
    id: `pipeline-${slug}`,
    name,
    slug,
    url: `${API_URL}/${slug}`,
    web_url: `${ORG_URL}/${slug}`,
    repository: 'git@github.com:example-org/example-repo.git',
    provider: {
      id: 'github',
      settings: { repository: 'example-org/example-repo' },
      repository_url: 'https://github.com/example-org/example-repo',
    },
  };
}

const DEFAULT_PIPELINE = pipeline('sample-pipeline', 'Sample Pipeline');

function buildUrls(slug: string, buildNumber: number) {
  return {
    url: `${API_URL}/${slug}/builds/${buildNumber}`,
    web_url: `${ORG_URL}/${slug}/builds/${buildNumber}`,
  };
}

export function mockBuildStarted(buildNumber: number): WebhookPayload {
  return {
    event: 'build.started',
    build: {
      id: `build-started-${buildNumber}`,
      number: buildNumber,
      state: 'running',
      message: 'Add login form validation',
      commit: 'a1b2c3d4e5f60718293a4b5c6d7e8f9012345678',
      branch: 'feature/login-validation',
      ...buildUrls('sample-pipeline', buildNumber),
      author: { name: 'Test Author', email: 'author@example.com' },
    },
    pipeline: DEFAULT_PIPELINE,
  };
}

const FINISHED_BUILDS: Readonly<Record<FinishedState, { commit: string; message: string }>> = {
  passed: { commit: 'b2c3d4e5f60718293a4b5c6d7e8f901234567890', message: 'Fix session timeout handling' },
  failed: { commit: 'c3d4e5f60718293a4b5c6d7e8f90123456789012', message: 'Bump dependencies' },
  canceled: { commit: 'd4e5f60718293a4b5c6d7e8f9012345678901234', message: 'Refactor connection pool' },
};

export function mockBuildFinished(state: FinishedState, buildNumber: number): WebhookPayload {
  const { commit, message } = FINISHED_BUILDS[state];
  return {
    event: 'build.finished',
    build: {
      id: `build-${state}-${buildNumber}`,
      number: buildNumber,
      state,
      message,
      commit,
      branch: 'main',
      ...buildUrls('sample-pipeline', buildNumber),
      author: { name: 'Test Author', email: 'author@example.com' },
    },
    pipeline: DEFAULT_PIPELINE,
  };
}

export function mockJobFinished(exitStatus: number, buildNumber: number): WebhookPayload {
  const passed = exitStatus === 0;
  const jobId = passed ? 'job-tests-123' : 'job-lint-456';
  return {
    event: 'job.finished',
    job: {
      id: jobId,
      name: passed ? 'Unit Tests' : 'Linting',
      command: 'npm test',
      state: passed ? 'passed' : 'failed',
      exit_status: exitStatus,
      web_url: `${ORG_URL}/sample-pipeline/builds/${buildNumber}#${jobId}`,
    },
    pipeline: DEFAULT_PIPELINE,
  };
}

/** A build on a pipeline whose name routes it to a per-project channel. */
export function mockRoutedBuild(pipelineName: string, buildNumber: number): WebhookPayload {
  return {
    event: 'build.started',
    build: {
      id: `${pipelineName}-build-${buildNumber}`,
      number: buildNumber,
      state: 'running',
      message: `Update ${pipelineName} resources`,
      commit: 'e5f60718293a4b5c6d7e8f901234567890123456',
      branch: 'main',
      ...buildUrls(pipelineName, buildNumber),
    },
    pipeline: pipeline(pipelineName, pipelineName),
  };
}

export function isScenario(value: string): value is Scenario {
  return (SCENARIOS as readonly string[]).includes(value);
}

/**
 * Payloads for a named scenario, in send order.
 * Throws `UnknownScenarioError` for names outside `SCENARIOS`.
 */
export function buildTestScenario(eventType: string, buildNumber: number): WebhookPayload[] {
  if (!isScenario(eventType)) {
    throw new UnknownScenarioError(eventType, SCENARIOS);
  }

  switch (eventType) {
    case 'build-started':
      return [mockBuildStarted(buildNumber)];
    case 'build-passed':
      return [mockBuildFinished('passed', buildNumber)];
    case 'build-failed':
      return [mockBuildFinished('failed', buildNumber)];
    case 'build-canceled':
      return [mockBuildFinished('canceled', buildNumber)];
    case 'job-passed':
      return [mockJobFinished(0, buildNumber)];
    case 'job-failed':
      return [mockJobFinished(1, buildNumber)];
    case 'all':
      return [
        mockBuildStarted(buildNumber),
        mockJobFinished(0, buildNumber),
        mockJobFinished(1, buildNumber),
        mockBuildFinished('passed', buildNumber),
      ];
    case 'scenario':
      return [
        mockBuildStarted(buildNumber),
        mockJobFinished(0, buildNumber),
        mockJobFinished(1, buildNumber),
        mockBuildFinished('failed', buildNumber),
      ];
    case 'lang-routing':
      return [mockRoutedBuild('lang-sample-x-private', buildNumber)];
    case 'keyboard-routing':
      return [mockRoutedBuild('keyboard-sample-public', buildNumber)];
  }
}
