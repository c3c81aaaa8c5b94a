export type {
  CiEvent,
  BuildEvent,
  JobEvent,
  AgentEvent,
  AnnotationEvent,
  PipelineEvent,
  UnknownEvent,
  Build,
  BuildState,
  BuildAction,
  Job,
  JobAction,
  Pipeline,
  RepositoryProvider,
  Agent,
  AgentAction,
  Annotation,
  AnnotationAction,
  AnnotationStyle,
  PipelineAction,
} from './event.js';
export {
  BUILD_ACTIONS,
  JOB_ACTIONS,
  AGENT_ACTIONS,
  ANNOTATION_ACTIONS,
  PIPELINE_ACTIONS,
} from './event.js';
export type { RenderedNotification, ChatMessage, DeliverFn, WebhookOutcome } from './notification.js';
export { ConfigError, ChatDeliveryError, UnknownScenarioError } from './errors.js';
