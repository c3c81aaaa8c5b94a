import { z } from 'zod';

/**
 * Zod schema for the inbound webhook body.
 *
 * Mirrors the CI provider's payload: every field except `event` is optional
 * and may be `null`. Unknown fields are stripped. Normalization into the
 * tagged `CiEvent` union happens in `normalize-event.ts`.
 */
const text = z.string().nullish();

const authorSchema = z.object({
  name: text,
  email: text,
});

const buildSchema = z.object({
  id: text,
  number: z.number().int().nullish(),
  state: text,
  message: text,
  commit: text,
  branch: text,
  url: text,
  web_url: text,
  author: authorSchema.nullish(),
});

const jobSchema = z.object({
  id: text,
  name: text,
  command: text,
  state: text,
  exit_status: z.number().int().nullish(),
  web_url: text,
});

const providerSchema = z.object({
  id: text,
  settings: z.object({ repository: text }).nullish(),
  repository_url: text,
});

const pipelineSchema = z.object({
  id: text,
  name: text,
  slug: text,
  url: text,
  web_url: text,
  repository: text,
  provider: providerSchema.nullish(),
});

const agentSchema = z.object({
  id: text,
  name: text,
  hostname: text,
  version: text,
  connection_state: text,
  ip_address: text,
});

const annotationSchema = z.object({
  id: text,
  body: text,
  style: text,
  context: text,
  created_at: text,
  updated_at: text,
});

export const webhookPayloadSchema = z.object({
  event: z.string(),
  build: buildSchema.nullish(),
  job: jobSchema.nullish(),
  pipeline: pipelineSchema.nullish(),
  agent: agentSchema.nullish(),
  annotation: annotationSchema.nullish(),
});

/** A validated webhook body, still in wire shape. */
export type WebhookPayload = z.infer<typeof webhookPayloadSchema>;

export type WebhookPipeline = z.infer<typeof pipelineSchema>;
