// src/store/schemas.ts
import { z } from 'zod';
import { RESOURCE_KINDS } from '../compiler/ir';
import { ERROR_KINDS } from '../errors';
import { STAGES } from '../pipeline/types';
import { PLAN_ACTIONS, UNIT_STATUSES } from '../provisioning/state';

const errorDetailsSchema = z.object({
  kind: z.enum(ERROR_KINDS),
  message: z.string(),
  unit: z.string().optional()
});

const unitStateSchema = z.object({
  name: z.string(),
  kind: z.enum(RESOURCE_KINDS),
  status: z.enum(UNIT_STATUSES),
  outputs: z.record(z.string()),
  appliedHash: z.string().optional(),
  appliedInputs: z.string().optional(),
  lastError: errorDetailsSchema.optional(),
  updatedAt: z.string()
});

export const provisionedStateSchema = z.object({
  environment: z.string(),
  units: z.record(unitStateSchema),
  updatedAt: z.string()
});

export const planArtifactSchema = z.object({
  id: z.string(),
  environment: z.string(),
  createdAt: z.string(),
  changes: z.array(
    z.object({
      unit: z.string(),
      kind: z.enum(RESOURCE_KINDS),
      action: z.enum(PLAN_ACTIONS),
      reason: z.string()
    })
  ),
  summary: z.object({
    create: z.number(),
    update: z.number(),
    delete: z.number(),
    unchanged: z.number()
  })
});

const stageRecordSchema = z.object({
  outcome: z.enum(['pending', 'success', 'failed', 'skipped', 'awaiting-approval']),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
  detail: z.array(z.string())
});

export const pipelineRunSchema = z.object({
  id: z.string(),
  action: z.enum(['deploy', 'teardown']),
  environment: z.string(),
  branch: z.string().optional(),
  trigger: z.enum(['commit', 'schedule', 'manual']),
  status: z.enum([
    'pending',
    'running',
    'awaiting-approval',
    'succeeded',
    'failed',
    'cancelled',
    'destroyed'
  ]),
  stages: z.object({
    validate: stageRecordSchema,
    plan: stageRecordSchema,
    deploy: stageRecordSchema,
    test: stageRecordSchema,
    teardown: stageRecordSchema
  }),
  planRef: z.string().optional(),
  outputs: z.record(z.record(z.string())),
  artifactUri: z.string().optional(),
  failure: z
    .object({
      stage: z.enum(STAGES),
      kind: z.enum(ERROR_KINDS),
      message: z.string(),
      unit: z.string().optional(),
      subStep: z.enum(['apply', 'train', 'publish', 'deploy-endpoint']).optional(),
      checks: z.array(z.string()).optional()
    })
    .optional(),
  createdAt: z.string(),
  updatedAt: z.string()
});
