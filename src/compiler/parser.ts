// src/compiler/parser.ts
import crypto from 'crypto';
import YAML from 'js-yaml';
import { z, ZodIssue } from 'zod';
import { errorMessage } from '../errors';
import { ParamValue, RESOURCE_KINDS, StackIR } from './ir';

const paramValueSchema: z.ZodType<ParamValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(paramValueSchema),
    z.record(paramValueSchema)
  ])
);

const unitSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9-]*$/, 'must be lowercase kebab-case'),
  kind: z.enum(RESOURCE_KINDS),
  params: z.record(paramValueSchema).default({}),
  dependsOn: z.array(z.string()).default([])
});

const environmentSchema = z.object({
  autoDeploy: z.boolean().default(false),
  requiresManualApproval: z.boolean().default(false),
  teardownAllowed: z.boolean().default(false),
  approvalTimeoutMs: z.number().int().positive().optional()
});

const stackSchema = z
  .object({
    name: z.string().min(1),
    units: z.array(unitSchema).min(1),
    environments: z.record(environmentSchema),
    branches: z.record(z.string()).default({}),
    model: z
      .object({
        name: z.string().min(1),
        version: z.string().min(1),
        artifactPath: z.string().min(1).optional(),
        metricsPath: z.string().min(1).optional()
      })
      .default({ name: 'model', version: 'v1' }),
    deploy: z.object({
      artifactStore: z.string().optional(),
      endpoint: z.string().optional(),
      codePackage: z.string().min(1)
    }),
    test: z
      .object({
        predictFeatures: z.array(z.number()).min(1).optional()
      })
      .default({})
  })
  .superRefine((stack, ctx) => {
    if (Object.keys(stack.environments).length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['environments'],
        message: 'at least one environment is required'
      });
    }
    for (const [branch, env] of Object.entries(stack.branches)) {
      if (!(env in stack.environments)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['branches', branch],
          message: `unknown environment "${env}"`
        });
      }
    }
  });

export type ParseFormat = 'yaml' | 'json';

export interface ParseResult {
  stack?: StackIR;
  errors: string[];
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((e: ZodIssue) => `${e.path.join('.') || '(root)'}: ${e.message}`)
    .join('; ');
}

export function parseStack(rawConfig: string, format: ParseFormat): ParseResult {
  const errors: string[] = [];
  let parsed: unknown;

  try {
    if (format === 'yaml') {
      parsed = YAML.load(rawConfig);
    } else {
      parsed = JSON.parse(rawConfig);
    }
  } catch (err) {
    errors.push(
      `Failed to parse ${format.toUpperCase()}: ${errorMessage(err)}`
    );
    return { errors };
  }

  const result = stackSchema.safeParse(parsed);
  if (!result.success) {
    errors.push('Schema validation failed: ' + formatIssues(result.error.issues));
    return { errors };
  }

  const data = result.data;
  const hash = crypto
    .createHash('sha256')
    .update(rawConfig)
    .digest('hex')
    .slice(0, 12);

  const stack: StackIR = {
    name: data.name,
    units: data.units.map((u) => ({
      name: u.name,
      kind: u.kind,
      params: u.params,
      dependsOn: u.dependsOn
    })),
    environments: data.environments,
    branches: data.branches,
    model: data.model,
    deploy: data.deploy,
    test: data.test,
    metadata: {
      sourceFormat: format,
      rawHash: hash
    }
  };

  return { stack, errors };
}
