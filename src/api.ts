// src/api.ts
import cors from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { diffStacks, DiffResult } from './compiler/diff';
import { InvariantViolation } from './compiler/invariants';
import { StackIR } from './compiler/ir';
import { formatIssues, parseStack } from './compiler/parser';
import { validateStack } from './compiler/validate';
import { ConfigurationError, ErrorKind, StackError } from './errors';
import { Logger } from './logger';
import { PipelineOrchestrator } from './pipeline/orchestrator';

export interface AppDeps {
  logger: Logger;
  stack?: StackIR;
  orchestrator?: PipelineOrchestrator;
}

const triggerSchema = z.object({
  environment: z.string().optional(),
  branch: z.string().optional(),
  trigger: z.enum(['commit', 'schedule', 'manual']),
  action: z.enum(['deploy', 'teardown']).default('deploy')
});

const STATUS_BY_KIND: Partial<Record<ErrorKind, number>> = {
  RunNotFound: 404,
  UnknownEnvironment: 404,
  InvalidRunState: 409,
  EnvironmentBusy: 409,
  UnknownDependency: 400,
  CyclicDependency: 400,
  DuplicateUnit: 400,
  InvalidConfiguration: 400
};

type Handler = (req: Request, res: Response) => Promise<unknown>;

function asyncHandler(fn: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function violationsOf(stack: StackIR): InvariantViolation[] {
  return validateStack(stack).violations;
}

export function createApp(deps: AppDeps) {
  const { logger } = deps;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  function requireOrchestrator(): { stack: StackIR; orchestrator: PipelineOrchestrator } {
    if (!deps.stack || !deps.orchestrator) {
      throw new ConfigurationError('No stack file is loaded; set STACKPIPE_STACK_FILE.');
    }
    return { stack: deps.stack, orchestrator: deps.orchestrator };
  }

  app.post('/api/validate', (req: Request, res: Response) => {
    const parsedBody = z
      .object({ config: z.string(), format: z.enum(['yaml', 'json']) })
      .safeParse(req.body);

    if (!parsedBody.success) {
      return res.status(400).json({
        error: 'config (string) and format ("yaml" | "json") are required.'
      });
    }

    const { config, format } = parsedBody.data;
    const parseResult = parseStack(config, format);
    if (!parseResult.stack) {
      return res.status(400).json({ errors: parseResult.errors });
    }

    const validation = validateStack(parseResult.stack);
    return res.json({
      order: validation.graph?.names ?? [],
      violations: validation.violations,
      errors: validation.error
        ? [...parseResult.errors, validation.error.message]
        : parseResult.errors
    });
  });

  app.post('/api/diff', (req: Request, res: Response) => {
    const parsedBody = z
      .object({
        oldConfig: z.string(),
        newConfig: z.string(),
        format: z.enum(['yaml', 'json'])
      })
      .safeParse(req.body);

    if (!parsedBody.success) {
      return res.status(400).json({
        error:
          'oldConfig, newConfig (strings) and format ("yaml" | "json") are required.'
      });
    }

    const { oldConfig, newConfig, format } = parsedBody.data;
    const oldParsed = parseStack(oldConfig, format);
    const newParsed = parseStack(newConfig, format);

    const errors = [...oldParsed.errors, ...newParsed.errors];
    if (!oldParsed.stack || !newParsed.stack) {
      return res.status(400).json({ errors });
    }

    const diff: DiffResult = diffStacks(
      oldParsed.stack.units,
      newParsed.stack.units,
      violationsOf(oldParsed.stack),
      violationsOf(newParsed.stack)
    );

    return res.json({ diff, errors });
  });

  app.get(
    '/api/stack',
    asyncHandler(async (_req, res) => {
      const { stack } = requireOrchestrator();
      const validation = validateStack(stack);
      return res.json({
        name: stack.name,
        order: validation.graph?.names ?? [],
        environments: stack.environments,
        branches: stack.branches,
        violations: validation.violations,
        error: validation.error?.toDetails()
      });
    })
  );

  app.post(
    '/api/environments/:env/plan',
    asyncHandler(async (req, res) => {
      const { stack, orchestrator } = requireOrchestrator();
      const environment = orchestrator.resolveEnvironment({ environment: req.params.env });
      const validation = validateStack(stack);
      if (validation.error || !validation.graph) {
        throw validation.error ?? new ConfigurationError('Stack is invalid.');
      }
      const result = await orchestrator.executorFor(environment).plan(validation.graph);
      return res.json(result);
    })
  );

  app.get(
    '/api/environments/:env/state',
    asyncHandler(async (req, res) => {
      const { orchestrator } = requireOrchestrator();
      const environment = orchestrator.resolveEnvironment({ environment: req.params.env });
      return res.json(await orchestrator.executorFor(environment).state());
    })
  );

  app.post(
    '/api/runs',
    asyncHandler(async (req, res) => {
      const { orchestrator } = requireOrchestrator();
      const parsed = triggerSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ConfigurationError(`Invalid trigger: ${formatIssues(parsed.error.issues)}`);
      }

      const run = await orchestrator.trigger(parsed.data);
      orchestrator.execute(run.id).catch((err: unknown) => {
        logger.error({ err, runId: run.id }, 'Pipeline run crashed');
      });
      return res.status(202).json({ run });
    })
  );

  app.get(
    '/api/runs',
    asyncHandler(async (_req, res) => {
      const { orchestrator } = requireOrchestrator();
      return res.json({ runs: await orchestrator.listRuns() });
    })
  );

  app.get(
    '/api/runs/:id',
    asyncHandler(async (req, res) => {
      const { orchestrator } = requireOrchestrator();
      return res.json({ run: await orchestrator.getRun(req.params.id) });
    })
  );

  app.post(
    '/api/runs/:id/approve',
    asyncHandler(async (req, res) => {
      const { orchestrator } = requireOrchestrator();
      await orchestrator.approve(req.params.id);
      return res.status(202).json({ run: await orchestrator.getRun(req.params.id) });
    })
  );

  app.post(
    '/api/runs/:id/reject',
    asyncHandler(async (req, res) => {
      const { orchestrator } = requireOrchestrator();
      await orchestrator.reject(req.params.id);
      return res.status(202).json({ run: await orchestrator.getRun(req.params.id) });
    })
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof StackError) {
      const status = STATUS_BY_KIND[err.kind] ?? 500;
      return res.status(status).json({ error: err.toDetails() });
    }
    logger.error({ err }, 'Unhandled API error');
    return res.status(500).json({ error: { kind: 'StepFailed', message: 'Internal server error' } });
  });

  return app;
}
