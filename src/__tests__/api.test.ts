import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { once } from 'events';
import { Server } from 'http';
import { z } from 'zod';
import { createApp } from '../api';
import { PipelineOrchestrator } from '../pipeline/orchestrator';
import { MemoryStateStore } from '../store/state-store';
import {
  FakeDeployer,
  FakeProbe,
  FakeResourceProvider,
  FakeTrainer,
  servingStack,
  silentLogger
} from './fakes';

const runBody = z.object({ run: z.object({ id: z.string(), status: z.string() }) });
const errorBody = z.object({ error: z.object({ kind: z.string(), message: z.string() }) });

const STACK_YAML = `
name: api-test
units:
  - name: store
    kind: object-store
    params: { publicAccess: true }
  - name: api
    kind: compute-endpoint
    dependsOn: [store]
environments:
  dev: { autoDeploy: true }
deploy:
  codePackage: ./app
`;

async function listen(app: ReturnType<typeof createApp>): Promise<{ server: Server; base: string }> {
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  return { server, base: `http://127.0.0.1:${address.port}` };
}

function post(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body)
  });
}

describe('HTTP API', () => {
  let server: Server;
  let base: string;

  beforeAll(async () => {
    const stack = servingStack();
    const orchestrator = new PipelineOrchestrator({
      stack,
      provider: new FakeResourceProvider(),
      trainer: new FakeTrainer(),
      deployer: new FakeDeployer(),
      store: new MemoryStateStore(),
      logger: silentLogger,
      probe: new FakeProbe()
    });
    ({ server, base } = await listen(createApp({ logger: silentLogger, stack, orchestrator })));
  });

  afterAll(async () => {
    server.close();
    await once(server, 'close');
  });

  async function runStatus(id: string): Promise<string> {
    const res = await fetch(`${base}/api/runs/${id}`);
    return runBody.parse(await res.json()).run.status;
  }

  describe('POST /api/validate', () => {
    it('should return the order and lint findings of a stack', async () => {
      const res = await post(`${base}/api/validate`, { config: STACK_YAML, format: 'yaml' });

      expect(res.status).toBe(200);
      const body = z
        .object({
          order: z.array(z.string()),
          violations: z.array(z.object({ id: z.string(), unitName: z.string() })),
          errors: z.array(z.string())
        })
        .parse(await res.json());
      expect(body.order).toEqual(['store', 'api']);
      expect(body.violations.map((v) => `${v.id}@${v.unitName}`)).toEqual([
        'R1_NO_PUBLIC_STORE@store',
        'R2_ENDPOINT_REQUIRES_SECRETS@api',
        'R3_ENDPOINT_REQUIRES_TELEMETRY@api'
      ]);
      expect(body.errors).toEqual([
        '2 blocking violation(s): R1_NO_PUBLIC_STORE @ store, R2_ENDPOINT_REQUIRES_SECRETS @ api'
      ]);
    });

    it('should reject a request without config', async () => {
      const res = await post(`${base}/api/validate`, { format: 'yaml' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'config (string) and format ("yaml" | "json") are required.'
      });
    });
  });

  describe('POST /api/diff', () => {
    it('should compare two stack files unit by unit', async () => {
      const res = await post(`${base}/api/diff`, {
        oldConfig: STACK_YAML,
        newConfig: STACK_YAML.replace('{ publicAccess: true }', '{ publicAccess: false }'),
        format: 'yaml'
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        diff: {
          summary: {
            added: 0,
            removed: 0,
            modified: 1,
            totalNewViolations: 0,
            totalResolvedViolations: 1
          },
          changes: [
            {
              unitName: 'store',
              change: 'modified',
              messages: ['Parameters changed: publicAccess.', 'Violations decreased from 1 to 0.'],
              riskImpact: 'risk_decrease'
            }
          ]
        },
        errors: []
      });
    });
  });

  describe('runs', () => {
    it('should accept a trigger and run it in the background', async () => {
      const res = await post(`${base}/api/runs`, { environment: 'dev', trigger: 'commit' });

      expect(res.status).toBe(202);
      const { run } = runBody.parse(await res.json());
      expect(run.status).toBe('pending');

      await vi.waitFor(async () => {
        expect(await runStatus(run.id)).toBe('succeeded');
      });
    });

    it('should approve a gated run', async () => {
      const res = await post(`${base}/api/runs`, { branch: 'main', trigger: 'commit' });
      const { run } = runBody.parse(await res.json());

      await vi.waitFor(async () => {
        expect(await runStatus(run.id)).toBe('awaiting-approval');
      });
      const approved = await post(`${base}/api/runs/${run.id}/approve`, {});

      expect(approved.status).toBe(202);
      await vi.waitFor(async () => {
        expect(await runStatus(run.id)).toBe('succeeded');
      });
    });

    it('should answer 409 when approving a run that is not waiting', async () => {
      const res = await post(`${base}/api/runs`, { environment: 'staging', trigger: 'manual' });
      const { run } = runBody.parse(await res.json());
      await vi.waitFor(async () => {
        expect(await runStatus(run.id)).toBe('succeeded');
      });

      const approved = await post(`${base}/api/runs/${run.id}/approve`, {});

      expect(approved.status).toBe(409);
      expect(errorBody.parse(await approved.json()).error.kind).toBe('InvalidRunState');
    });

    it('should answer 404 for unknown environments and runs', async () => {
      const unknownEnv = await post(`${base}/api/runs`, { environment: 'qa', trigger: 'manual' });
      const unknownRun = await fetch(`${base}/api/runs/missing`);

      expect(unknownEnv.status).toBe(404);
      expect(errorBody.parse(await unknownEnv.json()).error).toEqual({
        kind: 'UnknownEnvironment',
        message: 'Unknown environment "qa".'
      });
      expect(unknownRun.status).toBe(404);
    });

    it('should reject an invalid trigger body', async () => {
      const res = await post(`${base}/api/runs`, { environment: 'dev', trigger: 'push' });

      expect(res.status).toBe(400);
      expect(errorBody.parse(await res.json()).error.message).toMatch(/^Invalid trigger: trigger: /);
    });
  });

  describe('environments', () => {
    it('should plan an environment', async () => {
      const res = await post(`${base}/api/environments/staging/plan`, {});

      expect(res.status).toBe(200);
      const body = z
        .object({ plan: z.object({ summary: z.object({ create: z.number() }) }), ref: z.string() })
        .parse(await res.json());
      expect(body.plan.summary.create).toBe(5);
      expect(body.ref).toMatch(/^memory:\/\/plans\//);
    });

    it('should answer 404 for the state of an unknown environment', async () => {
      const res = await fetch(`${base}/api/environments/qa/state`);

      expect(res.status).toBe(404);
    });
  });
});

describe('HTTP API without a stack', () => {
  it('should explain that no stack is loaded', async () => {
    const { server, base } = await listen(createApp({ logger: silentLogger }));
    try {
      const res = await fetch(`${base}/api/stack`);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          kind: 'InvalidConfiguration',
          message: 'No stack file is loaded; set STACKPIPE_STACK_FILE.'
        }
      });
    } finally {
      server.close();
    }
  });
});
