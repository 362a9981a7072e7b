import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { pathToFileURL } from 'url';
import { createLocalOrchestrator, formatFromPath, loadStackFile } from '../bootstrap';
import { validateStack } from '../compiler/validate';
import { ConfigurationError } from '../errors';
import { FileStateStore } from '../store/file-state-store';
import { silentLogger } from './fakes';

const EXAMPLES = path.resolve(__dirname, '..', '..', 'examples');
const EXAMPLE_STACK = path.join(EXAMPLES, 'ml-serving.yaml');

describe('bootstrap', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stackpipe-bootstrap-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('formatFromPath', () => {
    it('should pick the format from the extension', () => {
      expect(formatFromPath('stack.JSON')).toBe('json');
      expect(formatFromPath('stack.yml')).toBe('yaml');
      expect(formatFromPath('stack')).toBe('yaml');
    });
  });

  describe('loadStackFile', () => {
    it('should resolve paths against the stack file directory', async () => {
      const stack = await loadStackFile(EXAMPLE_STACK);

      expect(stack.name).toBe('ml-serving');
      expect(stack.model.artifactPath).toBe(path.join(EXAMPLES, 'model', 'model.bin'));
      expect(stack.model.metricsPath).toBe(path.join(EXAMPLES, 'model', 'metrics.json'));
      expect(stack.deploy.codePackage).toBe(path.join(EXAMPLES, 'function_app'));
    });

    it('should load a stack that validates cleanly', async () => {
      const result = validateStack(await loadStackFile(EXAMPLE_STACK));

      expect(result.error).toBeUndefined();
      expect(result.violations).toEqual([]);
      expect(result.graph?.names).toEqual(['net', 'store', 'secrets', 'telemetry', 'endpoint']);
    });

    it('should fail on a missing file', async () => {
      const missing = path.join(dir, 'missing.yaml');

      await expect(loadStackFile(missing)).rejects.toBeInstanceOf(ConfigurationError);
      await expect(loadStackFile(missing)).rejects.toThrow(`Cannot read stack file ${missing}: `);
    });

    it('should fail with the parse errors of an invalid file', async () => {
      const file = path.join(dir, 'stack.yaml');
      await fs.writeFile(file, 'name: broken\n', 'utf-8');

      await expect(loadStackFile(file)).rejects.toThrow(/^Schema validation failed: /);
    });
  });

  describe('createLocalOrchestrator', () => {
    it('should require a model artifact', async () => {
      const stack = await loadStackFile(EXAMPLE_STACK);

      expect(() =>
        createLocalOrchestrator({
          stack: { ...stack, model: { name: 'classifier', version: 'v1' } },
          stateDir: dir,
          lockMode: 'queue',
          logger: silentLogger
        })
      ).toThrow('model.artifactPath is required for local deployments.');
    });

    it('should deploy and tear down the example stack on the filesystem', async () => {
      const stack = await loadStackFile(EXAMPLE_STACK);
      const orchestrator = createLocalOrchestrator({
        stack,
        stateDir: dir,
        lockMode: 'queue',
        logger: silentLogger
      });

      const deployed = await orchestrator.start({ branch: 'develop', trigger: 'commit' });

      expect(deployed.status).toBe('succeeded');
      expect(deployed.stages.deploy.detail[1]).toBe('train: accuracy=0.94, f1=0.93');
      const storePath = path.join(dir, 'cloud', 'stores', 'store', 'models');
      expect(deployed.artifactUri).toBe(
        pathToFileURL(path.join(storePath, 'classifier_v1.bin')).href
      );
      expect(deployed.outputs.secrets['secret:storage-connection']).toBe('local://stores/store');
      const deployment = await fs.readFile(
        path.join(dir, 'cloud', 'endpoints', 'endpoint', 'deployment.json'),
        'utf-8'
      );
      expect(deployment).toContain(JSON.stringify(path.join(EXAMPLES, 'function_app')));

      const persisted = await new FileStateStore(dir).loadState('dev');
      expect(Object.values(persisted.units).map((u) => u.status)).toEqual([
        'applied',
        'applied',
        'applied',
        'applied',
        'applied'
      ]);

      const torn = await orchestrator.start({
        environment: 'dev',
        trigger: 'manual',
        action: 'teardown'
      });

      expect(torn.status).toBe('destroyed');
      await expect(fs.access(path.join(dir, 'cloud', 'stores', 'store'))).rejects.toThrow();
      expect((await new FileStateStore(dir).listRuns()).map((r) => r.status)).toEqual([
        'succeeded',
        'destroyed'
      ]);
    });
  });
});
