// src/bootstrap.ts
import { promises as fs } from 'fs';
import path from 'path';
import { StackIR } from './compiler/ir';
import { parseStack, ParseFormat } from './compiler/parser';
import { LockMode } from './config';
import { ConfigurationError, errorMessage } from './errors';
import { LocalEndpointDeployer } from './local/local-deployer';
import { LocalResourceProvider } from './local/local-provider';
import { LocalModelTrainer } from './local/local-trainer';
import { Logger } from './logger';
import { ApprovalGate } from './pipeline/approvals';
import { EnvironmentLocks } from './pipeline/locks';
import { PipelineOrchestrator } from './pipeline/orchestrator';
import { HttpEndpointProbe } from './probes/http-endpoint-probe';
import { FileStateStore } from './store/file-state-store';

export function formatFromPath(file: string): ParseFormat {
  return path.extname(file).toLowerCase() === '.json' ? 'json' : 'yaml';
}

/**
 * Reads and parses a stack file. Relative paths inside it are taken relative
 * to the file's directory.
 */
export async function loadStackFile(file: string, format?: ParseFormat): Promise<StackIR> {
  const absolutePath = path.resolve(process.cwd(), file);
  let raw: string;
  try {
    raw = await fs.readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read stack file ${absolutePath}: ${errorMessage(err)}`);
  }

  const result = parseStack(raw, format ?? formatFromPath(absolutePath));
  if (!result.stack) {
    throw new ConfigurationError(result.errors.join('\n'));
  }

  const base = path.dirname(absolutePath);
  const stack = result.stack;
  const resolve = (p: string | undefined) => (p === undefined ? undefined : path.resolve(base, p));
  return {
    ...stack,
    model: {
      ...stack.model,
      artifactPath: resolve(stack.model.artifactPath),
      metricsPath: resolve(stack.model.metricsPath)
    },
    deploy: { ...stack.deploy, codePackage: path.resolve(base, stack.deploy.codePackage) }
  };
}

export interface LocalOrchestratorOptions {
  stack: StackIR;
  stateDir: string;
  lockMode: LockMode;
  logger: Logger;
  /** Run functional checks against the endpoint's url output */
  probe?: boolean;
  approvals?: ApprovalGate;
}

/**
 * Wires the orchestrator to the filesystem emulator and the durable file
 * store under `stateDir`.
 */
export function createLocalOrchestrator(options: LocalOrchestratorOptions): PipelineOrchestrator {
  const { stack, stateDir, logger } = options;
  const artifactPath = stack.model.artifactPath;
  if (!artifactPath) {
    throw new ConfigurationError('model.artifactPath is required for local deployments.');
  }

  return new PipelineOrchestrator({
    stack,
    provider: new LocalResourceProvider(path.join(stateDir, 'cloud')),
    trainer: new LocalModelTrainer({
      model: stack.model,
      artifactPath,
      metricsPath: stack.model.metricsPath
    }),
    deployer: new LocalEndpointDeployer(),
    store: new FileStateStore(stateDir),
    logger,
    probe: options.probe ? new HttpEndpointProbe() : undefined,
    locks: new EnvironmentLocks(options.lockMode),
    approvals: options.approvals
  });
}
