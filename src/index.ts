// src/index.ts
import { createApp } from './api';
import { createLocalOrchestrator, loadStackFile } from './bootstrap';
import { loadSettings } from './config';
import { createLogger } from './logger';

export * from './collaborators';
export * from './errors';
export { buildResourceGraph, configHash, ResourceGraph } from './compiler/graph';
export { checkInvariants } from './compiler/invariants';
export type { InvariantViolation, Severity } from './compiler/invariants';
export { diffStacks } from './compiler/diff';
export { parseStack } from './compiler/parser';
export { validateStack, resolveDeployTargets } from './compiler/validate';
export type * from './compiler/ir';
export { ProvisioningExecutor } from './provisioning/executor';
export type { ApplyResult, DestroyResult, PlanResult } from './provisioning/executor';
export type * from './provisioning/state';
export { ApprovalGate } from './pipeline/approvals';
export { EnvironmentLocks } from './pipeline/locks';
export { PipelineOrchestrator } from './pipeline/orchestrator';
export type * from './pipeline/types';
export { isTerminal, STAGES, TERMINAL_STATUSES } from './pipeline/types';
export { MemoryStateStore } from './store/state-store';
export type { StateStore } from './store/state-store';
export { FileStateStore } from './store/file-state-store';
export { HttpEndpointProbe } from './probes/http-endpoint-probe';
export { createApp } from './api';

async function main() {
  const settings = loadSettings();
  const logger = createLogger({ level: settings.logLevel });

  const stack = settings.stackFile ? await loadStackFile(settings.stackFile) : undefined;
  const orchestrator = stack
    ? createLocalOrchestrator({
        stack,
        stateDir: settings.stateDir,
        lockMode: settings.lockMode,
        logger,
        probe: true
      })
    : undefined;

  const app = createApp({ logger, stack, orchestrator });
  app.listen(settings.port, () => {
    logger.info(
      { port: settings.port, stack: stack?.name ?? null },
      `stackpipe API listening on http://localhost:${settings.port}`
    );
  });
}

if (require.main === module) {
  main().catch((err) => {
    console.error('Failed to start:', err);
    process.exit(1);
  });
}
