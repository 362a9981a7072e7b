#!/usr/bin/env node
// src/cli/stackpipe-cli.ts
import path from 'path';
import readline from 'readline/promises';
import { createLocalOrchestrator, loadStackFile } from '../bootstrap';
import { ParseFormat } from '../compiler/parser';
import { validateStack } from '../compiler/validate';
import { loadSettings } from '../config';
import { errorMessage, StackError } from '../errors';
import { createLogger } from '../logger';
import { ApprovalDecision, ApprovalGate } from '../pipeline/approvals';
import { PipelineRun, STAGES, TriggerKind } from '../pipeline/types';
import { FileStateStore } from '../store/file-state-store';

export function printUsage() {
  console.log('stackpipe CLI');
  console.log('Usage:');
  console.log('  stackpipe validate <stack-file>');
  console.log('  stackpipe plan <stack-file> --env <environment>');
  console.log('  stackpipe deploy <stack-file> (--env <environment> | --branch <branch>) [--approve] [--probe] [--trigger commit|schedule|manual]');
  console.log('  stackpipe teardown <stack-file> --env <environment> [--trigger schedule|manual]');
  console.log('  stackpipe state --env <environment>');
  console.log('');
  console.log('Global options:');
  console.log('  --format yaml|json  stack file format (default: from the file extension)');
  console.log('  --state-dir <dir>   where state, plans and runs are kept (default .stackpipe)');
  console.log('');
  console.log('Deploy options:');
  console.log('  --approve           approve a gated deployment without prompting');
  console.log('  --probe             check the endpoint health and prediction routes after deploying');
  console.log('');
  console.log('Examples:');
  console.log('  stackpipe validate ./examples/ml-serving.yaml');
  console.log('  stackpipe deploy ./examples/ml-serving.yaml --env dev');
}

function flag(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index !== -1 && args[index + 1] && !args[index + 1].startsWith('--')) {
    return args[index + 1];
  }
  return undefined;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

/**
 * Approves from the command line: `--approve` says yes up front, otherwise
 * the operator is asked on the terminal.
 */
class TerminalApprovalGate extends ApprovalGate {
  constructor(private readonly preApproved: boolean, private readonly environment: string) {
    super();
  }

  override async wait(runId: string, timeoutMs?: number): Promise<ApprovalDecision> {
    if (this.preApproved) return 'approved';
    if (!process.stdin.isTTY) {
      console.error(`Environment "${this.environment}" requires approval; pass --approve.`);
      return 'rejected';
    }

    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    const signal = timeoutMs === undefined ? undefined : AbortSignal.timeout(timeoutMs);
    try {
      const answer = await rl.question(
        `Approve deployment of run ${runId} to "${this.environment}"? [y/N] `,
        { signal }
      );
      return /^y(es)?$/i.test(answer.trim()) ? 'approved' : 'rejected';
    } catch (err) {
      if (signal?.aborted) return 'timeout';
      throw err;
    } finally {
      rl.close();
    }
  }
}

function printRun(run: PipelineRun) {
  console.log(`Run ${run.id} (${run.action}, ${run.environment}, ${run.trigger}): ${run.status}`);
  for (const stage of STAGES) {
    const record = run.stages[stage];
    console.log(`  ${stage.padEnd(9)} ${record.outcome}`);
    for (const line of record.detail) {
      console.log(`            ${line}`);
    }
  }
  if (run.artifactUri) {
    console.log(`Artifact: ${run.artifactUri}`);
  }
  if (run.failure) {
    const where = [run.failure.subStep, run.failure.unit].filter(Boolean).join(' @ ');
    console.log(
      `❌ ${run.failure.kind} in ${run.failure.stage}${where ? ` (${where})` : ''}: ${run.failure.message}`
    );
  }
}

function parseTrigger(value: string | undefined, fallback: TriggerKind): TriggerKind {
  if (value === undefined) return fallback;
  if (value === 'commit' || value === 'schedule' || value === 'manual') return value;
  fail('Invalid trigger. Use "commit", "schedule" or "manual".');
}

async function main() {
  const [, , command, ...rest] = process.argv;

  if (!command || command === '--help' || command === '-h') {
    printUsage();
    process.exit(0);
  }

  const settings = loadSettings();
  const stateDir = path.resolve(flag(rest, '--state-dir') ?? settings.stateDir);
  const logger = createLogger({ level: settings.logLevel ?? 'warn' });

  if (command === 'state') {
    const env = flag(rest, '--env') ?? fail('Missing --env <environment>');
    const state = await new FileStateStore(stateDir).loadState(env);
    const units = Object.values(state.units);
    if (units.length === 0) {
      console.log(`No state recorded for "${env}".`);
      return;
    }
    for (const unit of units) {
      console.log(`  ${unit.name.padEnd(20)} ${unit.kind.padEnd(17)} ${unit.status}`);
    }
    return;
  }

  if (!['validate', 'plan', 'deploy', 'teardown'].includes(command)) {
    console.error(`Unknown command: ${command}`);
    printUsage();
    process.exit(1);
  }

  const stackPath = rest[0];
  if (!stackPath || stackPath.startsWith('--')) {
    console.error('Missing <stack-file>');
    printUsage();
    process.exit(1);
  }

  let format: ParseFormat | undefined;
  const formatValue = flag(rest, '--format');
  if (formatValue !== undefined) {
    if (formatValue === 'yaml' || formatValue === 'json') {
      format = formatValue;
    } else {
      fail('Invalid format. Use "yaml" or "json".');
    }
  }

  const stack = await loadStackFile(stackPath, format);
  const validation = validateStack(stack);

  if (command === 'validate') {
    console.log(`Config hash: ${stack.metadata?.rawHash}`);
    console.log(`Units: ${stack.units.length}`);
    if (validation.graph) {
      console.log(`Order: ${validation.graph.names.join(' -> ')}`);
    }
    console.log('');

    if (validation.violations.length === 0) {
      console.log('✅ No invariant violations found.');
    } else {
      console.log(`Found ${validation.violations.length} violation(s):`);
      for (const v of validation.violations) {
        console.log(`  [${v.severity.toUpperCase()}] ${v.id} @ ${v.unitName} -> ${v.description}`);
      }
    }
    if (validation.error) {
      fail(`❌ ${validation.error.kind}: ${validation.error.message}`);
    }
    return;
  }

  if (validation.error || !validation.graph) {
    fail(`❌ ${validation.error?.kind ?? 'InvalidConfiguration'}: ${validation.error?.message ?? 'invalid stack'}`);
  }

  const envFlag = flag(rest, '--env');
  const branch = flag(rest, '--branch');
  const approvals = new TerminalApprovalGate(rest.includes('--approve'), envFlag ?? branch ?? '');
  const orchestrator = createLocalOrchestrator({
    stack,
    stateDir,
    lockMode: settings.lockMode,
    logger,
    probe: rest.includes('--probe'),
    approvals
  });

  if (command === 'plan') {
    const env = orchestrator.resolveEnvironment({ environment: envFlag ?? fail('Missing --env <environment>') });
    const { plan, ref } = await orchestrator.executorFor(env).plan(validation.graph);
    for (const change of plan.changes) {
      console.log(`  ${change.action.padEnd(6)} ${change.unit} (${change.kind}): ${change.reason}`);
    }
    const { summary } = plan;
    console.log(
      `Plan: ${summary.create} to create, ${summary.update} to update, ${summary.delete} to delete, ${summary.unchanged} unchanged.`
    );
    console.log(`Saved to ${ref}`);
    return;
  }

  const run =
    command === 'deploy'
      ? await orchestrator.start({
          environment: envFlag,
          branch,
          trigger: parseTrigger(flag(rest, '--trigger'), 'manual'),
          action: 'deploy'
        })
      : await orchestrator.start({
          environment: envFlag ?? fail('Missing --env <environment>'),
          trigger: parseTrigger(flag(rest, '--trigger'), 'manual'),
          action: 'teardown'
        });

  printRun(run);
  if (run.status === 'failed') process.exit(1);
  if (run.status === 'cancelled') process.exit(2);
}

if (require.main === module) {
  main().catch((err) => {
    if (err instanceof StackError) {
      console.error(`❌ ${err.kind}: ${err.message}`);
    } else {
      console.error('Unexpected error:', errorMessage(err));
    }
    process.exit(1);
  });
}
