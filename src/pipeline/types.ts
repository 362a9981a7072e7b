// src/pipeline/types.ts
import { ErrorKind } from '../errors';
import { UnitOutputs } from '../compiler/ir';

export const STAGES = ['validate', 'plan', 'deploy', 'test', 'teardown'] as const;
export type Stage = (typeof STAGES)[number];

export type StageOutcome =
  | 'pending'
  | 'success'
  | 'failed'
  | 'skipped'
  | 'awaiting-approval';

export type RunStatus =
  | 'pending'
  | 'running'
  | 'awaiting-approval'
  | 'succeeded'
  | 'failed'
  | 'cancelled'
  | 'destroyed';

export type TriggerKind = 'commit' | 'schedule' | 'manual';
export type RunAction = 'deploy' | 'teardown';

export type DeploySubStep = 'apply' | 'train' | 'publish' | 'deploy-endpoint';

export interface StageRecord {
  outcome: StageOutcome;
  startedAt?: string;
  finishedAt?: string;
  detail: string[];
}

export interface RunFailure {
  stage: Stage;
  kind: ErrorKind;
  message: string;
  unit?: string;
  subStep?: DeploySubStep;
  checks?: string[];
}

export interface PipelineRun {
  id: string;
  action: RunAction;
  environment: string;
  branch?: string;
  trigger: TriggerKind;
  status: RunStatus;
  stages: Record<Stage, StageRecord>;
  planRef?: string;
  outputs: Record<string, UnitOutputs>;
  artifactUri?: string;
  failure?: RunFailure;
  createdAt: string;
  updatedAt: string;
}

export interface TriggerRequest {
  environment?: string;
  branch?: string;
  trigger: TriggerKind;
  action?: RunAction;
}

export const TERMINAL_STATUSES: readonly RunStatus[] = [
  'succeeded',
  'failed',
  'cancelled',
  'destroyed'
];

export function isTerminal(status: RunStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
