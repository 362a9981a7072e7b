// src/config.ts
import { z } from 'zod';
import { formatIssues } from './compiler/parser';
import { ConfigurationError } from './errors';

const settingsSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .optional(),
  STACKPIPE_STATE_DIR: z.string().min(1).default('.stackpipe'),
  STACKPIPE_STACK_FILE: z.string().min(1).optional(),
  STACKPIPE_LOCK_MODE: z.enum(['queue', 'reject']).default('queue')
});

export type LockMode = 'queue' | 'reject';

export interface Settings {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel?: string;
  stateDir: string;
  stackFile?: string;
  lockMode: LockMode;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = settingsSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid settings: ${formatIssues(result.error.issues)}`
    );
  }

  const data = result.data;
  return {
    port: data.PORT,
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    stateDir: data.STACKPIPE_STATE_DIR,
    stackFile: data.STACKPIPE_STACK_FILE,
    lockMode: data.STACKPIPE_LOCK_MODE
  };
}
