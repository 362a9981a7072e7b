// src/local/local-trainer.ts
import { promises as fs } from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { ModelTrainer, TrainingResult } from '../collaborators';
import { ModelSpec, UnitOutputs } from '../compiler/ir';

const metricsSchema = z.record(z.number());

export interface LocalModelTrainerOptions {
  model: ModelSpec;
  /** A model produced by an external training job */
  artifactPath: string;
  metricsPath?: string;
}

/**
 * Picks up a trained artifact from disk and publishes it into a local object
 * store directory as `<name>_<version>.bin`.
 */
export class LocalModelTrainer implements ModelTrainer {
  constructor(private readonly options: LocalModelTrainerOptions) {}

  async train(): Promise<TrainingResult> {
    const artifact = await fs.readFile(this.options.artifactPath);
    let metrics: Record<string, number> = {};
    if (this.options.metricsPath) {
      const raw = await fs.readFile(this.options.metricsPath, 'utf-8');
      metrics = metricsSchema.parse(JSON.parse(raw));
    }
    return { artifact, metrics };
  }

  async publish(artifact: Buffer, storeOutputs: UnitOutputs): Promise<string> {
    const storePath = storeOutputs.path;
    if (!storePath) {
      throw new Error('Object store outputs have no "path"; is it a local store?');
    }
    const { name, version } = this.options.model;
    const target = path.join(storePath, `${name}_${version}.bin`);
    await fs.mkdir(storePath, { recursive: true });
    await fs.writeFile(target, artifact);
    return pathToFileURL(target).href;
  }
}
