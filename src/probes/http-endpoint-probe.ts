// src/probes/http-endpoint-probe.ts
import { z } from 'zod';
import { CheckResult, EndpointProbe } from '../collaborators';
import { UnitOutputs } from '../compiler/ir';

const healthSchema = z.object({ status: z.string() });
const predictionSchema = z.object({ prediction: z.number() });

export interface HttpEndpointProbeOptions {
  timeoutMs?: number;
  /** Sent as x-functions-key on the predict call */
  functionKey?: string;
}

/**
 * Functional checks against a deployed endpoint: `GET /api/health` must
 * report `healthy`, `POST /api/predict` must return a numeric prediction.
 */
export class HttpEndpointProbe implements EndpointProbe {
  private readonly timeoutMs: number;
  private readonly functionKey?: string;

  constructor(options: HttpEndpointProbeOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.functionKey = options.functionKey;
  }

  private baseUrl(outputs: UnitOutputs): string | undefined {
    return outputs.url?.replace(/\/+$/, '');
  }

  async checkHealth(endpointOutputs: UnitOutputs): Promise<CheckResult> {
    const base = this.baseUrl(endpointOutputs);
    if (!base) {
      return { name: 'health', passed: false, detail: 'endpoint has no url output' };
    }

    const res = await fetch(`${base}/api/health`, {
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    if (!res.ok) {
      return { name: 'health', passed: false, detail: `HTTP ${res.status}` };
    }

    const body = healthSchema.safeParse(await res.json());
    if (!body.success || body.data.status !== 'healthy') {
      return { name: 'health', passed: false, detail: 'endpoint did not report healthy' };
    }
    return { name: 'health', passed: true };
  }

  async checkPrediction(
    endpointOutputs: UnitOutputs,
    features: number[]
  ): Promise<CheckResult> {
    const base = this.baseUrl(endpointOutputs);
    if (!base) {
      return { name: 'predict', passed: false, detail: 'endpoint has no url output' };
    }

    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.functionKey) headers['x-functions-key'] = this.functionKey;

    const res = await fetch(`${base}/api/predict`, {
      method: 'POST',
      headers,
      body: JSON.stringify({ features }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    if (res.status !== 200) {
      return { name: 'predict', passed: false, detail: `HTTP ${res.status}` };
    }

    const body = predictionSchema.safeParse(await res.json());
    if (!body.success) {
      return { name: 'predict', passed: false, detail: 'response has no numeric prediction' };
    }
    return { name: 'predict', passed: true, detail: `prediction=${body.data.prediction}` };
  }
}
