// src/local/local-provider.ts
import crypto from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  CreateRequest,
  DestroyRequest,
  ResourceHealth,
  ResourceProvider
} from '../collaborators';
import { RESOURCE_KINDS, ResourceKind, UnitOutputs, UnitParams } from '../compiler/ir';
import { ProviderPermanentError } from '../errors';

const registrySchema = z.record(
  z.object({
    kind: z.enum(RESOURCE_KINDS),
    outputs: z.record(z.string()),
    createdAt: z.string()
  })
);

type Registry = z.infer<typeof registrySchema>;

function stringParam(params: UnitParams, key: string, fallback: string, unit: string): string {
  const value = params[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new ProviderPermanentError(`Parameter "${key}" must be a string.`, unit);
  }
  return value;
}

/**
 * Emulates the cloud on the local filesystem, in the spirit of a storage
 * emulator: stores and endpoints are directories, everything else is an
 * entry in resources.json.
 */
export class LocalResourceProvider implements ResourceProvider {
  constructor(private readonly dir: string) {}

  private get registryFile(): string {
    return path.join(this.dir, 'resources.json');
  }

  private async load(): Promise<Registry> {
    try {
      const raw = await fs.readFile(this.registryFile, 'utf-8');
      return registrySchema.parse(JSON.parse(raw));
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
      throw err;
    }
  }

  private async save(registry: Registry): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(this.registryFile, JSON.stringify(registry, null, 2) + '\n', 'utf-8');
  }

  private async outputsFor(request: CreateRequest): Promise<UnitOutputs> {
    const { name, kind, params } = request;
    const id = `${kind}/${name}`;

    switch (kind) {
      case 'network-boundary':
        return { id, addressSpace: stringParam(params, 'addressSpace', '10.0.0.0/16', name) };
      case 'object-store': {
        const container = stringParam(params, 'container', 'models', name);
        const storePath = path.join(this.dir, 'stores', name, container);
        await fs.mkdir(storePath, { recursive: true });
        return {
          id,
          container,
          path: storePath,
          connectionString: `local://stores/${name}`
        };
      }
      case 'secret-store': {
        const outputs: UnitOutputs = { id, vaultUri: `local://vaults/${name}` };
        for (const [key, value] of Object.entries(params)) {
          if (key.startsWith('secret:') && typeof value === 'string') {
            outputs[key] = value;
          }
        }
        return outputs;
      }
      case 'compute-endpoint': {
        const endpointPath = path.join(this.dir, 'endpoints', name);
        await fs.mkdir(endpointPath, { recursive: true });
        return {
          id,
          path: endpointPath,
          url: stringParam(params, 'url', 'http://localhost:7071', name)
        };
      }
      case 'telemetry-sink':
        return {
          id,
          instrumentationKey: crypto.createHash('sha256').update(id).digest('hex').slice(0, 32)
        };
    }
  }

  async create(request: CreateRequest): Promise<UnitOutputs> {
    const outputs = await this.outputsFor(request);
    const registry = await this.load();
    registry[request.name] = {
      kind: request.kind,
      outputs,
      createdAt: new Date().toISOString()
    };
    await this.save(registry);
    return outputs;
  }

  async destroy(request: DestroyRequest): Promise<void> {
    const registry = await this.load();
    delete registry[request.name];
    await this.save(registry);

    if (request.kind === 'object-store' || request.kind === 'compute-endpoint') {
      const sub = request.kind === 'object-store' ? 'stores' : 'endpoints';
      await fs.rm(path.join(this.dir, sub, request.name), { recursive: true, force: true });
    }
  }

  async describe(kind: ResourceKind, name: string): Promise<ResourceHealth> {
    const entry = (await this.load())[name];
    if (!entry) return 'missing';
    return entry.kind === kind ? 'healthy' : 'degraded';
  }
}
