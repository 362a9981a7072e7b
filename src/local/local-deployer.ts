// src/local/local-deployer.ts
import { promises as fs } from 'fs';
import path from 'path';
import { EndpointDeployer } from '../collaborators';
import { UnitOutputs } from '../compiler/ir';

export class LocalEndpointDeployer implements EndpointDeployer {
  async deploy(codePackage: string, endpointOutputs: UnitOutputs): Promise<void> {
    const endpointPath = endpointOutputs.path;
    if (!endpointPath) {
      throw new Error('Endpoint outputs have no "path"; is it a local endpoint?');
    }
    await fs.mkdir(endpointPath, { recursive: true });
    await fs.writeFile(
      path.join(endpointPath, 'deployment.json'),
      JSON.stringify(
        {
          codePackage: path.resolve(codePackage),
          deployedAt: new Date().toISOString()
        },
        null,
        2
      ) + '\n',
      'utf-8'
    );
  }
}
