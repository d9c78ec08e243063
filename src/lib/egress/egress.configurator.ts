/**
 * Environment Egress Configurator
 * Sets HTTP_PROXY/HTTPS_PROXY and writes a one-line proxy directive file for CLI tools
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { EgressAddress, EgressConfigurator, formatEgressUrl } from './egress.types';

export const PROXY_ENV_VARS = ['HTTP_PROXY', 'HTTPS_PROXY'] as const;

export interface EnvEgressConfiguratorOptions {
  directiveFile: string;
  env?: NodeJS.ProcessEnv;
}

export class EnvEgressConfigurator implements EgressConfigurator {
  private readonly directiveFile: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: EnvEgressConfiguratorOptions) {
    this.directiveFile = options.directiveFile;
    this.env = options.env ?? process.env;
  }

  async apply(address: EgressAddress): Promise<void> {
    const url = formatEgressUrl(address);
    for (const name of PROXY_ENV_VARS) {
      this.env[name] = url;
    }

    await fs.mkdir(path.dirname(this.directiveFile), { recursive: true });
    await fs.writeFile(this.directiveFile, `proxy = ${url}\n`, 'utf-8');
  }

  async clear(): Promise<void> {
    for (const name of PROXY_ENV_VARS) {
      delete this.env[name];
    }

    try {
      await fs.unlink(this.directiveFile);
    } catch (error: unknown) {
      if (!(typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }
  }
}
