/**
 * Environment Egress Configurator Tests
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { EnvEgressConfigurator } from '..';

describe('EnvEgressConfigurator', () => {
  let dir: string;
  let directiveFile: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'egress-'));
    directiveFile = path.join(dir, 'nested', '.curlrc');
    env = {};
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should set both proxy variables and write the directive file', async () => {
    const configurator = new EnvEgressConfigurator({ directiveFile, env });

    await configurator.apply({ scheme: 'http', host: '192.168.1.5', port: 8080 });

    expect(env.HTTP_PROXY).toBe('http://192.168.1.5:8080');
    expect(env.HTTPS_PROXY).toBe('http://192.168.1.5:8080');
    expect(await fs.readFile(directiveFile, 'utf-8')).toBe('proxy = http://192.168.1.5:8080\n');
  });

  it('should remove the variables and the file on clear', async () => {
    const configurator = new EnvEgressConfigurator({ directiveFile, env });
    await configurator.apply({ scheme: 'socks5', host: '10.0.0.1', port: 1080 });

    await configurator.clear();

    expect(env).toEqual({});
    await expect(fs.access(directiveFile)).rejects.toThrow();
  });

  it('should tolerate clearing when nothing was applied', async () => {
    const configurator = new EnvEgressConfigurator({ directiveFile, env });

    await expect(configurator.clear()).resolves.toBeUndefined();
  });
});
