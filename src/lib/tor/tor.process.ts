/**
 * Tor process launcher backed by child_process
 */

import { ChildProcess, spawn } from 'child_process';
import { TorProcessHandle, TorProcessLauncher } from './tor.types';

class ChildTorProcess implements TorProcessHandle {
  private exited = false;
  private readonly exitPromise: Promise<void>;

  constructor(private readonly child: ChildProcess) {
    this.exitPromise = new Promise(resolve => {
      child.once('exit', () => {
        this.exited = true;
        resolve();
      });
      child.once('error', (error) => {
        console.error('❌ Tor process error:', error.message);
        this.exited = true;
        resolve();
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    return !this.exited && this.child.exitCode === null && this.child.signalCode === null;
  }

  kill(signal: NodeJS.Signals): boolean {
    return this.child.kill(signal);
  }

  async waitForExit(timeoutMs: number): Promise<boolean> {
    if (!this.isAlive()) {
      return true;
    }
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const result = await Promise.race([this.exitPromise.then(() => true), timeout]);
    clearTimeout(timer);
    return result;
  }
}

function runToCompletion(command: string, args: string[], shell: boolean): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: shell ? 'inherit' : 'ignore', shell });
    child.once('error', reject);
    child.once('exit', code => resolve(code ?? -1));
  });
}

export const childProcessLauncher: TorProcessLauncher = {
  async isInstalled(executable: string): Promise<boolean> {
    try {
      return (await runToCompletion(executable, ['--version'], false)) === 0;
    } catch {
      return false;
    }
  },

  async install(command: string): Promise<void> {
    console.log(`📦 Installing Tor: ${command}`);
    const code = await runToCompletion(command, [], true);
    if (code !== 0) {
      throw new Error(`Install command exited with code ${code}`);
    }
  },

  launch(executable: string, args: string[]): TorProcessHandle {
    return new ChildTorProcess(spawn(executable, args, { stdio: 'ignore' }));
  },
};
