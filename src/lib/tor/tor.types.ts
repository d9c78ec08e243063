/**
 * Tor Types
 */

export enum TorStatus {
  STOPPED = 'stopped',
  STARTING = 'starting',
  RUNNING = 'running',
}

export interface TorConfig {
  executable: string;
  socksPort: number;
  controlHost: string;
  controlPort: number;
  controlPassword?: string;
  installCommand: string;
  startupGraceMs: number;
  stopGraceMs: number;
  controlTimeoutMs: number;
}

/**
 * Running Tor subprocess as seen by the controller
 */
export interface TorProcessHandle {
  readonly pid?: number;
  isAlive(): boolean;
  kill(signal: NodeJS.Signals): boolean;
  /** Resolves true if the process exited within the timeout */
  waitForExit(timeoutMs: number): Promise<boolean>;
}

export interface TorProcessLauncher {
  isInstalled(executable: string): Promise<boolean>;
  install(command: string): Promise<void>;
  launch(executable: string, args: string[]): TorProcessHandle;
}
