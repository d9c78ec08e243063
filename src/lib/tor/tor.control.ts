/**
 * Tor Control Client
 * Minimal control-port conversation: AUTHENTICATE then signal NEWNYM
 */

import net from 'net';
import { TorAuthError, TorSignalError, errorMessage } from '../errors';

export const TOR_SUCCESS_CODE = '250';

export interface TorControlOptions {
  host: string;
  port: number;
  password?: string;
  timeoutMs: number;
}

/**
 * Line reader over a socket. Each call to readLine() resolves with the next CRLF-terminated line.
 */
class ControlConnection {
  private buffer = '';
  private waiting: Array<{ resolve: (line: string) => void; reject: (error: Error) => void }> = [];
  private failure?: Error;

  constructor(private readonly socket: net.Socket) {
    socket.setEncoding('utf-8');
    socket.on('data', (chunk: string) => {
      this.buffer += chunk;
      this.drain();
    });
    socket.on('error', (error) => this.fail(error));
    socket.on('timeout', () => {
      this.fail(new Error('Control connection timed out'));
      socket.destroy();
    });
    socket.on('close', () => this.fail(new Error('Control connection closed')));
  }

  static open(options: TorControlOptions): Promise<ControlConnection> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: options.host, port: options.port });
      socket.setTimeout(options.timeoutMs);

      const onError = (error: Error): void => {
        socket.destroy();
        reject(error);
      };
      const onTimeout = (): void => onError(new Error('Control connection timed out'));

      socket.once('error', onError);
      socket.once('timeout', onTimeout);
      socket.once('connect', () => {
        socket.off('error', onError);
        socket.off('timeout', onTimeout);
        resolve(new ControlConnection(socket));
      });
    });
  }

  async send(command: string): Promise<string> {
    this.socket.write(`${command}\r\n`);
    return this.readLine();
  }

  close(): void {
    this.socket.end();
    this.socket.destroy();
  }

  private readLine(): Promise<string> {
    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject });
      this.drain();
    });
  }

  private drain(): void {
    let index = this.buffer.indexOf('\n');
    while (index !== -1 && this.waiting.length > 0) {
      const line = this.buffer.slice(0, index).replace(/\r$/, '');
      this.buffer = this.buffer.slice(index + 1);
      this.waiting.shift()?.resolve(line);
      index = this.buffer.indexOf('\n');
    }

    if (this.failure) {
      for (const waiter of this.waiting.splice(0)) {
        waiter.reject(this.failure);
      }
    }
  }

  private fail(error: Error): void {
    if (!this.failure) {
      this.failure = error;
    }
    this.drain();
  }
}

/**
 * Escape a control password as a quoted string
 */
function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function authenticateCommand(password?: string): string {
  return password ? `AUTHENTICATE ${quote(password)}` : 'AUTHENTICATE';
}

/**
 * Ask Tor for a fresh circuit. Throws TorAuthError or TorSignalError; never retries.
 */
export async function renewCircuit(options: TorControlOptions): Promise<void> {
  let connection: ControlConnection;
  try {
    connection = await ControlConnection.open(options);
  } catch (error: unknown) {
    throw new TorAuthError(`Cannot reach Tor control port ${options.host}:${options.port}: ${errorMessage(error)}`, { cause: error });
  }

  try {
    let reply: string;
    try {
      reply = await connection.send(authenticateCommand(options.password));
    } catch (error: unknown) {
      throw new TorAuthError(`Tor authentication failed: ${errorMessage(error)}`, { cause: error });
    }
    if (!reply.startsWith(TOR_SUCCESS_CODE)) {
      throw new TorAuthError(`Tor authentication rejected: ${reply}`, { reply });
    }

    try {
      reply = await connection.send('signal NEWNYM');
    } catch (error: unknown) {
      throw new TorSignalError(`Tor NEWNYM signal failed: ${errorMessage(error)}`, { cause: error });
    }
    if (!reply.startsWith(TOR_SUCCESS_CODE)) {
      throw new TorSignalError(`Tor NEWNYM signal rejected: ${reply}`, { reply });
    }
  } finally {
    connection.close();
  }
}
