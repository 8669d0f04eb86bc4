import type { Writable } from 'stream';
import { Rcon } from 'rcon-client';

/**
 * A way to type commands into a running server
 */
export interface ControlChannel {
  readonly kind: 'rcon' | 'stdin';
  send(command: string): Promise<void>;
  close(): Promise<void>;
}

export interface RconChannelOptions {
  host: string;
  port: number;
  password: string;
  timeoutMS?: number;
}

/**
 * Sends commands over RCON. Each `send()` opens its own connection and
 * closes it again, so a server restart never leaves a stale socket behind.
 */
export class RconControlChannel implements ControlChannel {
  public readonly kind = 'rcon';
  private readonly options: RconChannelOptions;

  constructor(options: RconChannelOptions) {
    this.options = options;
  }

  public async send(command: string): Promise<void> {
    const rcon = await Rcon.connect({
      host: this.options.host,
      port: this.options.port,
      password: this.options.password,
      timeout: this.options.timeoutMS ?? 5000,
    });

    try {
      await rcon.send(command);
    } finally {
      await rcon.end();
    }
  }

  public async close(): Promise<void> {
    // Connections only live for the duration of a send
  }
}

/**
 * Writes commands to the child's console (stdin), one per line
 */
export class StdinControlChannel implements ControlChannel {
  public readonly kind = 'stdin';
  private readonly stdin: Writable | null;

  constructor(stdin: Writable | null) {
    this.stdin = stdin;
  }

  public send(command: string): Promise<void> {
    const stdin = this.stdin;

    if (!stdin || stdin.destroyed || !stdin.writable) {
      return Promise.reject(new Error('Process console is not writable'));
    }

    return new Promise<void>((resolve, reject) => {
      stdin.write(`${command}\n`, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  public close(): Promise<void> {
    if (this.stdin && !this.stdin.destroyed) {
      this.stdin.end();
    }

    return Promise.resolve();
  }
}
