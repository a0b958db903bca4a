/**
 * Collector Process
 * Supervises the external flow collector whose stdout feeds the pipeline
 */

import { spawn as nodeSpawn, type SpawnOptions } from 'child_process';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { CollectorError, createChildLogger } from '@flowgauge/shared';

/**
 * The part of a ChildProcess the supervisor uses
 */
export interface CollectorChild {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly pid?: number | undefined;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => CollectorChild;

export interface CollectorProcessConfig {
  command: string;
  args: readonly string[];
  stopSignal: NodeJS.Signals;
}

const defaultSpawn: SpawnFn = (command, args, options) => nodeSpawn(command, args, options);

export class CollectorProcess {
  private child: CollectorChild | null = null;
  private exited: Promise<number | null> | null = null;
  private stopRequested = false;
  private running = false;
  private logger = createChildLogger({ component: 'CollectorProcess' });

  constructor(
    private readonly config: CollectorProcessConfig,
    private readonly spawn: SpawnFn = defaultSpawn
  ) {}

  start(): void {
    if (this.child) {
      throw new CollectorError('Collector already started');
    }

    const { command, args } = this.config;
    const child = this.spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    this.child = child;
    this.running = true;

    this.exited = new Promise<number | null>((resolve, reject) => {
      child.once('error', (error: Error) => {
        this.running = false;
        reject(new CollectorError(`Collector '${command}' failed: ${error.message}`, null, { command }));
      });
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        this.running = false;
        this.logger.info({ code, signal, requested: this.stopRequested }, 'Collector exited');
        if (this.stopRequested || code === 0) {
          resolve(code);
          return;
        }
        reject(
          new CollectorError(
            `Collector '${command}' exited unexpectedly (code ${code ?? 'none'}, signal ${signal ?? 'none'})`,
            code,
            { command, signal }
          )
        );
      });
    });

    if (child.stderr) {
      const stderr = createInterface({ input: child.stderr, crlfDelay: Infinity });
      stderr.on('line', (line) => {
        this.logger.info({ line }, 'Collector stderr');
      });
    }

    this.logger.info({ command, args, pid: child.pid }, 'Collector started');
  }

  /**
   * Collector stdout, one line per iteration; ends when the collector closes stdout
   */
  lines(): AsyncIterable<string> {
    const stdout = this.child?.stdout;
    if (!stdout) {
      throw new CollectorError('Collector stdout is not available; call start() first');
    }
    return createInterface({ input: stdout, crlfDelay: Infinity });
  }

  /**
   * Forward the configured stop signal; the exit that follows is not treated as a failure.
   * No-op once the collector has exited.
   */
  stop(): boolean {
    if (!this.child || !this.running) {
      return false;
    }
    this.stopRequested = true;
    this.logger.info({ signal: this.config.stopSignal }, 'Stopping collector');
    return this.child.kill(this.config.stopSignal);
  }

  waitForExit(): Promise<number | null> {
    if (!this.exited) {
      return Promise.reject(new CollectorError('Collector was never started'));
    }
    return this.exited;
  }
}
