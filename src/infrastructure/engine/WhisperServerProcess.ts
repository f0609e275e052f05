import { spawn, ChildProcess } from 'child_process';
import { PassThrough } from 'stream';

export interface WhisperServerOptions {
  command: string;
  modelPath: string;
  host: string;
  port: number;
  threads: number;
  language: string;
  convert: boolean;
}

/**
 * Owns the whisper-server child process.
 *
 * stdout and stderr are merged into `output`, which exists before the process
 * starts and outlives restarts. It is always flowing, so the child never blocks
 * on a full pipe when nobody is listening.
 */
export class WhisperServerProcess {
  readonly output = new PassThrough({ encoding: 'utf8' });
  private serverProcess: ChildProcess | null = null;
  private exitCode: number | null = null;

  constructor(
    private options: WhisperServerOptions,
    private debugLog: (message: string) => void = () => undefined
  ) {
    this.output.resume();
  }

  buildArgs(): string[] {
    const args = [
      '-m', this.options.modelPath,
      '--host', this.options.host,
      '--port', String(this.options.port),
      '-t', String(this.options.threads),
      '-l', this.options.language,
      '-pp',
    ];
    if (this.options.convert) {
      args.push('--convert');
    }
    return args;
  }

  /**
   * Spawn the server. Resolves once the OS has started the process, not once the model is loaded.
   */
  start(): Promise<void> {
    if (this.serverProcess) {
      return Promise.resolve();
    }

    console.error(`[Whisper] Starting ${this.options.command} on ${this.options.host}:${this.options.port}...`);

    return new Promise((resolve, reject) => {
      const child = spawn(this.options.command, this.buildArgs(), {
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      this.serverProcess = child;
      this.exitCode = null;

      child.stdout?.pipe(this.output, { end: false });
      child.stderr?.pipe(this.output, { end: false });

      child.once('spawn', () => {
        this.debugLog(`[Whisper] Process started (pid ${child.pid})`);
        resolve();
      });

      child.once('error', (error: Error) => {
        console.error('[Whisper] ✗ Failed to start:', error.message);
        this.serverProcess = null;
        reject(error);
      });

      child.on('exit', (code: number | null) => {
        this.exitCode = code;
        if (code !== null && code !== 0) {
          console.error(`[Whisper] Process exited with code ${code}`);
        }
        this.serverProcess = null;
      });
    });
  }

  /**
   * SIGTERM, then SIGKILL after five seconds
   */
  async stop(): Promise<void> {
    const child = this.serverProcess;
    if (!child) {
      return;
    }

    console.error('[Whisper] Stopping server...');

    await new Promise<void>((resolve) => {
      const killTimeout = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          console.error('[Whisper] Force killing process...');
          child.kill('SIGKILL');
        }
      }, 5000);

      child.once('exit', () => {
        clearTimeout(killTimeout);
        console.error('[Whisper] ✓ Server stopped');
        resolve();
      });

      child.kill('SIGTERM');
    });
  }

  isRunning(): boolean {
    return this.serverProcess !== null;
  }

  getExitCode(): number | null {
    return this.exitCode;
  }
}
