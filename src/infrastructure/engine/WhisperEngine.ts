import fs from 'fs';
import { EngineError, InitializationError, errorMessage } from '../../core/errors.js';
import type {
  ITranscriptionEngine,
  OutputChannel,
  TranscriptionResult,
} from '../../core/interfaces/ITranscriptionEngine.js';
import { withRetry, type RetryLog } from '../../utils/retry.js';
import { WhisperApiClient, type ProbeResult } from '../http/WhisperApiClient.js';
import { WhisperServerProcess, type WhisperServerOptions } from './WhisperServerProcess.js';

export interface WhisperEngineConfig extends WhisperServerOptions {
  startupAttempts: number;
  startupDelayMs: number;
}

export type WhisperClient = Pick<WhisperApiClient, 'probe' | 'transcribe'>;
export type WhisperProcess = Pick<
  WhisperServerProcess,
  'output' | 'start' | 'stop' | 'isRunning' | 'getExitCode'
>;

/**
 * whisper.cpp behind its HTTP server. The model is loaded by starting the server.
 */
export class WhisperEngine implements ITranscriptionEngine {
  private process: WhisperProcess;
  private client: WhisperClient;

  constructor(
    private config: WhisperEngineConfig,
    private debugLog: (message: string) => void = () => undefined,
    process?: WhisperProcess,
    client?: WhisperClient
  ) {
    this.process = process ?? new WhisperServerProcess(config, debugLog);
    this.client =
      client ??
      new WhisperApiClient(`http://${config.host}:${config.port}`, { language: config.language });
  }

  get output(): OutputChannel {
    return this.process.output;
  }

  async loadModel(): Promise<void> {
    if (!fs.existsSync(this.config.modelPath)) {
      throw new InitializationError(`Model file not found: ${this.config.modelPath}`);
    }

    try {
      await this.process.start();
    } catch (error) {
      throw new InitializationError(
        `Could not start ${this.config.command}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    try {
      await withRetry(
        () => this.probeReady(),
        {
          maxAttempts: this.config.startupAttempts,
          initialDelayMs: this.config.startupDelayMs,
          maxDelayMs: this.config.startupDelayMs,
          multiplier: 1,
          timeoutMs: 10000,
        },
        (log: RetryLog) => {
          if (!log.success) {
            this.debugLog(`[Whisper] Probe attempt ${log.attempt}: ${log.error}`);
          }
        },
        (error) => !(error instanceof InitializationError)
      );
    } catch (error) {
      await this.process.stop();
      if (error instanceof InitializationError) throw error;
      throw new InitializationError(`Model server did not become ready: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    console.error('[Whisper] ✓ Model loaded');
  }

  private async probeReady(): Promise<void> {
    if (!this.process.isRunning()) {
      throw new InitializationError(
        `${this.config.command} exited with code ${this.process.getExitCode() ?? 'unknown'}`
      );
    }
    const state: ProbeResult = await this.client.probe();
    if (state !== 'ready') {
      throw new Error(`server is ${state}`);
    }
  }

  async transcribe(filePath: string): Promise<TranscriptionResult> {
    if (!this.process.isRunning()) {
      throw new EngineError('Whisper server is not running');
    }

    try {
      return await this.client.transcribe(filePath);
    } catch (error) {
      if (error instanceof EngineError) throw error;
      throw new EngineError(errorMessage(error), { cause: error });
    }
  }

  probe(): Promise<ProbeResult> {
    return this.client.probe();
  }

  async dispose(): Promise<void> {
    await this.process.stop();
  }
}
