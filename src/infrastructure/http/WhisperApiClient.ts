import fetch, { type Response } from 'node-fetch';
import FormData from 'form-data';
import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { EngineError, errorMessage } from '../../core/errors.js';
import type { TranscriptionResult } from '../../core/interfaces/ITranscriptionEngine.js';

export type ProbeResult = 'ready' | 'loading' | 'unreachable';

const InferenceResponseSchema = z.union([
  z.object({ text: z.string() }),
  z.object({ error: z.string() }),
]);

export interface WhisperApiOptions {
  language: string;
  temperature: number;
  probeTimeoutMs: number;
}

const DEFAULT_API_OPTIONS: WhisperApiOptions = {
  language: 'auto',
  temperature: 0,
  probeTimeoutMs: 2000,
};

/**
 * HTTP client for a running whisper-server
 */
export class WhisperApiClient {
  private options: WhisperApiOptions;

  constructor(
    private apiUrl: string,
    options: Partial<WhisperApiOptions> = {}
  ) {
    this.options = { ...DEFAULT_API_OPTIONS, ...options };
  }

  /**
   * Servers without /health only start listening after the model is loaded, so 404 counts as ready
   */
  async probe(): Promise<ProbeResult> {
    try {
      const res = await fetch(`${this.apiUrl}/health`, {
        method: 'GET',
        timeout: this.options.probeTimeoutMs,
      });
      if (res.ok || res.status === 404) return 'ready';
      if (res.status === 503) return 'loading';
      throw new EngineError(`Unexpected health status: ${res.status}`);
    } catch (error) {
      if (error instanceof EngineError) throw error;
      return 'unreachable';
    }
  }

  async transcribe(filePath: string): Promise<TranscriptionResult> {
    const audio = await readFile(filePath);

    const form = new FormData();
    form.append('file', audio, { filename: path.basename(filePath) });
    form.append('response_format', 'json');
    form.append('language', this.options.language);
    form.append('temperature', String(this.options.temperature));

    let res: Response;
    try {
      res = await fetch(`${this.apiUrl}/inference`, {
        method: 'POST',
        body: form,
        headers: form.getHeaders(),
      });
    } catch (error) {
      throw new EngineError(`Whisper server unreachable: ${errorMessage(error)}`, { cause: error });
    }

    if (!res.ok) {
      throw new EngineError(`HTTP error! status: ${res.status}`);
    }

    const parsed = InferenceResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new EngineError('Unexpected response from whisper server');
    }
    if ('error' in parsed.data) {
      throw new EngineError(parsed.data.error);
    }

    return { text: parsed.data.text.trim() };
  }
}
