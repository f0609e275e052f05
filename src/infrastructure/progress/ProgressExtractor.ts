import { StringDecoder } from 'string_decoder';
import type { OutputChannel } from '../../core/interfaces/ITranscriptionEngine.js';

export type ProgressCallback = (fraction: number) => void;

// whitespace, digits, literal percent: "progress =  42%"
const PROGRESS_PATTERN = /\s(\d+)%/g;

/**
 * Scrapes the most recent percentage out of one job's free-form output.
 *
 * Owned by a single job: started when the job begins, stopped when it ends.
 * `stop()` only ever removes this extractor's own listener, so the channel is
 * left exactly as other captures have it.
 */
export class ProgressExtractor {
  private captured = '';
  private decoder = new StringDecoder('utf8');
  private channel: OutputChannel | null = null;
  private readonly listener = (chunk: string | Buffer): void => {
    this.capture(chunk);
  };

  constructor(private readonly onProgress?: ProgressCallback) {}

  /**
   * Begin capturing everything written to the channel
   */
  start(channel: OutputChannel): void {
    if (this.channel) {
      throw new Error('ProgressExtractor is already capturing');
    }
    this.channel = channel;
    channel.on('data', this.listener);
  }

  /**
   * Append output directly, for engines that hand text over without a stream
   */
  capture(chunk: string | Buffer): void {
    this.captured += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
  }

  /**
   * Last percentage token in the captured text, as a fraction.
   * Returns 0 without calling back when no token has been seen yet.
   */
  sample(): number {
    let latest: string | undefined;
    for (const match of this.captured.matchAll(PROGRESS_PATTERN)) {
      latest = match[1];
    }

    if (latest === undefined) {
      return 0;
    }

    // Not clamped: the engine is trusted to stay within 0-100
    const fraction = parseInt(latest, 10) / 100;
    this.onProgress?.(fraction);
    return fraction;
  }

  /**
   * Detach from the channel and discard captured text
   */
  stop(): void {
    if (this.channel) {
      this.channel.removeListener('data', this.listener);
      this.channel = null;
    }
    this.captured = '';
    this.decoder = new StringDecoder('utf8');
  }

  isCapturing(): boolean {
    return this.channel !== null;
  }

  getCapturedText(): string {
    return this.captured;
  }
}
