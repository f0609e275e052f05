/**
 * Text channel an engine writes human-readable progress lines to.
 * Satisfied by any Node stream or EventEmitter emitting 'data'.
 */
export interface OutputChannel {
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  removeListener(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
}

export interface TranscriptionResult {
  text: string;
}

/**
 * Interface for the speech-to-text engine
 */
export interface ITranscriptionEngine {
  /**
   * Shared output channel; progress tokens ("  42%") appear here while a job runs
   */
  readonly output: OutputChannel;

  /**
   * Load the model. Called once, in the background.
   */
  loadModel(): Promise<void>;

  /**
   * Transcribe one audio file
   */
  transcribe(filePath: string): Promise<TranscriptionResult>;

  /**
   * Release engine resources
   */
  dispose(): Promise<void>;
}
