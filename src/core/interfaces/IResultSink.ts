/**
 * Interface for persisting a finished transcript
 */
export interface IResultSink {
  /**
   * Write the transcript for `sourcePath` and return the written file path
   */
  write(sourcePath: string, text: string): Promise<string>;
}
