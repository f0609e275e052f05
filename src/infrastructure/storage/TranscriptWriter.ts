import { writeFile } from 'fs/promises';
import { PersistenceError, errorMessage } from '../../core/errors.js';
import type { IResultSink } from '../../core/interfaces/IResultSink.js';
import { transcriptPathFor } from '../../utils/paths.js';

export const DEFAULT_TRANSCRIPT_HEADER = 'Audio transcription:';

/**
 * Writes `<stem>_transcript.txt` beside the source audio, overwriting any previous run
 */
export class TranscriptWriter implements IResultSink {
  constructor(private header: string = DEFAULT_TRANSCRIPT_HEADER) {}

  async write(sourcePath: string, text: string): Promise<string> {
    const outputPath = transcriptPathFor(sourcePath);
    const content = this.header ? `${this.header}\n\n${text}` : text;

    try {
      await writeFile(outputPath, content, 'utf-8');
    } catch (error) {
      throw new PersistenceError(`Failed to write ${outputPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    return outputPath;
  }
}
