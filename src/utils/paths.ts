import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { ValidationError, errorMessage } from '../core/errors.js';

export const SUPPORTED_FORMATS = ['.wav', '.mp3'] as const;

/**
 * Clean a raw path coming from a drop payload, dialog or API call.
 * Strips whitespace, Tk brace wrapping and quotes, resolves file:// URIs
 * and returns an absolute, separator-normalized path.
 */
export function normalizeInputPath(raw: string, cwd: string = process.cwd()): string {
  let cleaned = raw.trim().replace(/^[{}]+|[{}]+$/g, '').trim();

  // Quoted paths from shells and some file managers
  const quoted = cleaned.match(/^(["'])(.*)\1$/);
  if (quoted) {
    cleaned = quoted[2].trim();
  }

  if (cleaned.length === 0) {
    throw new ValidationError('empty', raw, 'Empty file path');
  }

  if (cleaned.startsWith('file://')) {
    try {
      cleaned = fileURLToPath(cleaned);
    } catch (error) {
      throw new ValidationError('invalid-uri', raw, `Invalid file URI: ${raw} (${errorMessage(error)})`);
    }
  }

  return path.resolve(cwd, path.normalize(cleaned));
}

export function isSupportedFormat(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return SUPPORTED_FORMATS.some((format) => format === ext);
}

/**
 * Throw a ValidationError unless the path is an existing file with a supported extension
 */
export function validateAudioFile(filePath: string): void {
  const stats = fs.statSync(filePath, { throwIfNoEntry: false });

  if (!stats || !stats.isFile()) {
    throw new ValidationError('missing', filePath, `File not found: ${filePath}`);
  }
  if (!isSupportedFormat(filePath)) {
    throw new ValidationError(
      'unsupported-format',
      filePath,
      `Unsupported format: ${filePath} (expected ${SUPPORTED_FORMATS.join(', ')})`
    );
  }
}

/**
 * `<dir>/<stem>_transcript.txt` next to the source file
 */
export function transcriptPathFor(sourcePath: string): string {
  const parsed = path.parse(sourcePath);
  return path.join(parsed.dir, `${parsed.name}_transcript.txt`);
}
