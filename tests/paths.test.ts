import path from 'path';
import {
  isSupportedFormat,
  normalizeInputPath,
  transcriptPathFor,
  validateAudioFile,
} from '../src/utils/paths.js';
import { ValidationError } from '../src/core/errors.js';
import { makeTempDir, removeDir, writeAudio } from './helpers/fakes.js';

describe('normalizeInputPath', () => {
  const cwd = path.resolve('/work');

  test('resolves relative paths against the working directory', () => {
    expect(normalizeInputPath('audio/a.wav', cwd)).toBe(path.resolve('/work/audio/a.wav'));
  });

  test('strips whitespace and Tk braces', () => {
    expect(normalizeInputPath('  {/music/my song.wav}  ', cwd)).toBe(path.resolve('/music/my song.wav'));
  });

  test('strips matching quotes', () => {
    expect(normalizeInputPath("'/music/a.mp3'", cwd)).toBe(path.resolve('/music/a.mp3'));
    expect(normalizeInputPath('"/music/b.mp3"', cwd)).toBe(path.resolve('/music/b.mp3'));
  });

  test('collapses redundant separators and dot segments', () => {
    expect(normalizeInputPath('/music//x/../a.wav', cwd)).toBe(path.resolve('/music/a.wav'));
  });

  test('converts file URIs', () => {
    expect(normalizeInputPath('file:///music/my%20song.wav', cwd)).toBe(path.resolve('/music/my song.wav'));
  });

  test('rejects a file URI that does not map to a local path', () => {
    const raw = 'file:///music/a%2Fb.wav';
    let caught: unknown;
    try {
      normalizeInputPath(raw, cwd);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError && caught.reason).toBe('invalid-uri');
    expect(caught instanceof ValidationError && caught.path).toBe(raw);
  });

  test('throws an empty ValidationError for blank input', () => {
    expect(() => normalizeInputPath('   ', cwd)).toThrow(ValidationError);
    expect(() => normalizeInputPath('""', cwd)).toThrow('Empty file path');
  });
});

describe('isSupportedFormat', () => {
  test.each([
    ['a.wav', true],
    ['a.WAV', true],
    ['a.mp3', true],
    ['a.flac', false],
    ['wav', false],
  ])('%s -> %s', (file, expected) => {
    expect(isSupportedFormat(file)).toBe(expected);
  });
});

describe('validateAudioFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  test('accepts an existing wav file', () => {
    expect(() => validateAudioFile(writeAudio(dir, 'ok.wav'))).not.toThrow();
  });

  test('reports missing files with reason "missing"', () => {
    const missing = path.join(dir, 'nope.mp3');
    let caught: unknown;
    try {
      validateAudioFile(missing);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError && caught.reason).toBe('missing');
  });

  test('reports existing files with the wrong extension as unsupported', () => {
    let caught: unknown;
    try {
      validateAudioFile(writeAudio(dir, 'doc.txt'));
    } catch (error) {
      caught = error;
    }
    expect(caught instanceof ValidationError && caught.reason).toBe('unsupported-format');
  });
});

describe('transcriptPathFor', () => {
  test('places the transcript beside the source with the stem suffixed', () => {
    expect(transcriptPathFor(path.join('/music', 'x.mp3'))).toBe(path.join('/music', 'x_transcript.txt'));
  });

  test('keeps inner dots of the stem', () => {
    expect(transcriptPathFor(path.join('/music', 'take.2.wav'))).toBe(path.join('/music', 'take.2_transcript.txt'));
  });
});
