import fs from 'fs';
import path from 'path';
import { TranscriptionService } from '../src/application/services/TranscriptionService.js';
import { TranscriptWriter } from '../src/infrastructure/storage/TranscriptWriter.js';
import {
  FakeEngine,
  RecordingObserver,
  delay,
  makeTempDir,
  removeDir,
  writeAudio,
} from './helpers/fakes.js';

const FAST = { readinessTimeoutMs: 10, readinessRetryDelayMs: 10, progressIntervalMs: 5 };

describe('TranscriptionService', () => {
  let dir: string;
  let engine: FakeEngine;
  let observer: RecordingObserver;
  let service: TranscriptionService;

  const createService = (autoLoad: boolean = true) => {
    engine = new FakeEngine(autoLoad);
    service = new TranscriptionService(engine, new TranscriptWriter(), undefined, FAST);
    service.subscribe(observer);
    return service;
  };

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    dir = makeTempDir();
    observer = new RecordingObserver();
  });

  afterEach(async () => {
    await service.shutdown();
    removeDir(dir);
    jest.restoreAllMocks();
  });

  test('transcribes queued files end to end in order', async () => {
    createService();
    const x = writeAudio(dir, 'x.mp3');
    const y = writeAudio(dir, 'y.wav');

    const reports = service.enqueue([x, y]);
    expect(reports.map((report) => report.status)).toEqual(['queued', 'queued']);

    await service.start();
    await service.whenIdle();

    expect(engine.transcribed).toEqual(['x.mp3', 'y.wav']);
    expect(fs.readFileSync(path.join(dir, 'x_transcript.txt'), 'utf-8')).toBe(
      'Audio transcription:\n\ntext of x.mp3'
    );
    expect(observer.jobEvents()).toEqual([
      'x.mp3:pending',
      'y.wav:pending',
      'x.mp3:running',
      'x.mp3:done',
      'y.wav:running',
      'y.wav:done',
    ]);
    expect(observer.statuses()).toEqual([
      'Initializing model...',
      'Ready',
      'Processing: x.mp3',
      `Transcription complete: ${path.join(dir, 'x_transcript.txt')}`,
      'Processing: y.wav',
      `Transcription complete: ${path.join(dir, 'y_transcript.txt')}`,
    ]);
  });

  test('jobs queued before the model loads wait for it', async () => {
    createService(false);
    const startup = service.start();
    service.enqueue([writeAudio(dir, 'early.wav')]);

    await delay(40);
    expect(engine.transcribed).toEqual([]);
    expect(service.getSnapshot()).toMatchObject({ state: 'initializing', ready: false });

    engine.finishLoading();
    await startup;
    await service.whenIdle();

    expect(engine.transcribed).toEqual(['early.wav']);
    expect(service.getState()).toBe('ready');
  });

  test('never runs two jobs at once when enqueued from several callers', async () => {
    createService();
    await service.start();

    const files = ['a.wav', 'b.wav', 'c.wav', 'd.mp3'].map((name) => writeAudio(dir, name));
    service.enqueue([files[0], files[1]]);
    service.enqueue([files[2]]);
    service.enqueue([files[3], files[0]]);
    await service.whenIdle();

    expect(engine.maxActive).toBe(1);
    expect(engine.transcribed).toEqual(['a.wav', 'b.wav', 'c.wav', 'd.mp3']);
  });

  test('duplicates collapse to the first occurrence', () => {
    createService(false);
    const file = writeAudio(dir, 'same.wav');

    const reports = service.enqueue([file, file]);

    expect(reports.map((report) => report.status)).toEqual(['queued', 'duplicate']);
    expect(service.getSnapshot().pending).toHaveLength(1);
  });

  test('rejects invalid paths and reports them', () => {
    createService(false);
    const missing = path.join(dir, 'missing.wav');

    const reports = service.enqueue([missing, writeAudio(dir, 'ok.wav')]);

    expect(reports[0]).toEqual({
      input: missing,
      status: 'rejected',
      error: `File not found: ${missing}`,
    });
    expect(reports[1].status).toBe('queued');
    expect(observer.errors()).toEqual([`File not found: ${missing}`]);
  });

  test('an engine failure does not stop later jobs', async () => {
    createService();
    engine.failures.set('x.mp3', 'bad header');
    service.enqueue([writeAudio(dir, 'x.mp3'), writeAudio(dir, 'y.wav')]);

    await service.start();
    await service.whenIdle();

    expect(service.getStatistics()).toEqual({ total: 2, pending: 0, running: 0, done: 1, failed: 1 });
    expect(fs.existsSync(path.join(dir, 'x_transcript.txt'))).toBe(false);
    expect(fs.existsSync(path.join(dir, 'y_transcript.txt'))).toBe(true);
    expect(observer.errors()).toEqual(['Transcription failed for x.mp3: bad header']);
  });

  test('initialization failure fails pending jobs and rejects new ones', async () => {
    createService(false);
    const startup = service.start();
    service.enqueue([writeAudio(dir, 'a.wav'), writeAudio(dir, 'b.wav')]);

    engine.failLoading('model file is corrupt');
    await startup;
    await service.whenIdle();

    const message = 'Model initialization failed: model file is corrupt';
    expect(service.getState()).toBe('failed');
    expect(service.getSnapshot().initializationError).toBe(message);
    expect(engine.transcribed).toEqual([]);
    expect(service.getHistory().map((job) => [job.fileName, job.status, job.errorKind])).toEqual([
      ['b.wav', 'failed', 'initialization'],
      ['a.wav', 'failed', 'initialization'],
    ]);
    expect(observer.statuses()).toContain(`Error: ${message}`);

    const later = service.enqueue([writeAudio(dir, 'c.wav')]);
    expect(later).toEqual([{ input: path.join(dir, 'c.wav'), status: 'rejected', error: message }]);
  });

  test('samples progress while a job runs', async () => {
    createService();
    engine.transcribeDelayMs = 40;
    service.enqueue([writeAudio(dir, 'long.wav')]);

    await service.start();
    await service.whenIdle();

    const progress = observer.events.flatMap((event) => (event.type === 'progress' ? [event.value] : []));
    expect(progress[0]).toBe(0);
    expect(progress).toContain(0.8);
  });

  test('queues the contents of a drop payload', () => {
    createService(false);
    const a = writeAudio(dir, 'my song.wav');
    const b = writeAudio(dir, 'other.mp3');

    const reports = service.enqueueDropData(`{${a}} ${b}`);

    expect(reports.map((report) => report.status)).toEqual(['queued', 'queued']);
    expect(service.getSnapshot().pending.map((job) => job.path)).toEqual([a, b]);
  });

  test('shutdown lets the running job finish, drops the rest and disposes the engine', async () => {
    createService();
    engine.transcribeDelayMs = 30;
    service.enqueue([writeAudio(dir, 'a.wav'), writeAudio(dir, 'b.wav')]);
    await service.start();
    await delay(10);

    await service.shutdown();

    expect(engine.transcribed).toEqual(['a.wav']);
    expect(service.getSnapshot().pending).toHaveLength(0);
    expect(service.getState()).toBe('stopped');
    expect(engine.disposed).toBe(true);

    const after = service.enqueue([writeAudio(dir, 'c.wav')]);
    expect(after[0]).toMatchObject({ status: 'rejected', error: 'Service is shutting down' });
  });

  test('lists jobs filtered by status', async () => {
    createService();
    engine.failures.set('a.wav', 'bad header');
    service.enqueue([writeAudio(dir, 'a.wav'), writeAudio(dir, 'b.wav')]);

    expect(service.getJobsByStatus('pending').map((job) => job.fileName)).toEqual(['a.wav', 'b.wav']);

    await service.start();
    await service.whenIdle();

    expect(service.getJobsByStatus('failed').map((job) => job.fileName)).toEqual(['a.wav']);
    expect(service.getJobsByStatus('done').map((job) => job.fileName)).toEqual(['b.wav']);
    expect(service.getJobsByStatus('pending')).toEqual([]);
  });

  test('start after shutdown leaves the service stopped', async () => {
    createService(false);
    await service.shutdown();

    await service.start();

    expect(engine.loadCalls).toBe(0);
    expect(service.getState()).toBe('stopped');
    expect(observer.statuses()).toEqual([]);
    const reports = service.enqueue([writeAudio(dir, 'a.wav')]);
    expect(reports[0]).toMatchObject({ status: 'rejected', error: 'Service is shutting down' });
  });

  test('a throwing observer does not break the pipeline', async () => {
    createService();
    service.subscribe({
      onProgress: () => {
        throw new Error('ui gone');
      },
      onStatus: () => {
        throw new Error('ui gone');
      },
      onError: () => undefined,
    });
    service.enqueue([writeAudio(dir, 'a.wav')]);

    await service.start();
    await service.whenIdle();

    expect(engine.transcribed).toEqual(['a.wav']);
  });
});
