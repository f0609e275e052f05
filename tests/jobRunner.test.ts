import path from 'path';
import { JobRunner } from '../src/application/services/JobRunner.js';
import type { Job } from '../src/core/entities/Job.js';
import type { IPipelineObserver } from '../src/core/interfaces/IPipelineObserver.js';
import { JobQueue } from '../src/infrastructure/queue/JobQueue.js';
import { ReadinessGate } from '../src/infrastructure/queue/ReadinessGate.js';
import {
  FakeEngine,
  MemorySink,
  RecordingObserver,
  delay,
  makeTempDir,
  removeDir,
  writeAudio,
} from './helpers/fakes.js';

describe('JobRunner', () => {
  let dir: string;
  let queue: JobQueue;
  let gate: ReadinessGate;
  let engine: FakeEngine;
  let sink: MemorySink;
  let observer: RecordingObserver;

  const createRunner = (target: IPipelineObserver = observer) =>
    new JobRunner(queue, gate, engine, sink, target, {
      readinessTimeoutMs: 10,
      readinessRetryDelayMs: 10,
    });

  beforeEach(() => {
    dir = makeTempDir();
    queue = new JobQueue();
    gate = new ReadinessGate();
    engine = new FakeEngine();
    sink = new MemorySink();
    observer = new RecordingObserver();
  });

  afterEach(() => {
    removeDir(dir);
  });

  test('waits for readiness before starting the first job', async () => {
    const runner = createRunner();
    queue.enqueue(writeAudio(dir, 'a.wav'));
    runner.trigger();

    await delay(40);
    expect(engine.transcribed).toEqual([]);
    expect(runner.getState()).toBe('waiting-for-readiness');
    expect(queue.getPending()).toHaveLength(1);

    gate.signal();
    await runner.whenIdle();

    expect(engine.transcribed).toEqual(['a.wav']);
    expect(runner.getState()).toBe('idle');
  });

  test('processes jobs one at a time in FIFO order', async () => {
    gate.signal();
    const runner = createRunner();
    for (const name of ['a.wav', 'b.mp3', 'c.wav']) {
      queue.enqueue(writeAudio(dir, name));
    }

    runner.trigger();
    runner.trigger();
    runner.trigger();
    await runner.whenIdle();

    expect(engine.transcribed).toEqual(['a.wav', 'b.mp3', 'c.wav']);
    expect(engine.maxActive).toBe(1);
    expect(queue.getStatistics()).toEqual({ total: 3, pending: 0, running: 0, done: 3, failed: 0 });
  });

  test('picks up jobs enqueued while draining', async () => {
    gate.signal();
    const runner = createRunner();
    queue.enqueue(writeAudio(dir, 'a.wav'));
    runner.trigger();

    queue.enqueue(writeAudio(dir, 'b.wav'));
    runner.trigger();
    await runner.whenIdle();

    expect(engine.transcribed).toEqual(['a.wav', 'b.wav']);
  });

  test('emits start and completion events in order', async () => {
    gate.signal();
    const runner = createRunner();
    const file = writeAudio(dir, 'a.wav');
    queue.enqueue(file);

    runner.trigger();
    await runner.whenIdle();

    expect(observer.events).toEqual([
      { type: 'progress', value: 0 },
      { type: 'status', text: 'Processing: a.wav' },
      { type: 'job', fileName: 'a.wav', status: 'running' },
      { type: 'status', text: `Transcription complete: ${file}.txt` },
      { type: 'job', fileName: 'a.wav', status: 'done' },
    ]);
    expect(sink.written.get(`${file}.txt`)).toBe('text of a.wav');
  });

  test('an engine failure fails that job and the next one still runs', async () => {
    gate.signal();
    engine.failures.set('a.wav', 'decoder crashed');
    const runner = createRunner();
    queue.enqueue(writeAudio(dir, 'a.wav'));
    queue.enqueue(writeAudio(dir, 'b.wav'));

    runner.trigger();
    await runner.whenIdle();

    const [b, a] = queue.getHistory();
    expect(a.status).toBe('failed');
    expect(a.errorKind).toBe('engine');
    expect(a.error).toBe('Transcription failed for a.wav: decoder crashed');
    expect(b.status).toBe('done');
    expect(observer.errors()).toEqual(['Transcription failed for a.wav: decoder crashed']);
    expect(observer.statuses()).toContain('Error: Transcription failed for a.wav: decoder crashed');
  });

  test('a sink failure is reported as a persistence error', async () => {
    gate.signal();
    sink.failFor.add('a.wav');
    const runner = createRunner();
    queue.enqueue(writeAudio(dir, 'a.wav'));
    queue.enqueue(writeAudio(dir, 'b.wav'));

    runner.trigger();
    await runner.whenIdle();

    const [b, a] = queue.getHistory();
    expect(a.errorKind).toBe('persistence');
    expect(a.error).toBe('Could not save transcript for a.wav: disk full');
    expect(b.status).toBe('done');
  });

  test('observers hear the outcome while the job is still current', async () => {
    gate.signal();
    const seen: Array<{ status: Job['status']; current: boolean }> = [];
    const runner = createRunner({
      onProgress: () => undefined,
      onStatus: () => undefined,
      onError: () => undefined,
      onJobUpdate: (job) => {
        seen.push({ status: job.status, current: queue.getCurrent()?.id === job.id });
      },
    });
    queue.enqueue(writeAudio(dir, 'a.wav'));

    runner.trigger();
    await runner.whenIdle();

    expect(seen).toEqual([
      { status: 'running', current: true },
      { status: 'done', current: true },
    ]);
    expect(queue.getCurrent()).toBeNull();
  });

  test('an observer that throws does not stall the queue', async () => {
    gate.signal();
    const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    let statusCalls = 0;
    const runner = createRunner({
      onProgress: () => undefined,
      onStatus: () => {
        statusCalls++;
        if (statusCalls === 1) throw new Error('observer broke');
      },
      onError: () => {
        throw new Error('observer broke again');
      },
    });
    engine.failures.set('b.wav', 'decoder crashed');
    queue.enqueue(writeAudio(dir, 'a.wav'));
    queue.enqueue(writeAudio(dir, 'b.wav'));
    queue.enqueue(writeAudio(dir, 'c.wav'));

    runner.trigger();
    await runner.whenIdle();

    expect(engine.transcribed).toEqual(['a.wav', 'c.wav']);
    expect(queue.getHistory().map((job) => `${job.fileName}:${job.status}`)).toEqual([
      'c.wav:done',
      'b.wav:failed',
      'a.wav:done',
    ]);
    expect(queue.getCurrent()).toBeNull();
    expect(engine.output.listenerCount('data')).toBe(0);
    expect(consoleSpy).toHaveBeenCalledWith('[JobRunner] ✗ Observer failed:', expect.any(Error));
    consoleSpy.mockRestore();
  });

  test('exposes an extractor fed by the engine output while a job runs', async () => {
    gate.signal();
    const runner = createRunner();
    const samples: number[] = [];
    engine.onTranscribe = () => {
      samples.push(runner.getActiveExtractor()?.sample() ?? -1);
      samples.push(queue.getCurrent()?.progress ?? -1);
    };
    queue.enqueue(writeAudio(dir, 'a.wav'));

    runner.trigger();
    await runner.whenIdle();

    expect(samples).toEqual([0.8, 0.8]);
    expect(runner.getActiveExtractor()).toBeNull();
    expect(engine.output.listenerCount('data')).toBe(0);
  });

  test('a closed gate ends the drain without starting jobs', async () => {
    gate.reset();
    const runner = createRunner();
    queue.enqueue(writeAudio(dir, 'a.wav'));

    runner.trigger();
    await runner.whenIdle();

    expect(engine.transcribed).toEqual([]);
    expect(queue.getPending().map((job) => path.basename(job.path))).toEqual(['a.wav']);
  });

  test('a stopped runner ignores triggers', async () => {
    gate.signal();
    const runner = createRunner();
    runner.stop();
    queue.enqueue(writeAudio(dir, 'a.wav'));

    runner.trigger();
    await runner.whenIdle();

    expect(engine.transcribed).toEqual([]);
  });
});
