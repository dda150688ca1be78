import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createRequire } from 'module';
import { fileURLToPath } from 'url';
import { Worker } from 'worker_threads';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { SingleFileWriter } from '../singleFileWriter';
import { defaultFormat, nocolorLoggerFormat } from '../../formats';
import type { LogRecord } from '../../types';
import { DeferredNow } from '../../utils/deferredNow';
import { SharedMutex } from '../../utils/mutex';
import { formatTimestamp } from '../../utils/timestamp';

// Runs as CommonJS in the worker; tsx compiles the writer sources there.
const WORKER_SOURCE = `
const { workerData } = require('worker_threads');
const tsx = require(workerData.tsxApi);
const { SingleFileWriter } = tsx.require(workerData.writerPath, workerData.writerPath);
const { SharedMutex } = tsx.require(workerData.mutexPath, workerData.mutexPath);

const writer = new SingleFileWriter(workerData.fd, new SharedMutex(workerData.lock));
const now = { now: () => new Date() };
for (let i = 0; i < workerData.lines; i++) {
  writer.write(now, { level: 'info', modulePath: workerData.name, message: 'line ' + i + ' ' + workerData.payload });
}
`;

function runWriterThread(workerData: Record<string, unknown>): Promise<void> {
  return new Promise((resolve, reject) => {
    const worker = new Worker(WORKER_SOURCE, { eval: true, workerData });
    worker.once('error', reject);
    worker.once('exit', (code) => {
      if (code === 0) resolve();
      else reject(new Error(`writer thread exited with code ${code}`));
    });
  });
}

const fixed = new Date(Date.UTC(2019, 10, 11, 20, 4, 25, 685));
const now = () => new DeferredNow(() => fixed);
const record = (overrides: Partial<LogRecord> = {}): LogRecord => ({
  level: 'info',
  modulePath: 'app',
  message: 'hello',
  ...overrides,
});

describe('SingleFileWriter', () => {
  let dir: string;
  let file: string;
  let fd: number;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'single-file-writer-'));
    file = path.join(dir, 'app.log');
    fd = fs.openSync(file, 'w');
  });

  afterEach(() => {
    fs.closeSync(fd);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const contents = () => fs.readFileSync(file, 'utf8');

  it('should start with the default format and terminate each line', () => {
    const writer = new SingleFileWriter(fd);
    writer.write(now(), record());
    writer.write(now(), record({ level: 'warn', modulePath: undefined, message: 'careful' }));
    writer.flush();

    expect(contents()).toBe('INFO [app] hello\nWARN [<unnamed>] careful\n');
  });

  it('should use a replaced format function', () => {
    const writer = new SingleFileWriter(fd);
    writer.format(nocolorLoggerFormat);
    writer.write(now(), record({ level: 'warn', message: 'careful' }));

    expect(contents()).toBe(`${formatTimestamp(fixed)} WARN app > careful\n`);
  });

  it('should write every line whole when many callers log concurrently', async () => {
    const writer = new SingleFileWriter(fd);
    const tasks = Array.from({ length: 50 }, async (_, task) => {
      for (let i = 0; i < 4; i++) {
        await new Promise<void>((resolve) => setImmediate(resolve));
        writer.write(now(), record({ modulePath: `task-${task}`, message: `record ${i}` }));
      }
    });
    await Promise.all(tasks);
    writer.flush();

    const lines = contents().split('\n');
    expect(lines.pop()).toBe('');
    expect(lines).toHaveLength(200);
    expect(new Set(lines).size).toBe(200);
    for (const line of lines) {
      expect(line).toMatch(/^INFO \[task-\d+\] record [0-3]$/);
    }
  });

  it('should write every line whole when worker threads share the descriptor and lock', async () => {
    const threads = 4;
    const perThread = 100;
    const payload = 'x'.repeat(200);
    const lock = new SharedMutex();
    const shared = {
      tsxApi: createRequire(import.meta.url).resolve('tsx/cjs/api'),
      writerPath: fileURLToPath(new URL('../singleFileWriter.ts', import.meta.url)),
      mutexPath: fileURLToPath(new URL('../../utils/mutex.ts', import.meta.url)),
      fd,
      lock: lock.buffer,
      lines: perThread,
      payload,
    };

    await Promise.all(
      Array.from({ length: threads }, (_, thread) => runWriterThread({ ...shared, name: `worker-${thread}` })),
    );

    const lines = contents().split('\n');
    expect(lines.pop()).toBe('');
    expect(lines).toHaveLength(threads * perThread);
    for (const line of lines) {
      expect(line).toMatch(/^INFO \[worker-\d\] line \d+ x{200}$/);
    }
    for (let thread = 0; thread < threads; thread++) {
      expect(lines.filter((line) => line.startsWith(`INFO [worker-${thread}] `))).toHaveLength(perThread);
    }
  });

  it('should flush descriptors that cannot be synced', () => {
    const devNull = fs.openSync(os.devNull, 'w');
    try {
      const writer = new SingleFileWriter(devNull);
      writer.write(now(), record());
      expect(() => writer.flush()).not.toThrow();
    } finally {
      fs.closeSync(devNull);
    }
  });

  it('should release the lock when formatting fails', () => {
    const writer = new SingleFileWriter(fd);
    writer.format(() => {
      throw new Error('boom');
    });
    expect(() => writer.write(now(), record())).toThrow('boom');
    expect(writer.lock.runExclusive(() => 'free')).toBe('free');

    writer.format(defaultFormat);
    writer.write(now(), record({ message: 'after' }));
    expect(contents()).toBe('INFO [app] after\n');
  });

  it('should propagate write errors', () => {
    const readOnly = fs.openSync(file, 'r');
    const writer = new SingleFileWriter(readOnly);
    let caught: unknown;
    try {
      writer.write(now(), record());
    } catch (error) {
      caught = error;
    } finally {
      fs.closeSync(readOnly);
    }

    expect(caught).toMatchObject({ code: 'EBADF' });
  });

  it('should serialize writers that share a mutex', () => {
    const first = new SingleFileWriter(fd);
    const second = new SingleFileWriter(fd, first.lock);
    first.write(now(), record({ message: 'one' }));
    second.write(now(), record({ message: 'two' }));

    expect(second.lock).toBe(first.lock);
    expect(contents()).toBe('INFO [app] one\nINFO [app] two\n');
  });

  it('should accept every level', () => {
    expect(new SingleFileWriter(fd).maxLogLevel()).toBe('trace');
  });
});
