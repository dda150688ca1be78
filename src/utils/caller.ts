import * as path from 'path';
import { fileURLToPath } from 'url';

export interface Caller {
  file: string;
  line: number;
}

// "    at fn (/abs/file.ts:10:5)" or "    at /abs/file.ts:10:5"
const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

const THIS_FILE = normalizeFile(fileURLToPath(import.meta.url));

function normalizeFile(file: string): string {
  if (file.startsWith('file://')) {
    return fileURLToPath(file);
  }
  return file;
}

function displayPath(file: string, cwd: string): string {
  if (!path.isAbsolute(file)) {
    return file;
  }
  const relative = path.relative(cwd, file);
  return relative.startsWith('..') ? file : relative;
}

/**
 * Finds the first frame of a V8 stack trace whose file is not internal.
 * Frames without a file location (`at new Promise (<anonymous>)`,
 * `node:internal/...`) are skipped.
 */
export function callerFromStack(
  stack: string,
  isInternal: (file: string) => boolean,
  cwd: string = process.cwd(),
): Caller | null {
  for (const frame of stack.split('\n')) {
    const match = frame.match(FRAME_PATTERN);
    if (!match) continue;

    const [, rawFile, rawLine] = match;
    if (rawFile.startsWith('node:') || rawFile === '<anonymous>') continue;

    const file = normalizeFile(rawFile);
    if (file === THIS_FILE || isInternal(file)) continue;

    return { file: displayPath(file, cwd), line: Number(rawLine) };
  }
  return null;
}

/** Caller of the current log call, or null when the stack has no usable frame. */
export function captureCaller(isInternal: (file: string) => boolean): Caller | null {
  const { stack } = new Error();
  return stack ? callerFromStack(stack, isInternal) : null;
}
