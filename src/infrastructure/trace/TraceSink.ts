import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

/** Receives pre-formatted request/response trace lines. */
export interface TraceSink {
  write(line: string): void | Promise<void>;
}

export const noopTraceSink: TraceSink = {
  write: () => undefined
};

export const stderrTraceSink: TraceSink = {
  write: (line) => {
    process.stderr.write(`${line}\n`);
  }
};

export type TraceFailureHandler = (error: unknown, line: string) => void;

const reportTraceFailure: TraceFailureHandler = (error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Trace sink failed: ${message}\n`);
};

/** Wraps a sink so that a failed write goes to `onError` instead of the caller. */
export const guardTraceSink = (sink: TraceSink, onError: TraceFailureHandler = reportTraceFailure): TraceSink => ({
  write: async (line) => {
    try {
      await sink.write(line);
    } catch (error) {
      onError(error, line);
    }
  }
});

export const createFileTraceSink = (filePath: string): TraceSink => {
  let ready: Promise<unknown> | null = null;

  return {
    write: async (line) => {
      if (!ready) {
        ready = mkdir(path.dirname(filePath), { recursive: true }).catch((error: unknown) => {
          ready = null;
          throw error;
        });
      }
      await ready;
      await appendFile(filePath, `[${new Date().toISOString()}] ${line}\n`);
    }
  };
};

/** Collects lines in memory; handy for callers that render traces themselves. */
export class MemoryTraceSink implements TraceSink {
  public readonly lines: string[] = [];

  public write(line: string): void {
    this.lines.push(line);
  }
}
