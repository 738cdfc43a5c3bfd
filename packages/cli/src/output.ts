import fs from 'node:fs';
import path from 'node:path';

import type { OutputFormat } from './flags.js';

/**
 * Where the CLI writes. Tests swap in recording sinks.
 */
export interface CliIO {
  stdout(chunk: string): void;
  stderr(chunk: string): void;
  now?: () => Date;
}

export const processIO: CliIO = {
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (chunk) => {
    process.stderr.write(chunk);
  },
};

export function logLine(io: CliIO, message: string): void {
  io.stderr(`[passmith] ${message}\n`);
}

export interface CandidateWriterOptions {
  format: OutputFormat;
  /** Also write candidates to this file. */
  file?: string;
  /** With a file, skip the stdout copy. */
  quiet?: boolean;
}

const FLUSH_EVERY = 512;

/**
 * Writes candidates to stdout and/or a file.
 *
 * Text output is one candidate per line, flushed in batches. JSON output
 * is a single array written on close.
 */
export class CandidateWriter {
  private readonly fd?: number;
  private readonly echo: boolean;
  private pending: string[] = [];
  private written = 0;
  private closed = false;

  constructor(
    private readonly io: CliIO,
    private readonly options: CandidateWriterOptions
  ) {
    this.echo = !(options.quiet && options.file);
    if (options.file) {
      this.fd = fs.openSync(path.resolve(process.cwd(), options.file), 'w');
    }
  }

  get count(): number {
    return this.written;
  }

  write(candidate: string): void {
    this.pending.push(candidate);
    this.written += 1;
    if (this.options.format === 'text' && this.pending.length >= FLUSH_EVERY) {
      this.flushText();
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      if (this.options.format === 'json') {
        this.emit(JSON.stringify(this.pending, null, 2) + '\n');
        this.pending = [];
      } else {
        this.flushText();
      }
    } finally {
      if (this.fd !== undefined) fs.closeSync(this.fd);
    }
  }

  private flushText(): void {
    if (this.pending.length === 0) return;
    this.emit(this.pending.join('\n') + '\n');
    this.pending = [];
  }

  private emit(chunk: string): void {
    if (this.echo) this.io.stdout(chunk);
    if (this.fd !== undefined) fs.writeSync(this.fd, chunk);
  }
}
