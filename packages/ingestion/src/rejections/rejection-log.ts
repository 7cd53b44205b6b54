import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';

import { getErrorMessage } from '@ledgerline/core';
import { getLogger } from '@ledgerline/logger';

const logger = getLogger('rejection-log');

/**
 * Destination for records that were malformed or rejected by the engine.
 * Writing is best effort and never interrupts a run.
 */
export interface RejectionSink {
  record(line: number, error: Error): void;
  close(): void;
}

export function formatRejection(line: number, error: Error): string {
  return `line ${line}: ${error.message}`;
}

/**
 * Appends one line per rejection to a file, truncated when opened.
 * Uses synchronous writes so every line is on disk even if the process exits early.
 */
export class FileRejectionSink implements RejectionSink {
  private fd: number | undefined;

  constructor(readonly path: string) {
    mkdirSync(dirname(path), { recursive: true });
    this.fd = openSync(path, 'w');
  }

  record(line: number, error: Error): void {
    if (this.fd === undefined) return;

    try {
      writeSync(this.fd, formatRejection(line, error) + '\n');
    } catch (writeError) {
      logger.debug({ error: getErrorMessage(writeError), path: this.path }, 'Failed to write rejection, discarding log');
      this.close();
    }
  }

  close(): void {
    if (this.fd === undefined) return;

    const fd = this.fd;
    this.fd = undefined;
    try {
      closeSync(fd);
    } catch (closeError) {
      logger.debug({ error: getErrorMessage(closeError), path: this.path }, 'Failed to close rejection log');
    }
  }
}

/**
 * Keeps rejections in memory. Used by tests and by callers that report them elsewhere.
 */
export class MemoryRejectionSink implements RejectionSink {
  readonly lines: string[] = [];

  record(line: number, error: Error): void {
    this.lines.push(formatRejection(line, error));
  }

  close(): void {
    // nothing to release
  }
}

/**
 * Drops every rejection.
 */
export class DiscardingRejectionSink implements RejectionSink {
  record(): void {
    // intentionally empty
  }

  close(): void {
    // nothing to release
  }
}

/**
 * Opens its target on first use, so nothing is created or truncated for a
 * run that never gets past reading its input.
 */
export class DeferredRejectionSink implements RejectionSink {
  private target: RejectionSink | undefined;
  private closed = false;

  constructor(private readonly openTarget: () => RejectionSink) {}

  get isOpen(): boolean {
    return this.target !== undefined;
  }

  open(): void {
    if (this.closed || this.target) return;
    this.target = this.openTarget();
  }

  record(line: number, error: Error): void {
    this.open();
    this.target?.record(line, error);
  }

  close(): void {
    this.closed = true;
    this.target?.close();
  }
}

/**
 * Open the rejection log at `path`. When the file cannot be created the
 * run goes on with a sink that discards everything.
 */
export function openRejectionLog(path: string): RejectionSink {
  try {
    return new FileRejectionSink(path);
  } catch (error) {
    logger.debug({ error: getErrorMessage(error), path }, 'Cannot open rejection log, rejections will be discarded');
    return new DiscardingRejectionSink();
  }
}
