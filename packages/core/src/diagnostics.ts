/* eslint-disable no-console */

import { telemetry } from './telemetry.js';

/**
 * Line-oriented output channel for board dumps. Nothing in the core depends
 * on a sink being present or succeeding.
 */
export interface DiagnosticSink {
  writeLine(line: string): void;
}

export interface BufferedDiagnosticSink extends DiagnosticSink {
  readonly lines: readonly string[];
  clear(): void;
}

export const silentDiagnosticSink: DiagnosticSink = {
  writeLine() {},
};

export function createConsoleDiagnosticSink(): DiagnosticSink {
  return {
    writeLine(line) {
      console.info(line);
    },
  };
}

export function createBufferedDiagnosticSink(): BufferedDiagnosticSink {
  const lines: string[] = [];
  return {
    get lines() {
      return lines;
    },
    writeLine(line) {
      lines.push(line);
    },
    clear() {
      lines.length = 0;
    },
  };
}

/**
 * Wraps a sink so that failures are reported to telemetry once and never
 * reach the caller. After the first failure the sink is skipped.
 */
export function guardDiagnosticSink(sink: DiagnosticSink): DiagnosticSink {
  let failed = false;
  return {
    writeLine(line) {
      if (failed) {
        return;
      }
      try {
        sink.writeLine(line);
      } catch (error) {
        failed = true;
        telemetry.recordError('DiagnosticSinkFailed', {
          message: error instanceof Error ? error.message : String(error),
        });
      }
    },
  };
}

export function writeLines(sink: DiagnosticSink, lines: readonly string[]): void {
  for (const line of lines) {
    sink.writeLine(line);
  }
}
