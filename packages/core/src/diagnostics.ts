/**
 * Diagnostic sinks
 *
 * The validator and records report failures here. Reporting is
 * fire-and-forget: a sink can never change the outcome of a validation.
 */

import type { Logger } from '@record-schema/logger';
import type { Severity, ValidationError, ValidationErrorCode } from './types.js';

export interface Diagnostic {
  severity: Severity;
  code: ValidationErrorCode;
  message: string;
  /** What was being validated, usually a schema name */
  label: string;
  field?: string;
  expected?: string;
  actual?: string;
  path?: string;
}

export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

export const nullSink: DiagnosticSink = {
  report() {},
};

/**
 * Keeps every diagnostic in memory
 */
export class MemorySink implements DiagnosticSink {
  private diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  all(): Diagnostic[] {
    return [...this.diagnostics];
  }

  last(): Diagnostic | null {
    return this.diagnostics.length > 0 ? this.diagnostics[this.diagnostics.length - 1] : null;
  }

  clear(): void {
    this.diagnostics = [];
  }
}

/**
 * Forward diagnostics to a logger, errors and warnings as separate event types
 */
export function createLoggerSink(logger: Logger): DiagnosticSink {
  return {
    report(diagnostic) {
      const { severity, ...metadata } = diagnostic;
      if (severity === 'error') {
        logger.error('record_validation_failed', metadata);
      } else {
        logger.warn('record_validation_warning', metadata);
      }
    },
  };
}

export function toDiagnostic(error: ValidationError, severity: Severity, label: string): Diagnostic {
  const diagnostic: Diagnostic = {
    severity,
    code: error.code,
    message: error.message,
    label,
    path: error.path,
  };
  if (error.field !== undefined) diagnostic.field = error.field;
  if (error.expected !== undefined) diagnostic.expected = error.expected;
  if (error.actual !== undefined) diagnostic.actual = error.actual;
  return diagnostic;
}

export function reportSafely(sink: DiagnosticSink, diagnostic: Diagnostic): void {
  try {
    sink.report(diagnostic);
  } catch (err) {
    console.error('Diagnostic sink failed:', err);
  }
}
