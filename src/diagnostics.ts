import { DiagnosticHandler, ParserContext } from './types.js';

/**
 * Two-channel diagnostic output. Warnings are informational; critical
 * messages accompany a failing status returned by whoever emitted them.
 */
export interface DiagnosticSink {
  warn(context: ParserContext | undefined, message: string): void;
  critical(context: ParserContext | undefined, message: string): void;
}

/**
 * Render a diagnostic as a single line, e.g.
 * `warning: something odd at debian/control line 4`
 */
export function formatDiagnostic(
  prefix: string,
  context: ParserContext | undefined,
  message: string
): string {
  const location = context ? ` at ${context.path} line ${context.line}` : '';
  return `${prefix}: ${message}${location}`;
}

const defaultWarn: DiagnosticHandler = (context, message) => {
  console.error(formatDiagnostic('warning', context, message));
};

const defaultCritical: DiagnosticHandler = (context, message) => {
  console.error(formatDiagnostic('critical error', context, message));
};

/**
 * Diagnostic facility with replaceable handlers. Passing `undefined` to a
 * setter restores the built-in handler, which writes to stderr.
 */
export class Diagnostics implements DiagnosticSink {
  private warnHandler: DiagnosticHandler = defaultWarn;
  private criticalHandler: DiagnosticHandler = defaultCritical;

  constructor(handlers: { warn?: DiagnosticHandler; critical?: DiagnosticHandler } = {}) {
    this.setWarnHandler(handlers.warn);
    this.setCriticalHandler(handlers.critical);
  }

  setWarnHandler(handler?: DiagnosticHandler): void {
    this.warnHandler = handler ?? defaultWarn;
  }

  setCriticalHandler(handler?: DiagnosticHandler): void {
    this.criticalHandler = handler ?? defaultCritical;
  }

  warn(context: ParserContext | undefined, message: string): void {
    this.warnHandler(context, message);
  }

  critical(context: ParserContext | undefined, message: string): void {
    this.criticalHandler(context, message);
  }
}

/**
 * Diagnostics that are recorded instead of printed
 */
export interface CollectedDiagnostics {
  diagnostics: Diagnostics;
  warnings: string[];
  criticals: string[];
}

/**
 * Create a facility that keeps every message (already formatted) so callers
 * can report them as data.
 */
export function collectDiagnostics(): CollectedDiagnostics {
  const warnings: string[] = [];
  const criticals: string[] = [];
  const diagnostics = new Diagnostics({
    warn: (context, message) => warnings.push(formatDiagnostic('warning', context, message)),
    critical: (context, message) => criticals.push(formatDiagnostic('critical error', context, message))
  });
  return { diagnostics, warnings, criticals };
}
