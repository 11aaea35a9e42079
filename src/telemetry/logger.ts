import { PROGRAM_NAME } from '../config/defaults.js';

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export type DiagnosticKind = 'note' | 'error';

// stdout belongs to the child build tools, whose output is streamed through.
// Our own lines go to stderr so they never interleave mid-line with it.
const emit = (message: string, context?: LogContext): void => {
  if (context && Object.keys(context).length > 0) {
    console.error(message, context);
    return;
  }
  console.error(message);
};

export const logInfo: LoggerFn = (message, context) => emit(message, context);
export const logError: LoggerFn = (message, context) => emit(message, context);

/**
 * `--- spm-bootstrap: note: Building llbuild`
 */
export function formatDiagnostic(kind: DiagnosticKind, message: string, program: string = PROGRAM_NAME): string {
  return `--- ${program}: ${kind}: ${message}`;
}

export const logNote = (message: string): void => logInfo(formatDiagnostic('note', message));
