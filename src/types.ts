/**
 * Position in a source file, stamped onto every block and chunk.
 */
export interface ParserContext {
  /** The file being read */
  path: string;

  /** Line number of the most recently read line (1-based, 0 before reading) */
  line: number;
}

/**
 * How a chunk's text relates to the line before it.
 * - `empty`: a blank continuation line (` .`), carries no text
 * - `merge`: may be rejoined with the previous line's value
 * - `fixed`: preformatted, must be reproduced exactly
 */
export type ChunkKind = 'empty' | 'merge' | 'fixed';

/**
 * Engine state for a document.
 */
export type ParserState = 'before-document' | 'in-section' | 'after-critical-error';

/**
 * Receives a formatted diagnostic message. The context is absent for
 * problems not tied to a line (e.g. a file that cannot be opened).
 */
export type DiagnosticHandler = (context: ParserContext | undefined, message: string) => void;

/**
 * Copy a context by value.
 */
export function snapshotContext(context: ParserContext): ParserContext {
  return { path: context.path, line: context.line };
}
