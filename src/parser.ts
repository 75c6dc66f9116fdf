import * as fs from 'node:fs';
import { Block, Chunk, ControlDocument, Section } from './document.js';
import { Diagnostics } from './diagnostics.js';
import {
  ControlSyntaxError,
  FileError,
  MemoryError,
  ParameterError,
  Status,
  failure,
  success
} from './errors.js';

/**
 * Result of parsing control text into a fresh document
 */
export interface ParseResult {
  document: ControlDocument;
  status: Status;
}

// Trailing space, tab, CR and LF are never significant
const TRAILING_WHITESPACE = /[ \t\r\n]+$/;

// Field values lose the blanks between the colon and the text
const LEADING_BLANKS = /^[ \t]+/;

function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

/**
 * Split text into physical lines. A trailing newline does not start
 * another line.
 */
function splitLines(content: string): string[] {
  if (content === '') {
    return [];
  }
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** True for the error Node raises when file contents exceed the maximum string length. */
export function isOutOfMemory(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ERR_STRING_TOO_LONG';
}

/**
 * Report a grammar violation on the current line and fail.
 */
function syntaxFailure(document: ControlDocument, message: string): Status {
  document.diagnostics.critical(document.context, message);
  return failure(new ControlSyntaxError(message, document.context));
}

/**
 * Handle a line starting with a space or tab: it extends the most recently
 * opened field of the current section.
 */
function parseContinuation(document: ControlDocument, section: Section, line: string): Status {
  const block = section.tail;
  if (!block) {
    return syntaxFailure(
      document,
      'Attempted to continue a previous field, but none has been opened yet'
    );
  }

  const marker = line[1];
  let chunk: Chunk;

  if (marker === '.') {
    if (line.length !== 2) {
      return syntaxFailure(
        document,
        "Continuation lines beginning with '.' are reserved unless the '.' stands alone"
      );
    }
    chunk = Chunk.empty(document.context);
  } else if (isBlank(marker)) {
    chunk = Chunk.fixed(line.slice(2), document.context);
  } else {
    chunk = Chunk.merge(line.slice(1), document.context);
  }

  block.append(chunk);
  return success();
}

/**
 * Handle a `Name: value` line, opening a new field or merging into an
 * existing one of the same name.
 */
function parseField(document: ControlDocument, section: Section, line: string): Status {
  const colon = line.indexOf(':');
  if (colon === -1) {
    return syntaxFailure(
      document,
      'Expected a field:value pair; to continue a previous line, indent it with a space'
    );
  }

  const name = line.slice(0, colon);
  const value = line.slice(colon + 1).replace(LEADING_BLANKS, '');

  let block = section.find(name);
  if (block) {
    document.diagnostics.warn(
      document.context,
      `Duplicate field '${name}'; contents will be merged`
    );
  } else {
    block = new Block(name, document.context);
    section.append(block);
  }

  block.append(value === '' ? Chunk.empty(document.context) : Chunk.fixed(value, document.context));
  return success();
}

/**
 * Open the first section of a document that has never been read.
 */
export function beginDocument(document: ControlDocument, path: string): Status {
  if (document.state !== 'before-document' || document.head) {
    return failure(new ParameterError('Document has already been read; use a new document'));
  }

  document.context.path = path;
  document.context.line = 0;
  document.append(new Section());
  document.state = 'in-section';
  return success();
}

/**
 * Process one physical line. Once a line fails, the document stops
 * accepting input.
 */
export function readLine(document: ControlDocument, line: string): Status {
  const section = document.tail;
  if (document.state !== 'in-section' || !section) {
    return failure(new ParameterError(
      document.state === 'after-critical-error'
        ? 'Document reading was halted by an earlier error'
        : 'Document has not been started; call beginDocument first'
    ));
  }

  document.context.line++;

  const status = classifyLine(document, section, line);
  if (!status.ok) {
    document.state = 'after-critical-error';
  }
  return status;
}

function classifyLine(document: ControlDocument, section: Section, raw: string): Status {
  const line = raw.replace(TRAILING_WHITESPACE, '');

  if (line.startsWith('#')) {
    return success();
  }

  // A blank line ends the paragraph, unless the paragraph has nothing in it
  if (line === '') {
    if (section.isEmpty) {
      document.diagnostics.warn(document.context, 'Multiple blank lines will be collapsed into one');
    } else {
      document.append(new Section());
    }
    return success();
  }

  if (isBlank(line[0])) {
    return parseContinuation(document, section, line);
  }
  return parseField(document, section, line);
}

/**
 * Parse in-memory control text into a document that has never been read.
 * `path` is used for diagnostics only.
 */
export function readString(document: ControlDocument, content: string, path: string): Status {
  const begun = beginDocument(document, path);
  if (!begun.ok) {
    return begun;
  }

  for (const line of splitLines(content)) {
    const status = readLine(document, line);
    if (!status.ok) {
      return status;
    }
  }
  return success();
}

/**
 * Read a control file synchronously into a document that has never been
 * read. On failure the document may be partially populated and should be
 * discarded.
 */
export function readFile(document: ControlDocument, path: string): Status {
  if (document.state !== 'before-document' || document.head) {
    return failure(new ParameterError('Document has already been read; use a new document'));
  }

  let content: string;
  try {
    content = fs.readFileSync(path, 'utf-8');
  } catch (err) {
    document.context.path = path;
    document.state = 'after-critical-error';

    if (isOutOfMemory(err)) {
      const message = `Not enough memory to read '${path}': ${describeError(err)}`;
      document.diagnostics.critical(undefined, message);
      return failure(new MemoryError(message));
    }

    const message = `Can't open file '${path}': ${describeError(err)}`;
    document.diagnostics.critical(undefined, message);
    return failure(new FileError(message, path));
  }

  return readString(document, content, path);
}

/**
 * Parse control text into a new document.
 */
export function parseControl(
  content: string,
  path: string,
  diagnostics: Diagnostics = new Diagnostics()
): ParseResult {
  const document = new ControlDocument(diagnostics);
  const status = readString(document, content, path);
  return { document, status };
}
