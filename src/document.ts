import { ParameterError } from './errors.js';
import { Diagnostics } from './diagnostics.js';
import { ChunkKind, ParserContext, ParserState, snapshotContext } from './types.js';

/**
 * One physical line's contribution to a field value.
 * `text` is present exactly when `kind` is not `empty`.
 */
export class Chunk {
  readonly context: ParserContext;

  private constructor(
    public readonly kind: ChunkKind,
    public readonly text: string | undefined,
    context: ParserContext
  ) {
    this.context = snapshotContext(context);
  }

  static empty(context: ParserContext): Chunk {
    return new Chunk('empty', undefined, context);
  }

  static merge(text: string, context: ParserContext): Chunk {
    return new Chunk('merge', text, context);
  }

  static fixed(text: string, context: ParserContext): Chunk {
    return new Chunk('fixed', text, context);
  }
}

/**
 * Create a chunk from optional text: `merge` when text is given, `empty`
 * otherwise.
 */
export function createChunk(text: string | undefined, context: ParserContext): Chunk {
  return text === undefined ? Chunk.empty(context) : Chunk.merge(text, context);
}

/**
 * A named field within a section, holding its chunks in file order.
 */
export class Block {
  readonly context: ParserContext;
  private readonly items: Chunk[] = [];

  constructor(public readonly name: string, context: ParserContext) {
    this.context = snapshotContext(context);
  }

  get chunks(): readonly Chunk[] {
    return this.items;
  }

  get head(): Chunk | undefined {
    return this.items[0];
  }

  get tail(): Chunk | undefined {
    return this.items[this.items.length - 1];
  }

  append(chunk: Chunk): void {
    this.items.push(chunk);
  }

  prepend(chunk: Chunk): void {
    this.items.unshift(chunk);
  }

  /**
   * Unlink a chunk and hand it back to the caller.
   */
  delete(chunk: Chunk): Chunk {
    const index = this.items.indexOf(chunk);
    if (index === -1) {
      throw new ParameterError(`Chunk does not belong to field '${this.name}'`);
    }
    this.items.splice(index, 1);
    return chunk;
  }

  /** Case-insensitive name comparison; field names are not case sensitive. */
  matches(name: string): boolean {
    return this.name.toLowerCase() === name.toLowerCase();
  }

  destroy(): void {
    this.items.length = 0;
  }
}

/**
 * One paragraph of a control file.
 */
export class Section {
  private readonly items: Block[] = [];

  get blocks(): readonly Block[] {
    return this.items;
  }

  get head(): Block | undefined {
    return this.items[0];
  }

  get tail(): Block | undefined {
    return this.items[this.items.length - 1];
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Append a block. A section never holds two blocks with the same name.
   */
  append(block: Block): void {
    if (this.find(block.name)) {
      throw new ParameterError(`Section already contains a field named '${block.name}'`, block.context);
    }
    this.items.push(block);
  }

  find(name: string): Block | undefined {
    return this.items.find(block => block.matches(name));
  }

  destroy(): void {
    for (const block of this.items) {
      block.destroy();
    }
    this.items.length = 0;
  }
}

/**
 * Top-level owner of a parsed control file. A document is populated by a
 * single read pass.
 */
export class ControlDocument {
  readonly context: ParserContext = { path: '', line: 0 };
  state: ParserState = 'before-document';
  private readonly items: Section[] = [];
  readonly diagnostics: Diagnostics;
  /** Set when the diagnostics instance was created here and not passed in */
  private readonly ownsDiagnostics: boolean;

  constructor(diagnostics?: Diagnostics) {
    this.diagnostics = diagnostics ?? new Diagnostics();
    this.ownsDiagnostics = diagnostics === undefined;
  }

  get sections(): readonly Section[] {
    return this.items;
  }

  get head(): Section | undefined {
    return this.items[0];
  }

  get tail(): Section | undefined {
    return this.items[this.items.length - 1];
  }

  append(section: Section): void {
    this.items.push(section);
  }

  destroy(): void {
    for (const section of this.items) {
      section.destroy();
    }
    this.items.length = 0;
    this.context.path = '';
    this.context.line = 0;
    if (this.ownsDiagnostics) {
      this.diagnostics.setWarnHandler(undefined);
      this.diagnostics.setCriticalHandler(undefined);
    }
    this.state = 'before-document';
  }
}
