import { Block, ControlDocument, Section } from './document.js';
import {
  ControlSyntaxError,
  PackageNameError,
  Result,
  Status,
  failure,
  success
} from './errors.js';
import { ParserContext } from './types.js';
import { describePackageNameRule, validatePackageName } from './validate.js';

/**
 * A paragraph describing one package
 */
export interface PackageParagraph {
  /** Validated package name */
  name: string;

  /** Where the name field was declared */
  context: ParserContext;

  /** Every other field's logical value, keyed by the field name as written */
  fields: Map<string, string>;
}

/**
 * Semantic view of a `debian/control` file: one source paragraph followed by
 * the binary packages it builds.
 */
export interface SourceControl {
  source?: PackageParagraph;
  binaries: PackageParagraph[];
}

export interface InterpretResult {
  status: Status;
  control: SourceControl;
}

/**
 * Logical value of a field. Merge chunks continue the previous line after a
 * space, fixed chunks start a new line and empty chunks stand for a blank
 * line. An empty first chunk (a field with nothing after the colon)
 * contributes nothing.
 */
export function blockValue(block: Block): string {
  const lines: string[] = [];

  block.chunks.forEach((chunk, index) => {
    if (chunk.kind === 'empty') {
      if (index > 0) {
        lines.push('');
      }
      return;
    }

    const text = chunk.text ?? '';
    const last = lines.length - 1;
    if (chunk.kind === 'merge' && last >= 0 && lines[last] !== '') {
      lines[last] += ` ${text}`;
    } else {
      lines.push(text);
    }
  });

  return lines.join('\n');
}

function readParagraph(
  document: ControlDocument,
  section: Section,
  nameField: string
): Result<PackageParagraph> {
  const block = section.find(nameField);
  if (!block) {
    const context = section.head?.context;
    const message = `Paragraph is missing its '${nameField}' field`;
    document.diagnostics.critical(context, message);
    return failure(new ControlSyntaxError(message, context));
  }

  const name = blockValue(block).trim();
  const rule = validatePackageName(name);
  if (rule !== 'valid') {
    const message = `Package name '${name}' ${describePackageNameRule(rule)}`;
    document.diagnostics.critical(block.context, message);
    return failure(new PackageNameError(message, name, rule, block.context));
  }

  const fields = new Map<string, string>();
  for (const other of section.blocks) {
    if (other !== block) {
      fields.set(other.name, blockValue(other));
    }
  }

  return { ok: true, value: { name, context: block.context, fields } };
}

/**
 * Map the paragraphs of a parsed source package control file onto packages.
 * The first paragraph names the source package, each later one a binary
 * package. Stops at the first paragraph that fails validation.
 */
export function interpretControl(document: ControlDocument): InterpretResult {
  const control: SourceControl = { binaries: [] };
  const paragraphs = document.sections.filter(section => !section.isEmpty);

  for (const [index, section] of paragraphs.entries()) {
    const result = readParagraph(document, section, index === 0 ? 'Source' : 'Package');
    if (!result.ok) {
      return { status: result, control };
    }

    if (index === 0) {
      control.source = result.value;
    } else {
      control.binaries.push(result.value);
    }
  }

  return { status: success(), control };
}
