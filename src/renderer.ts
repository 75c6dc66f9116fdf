import { Block, Chunk, ControlDocument, Section } from './document.js';
import { ParameterError } from './errors.js';

/**
 * Render a continuation chunk as the line that would produce it
 */
function renderContinuation(chunk: Chunk): string {
  switch (chunk.kind) {
    case 'empty':
      return ' .\n';
    case 'merge':
      return ` ${chunk.text ?? ''}\n`;
    case 'fixed':
      return `  ${chunk.text ?? ''}\n`;
  }
}

/**
 * Flatten a field back to control file text. Parsing the output yields a
 * field with the same chunk kinds, order and text.
 */
export function renderBlock(block: Block): string {
  const [head, ...rest] = block.chunks;
  if (!head) {
    throw new ParameterError(`Field '${block.name}' has no content to render`, block.context);
  }

  let text = head.text === undefined ? `${block.name}:\n` : `${block.name}: ${head.text}\n`;
  for (const chunk of rest) {
    text += renderContinuation(chunk);
  }
  return text;
}

export function renderSection(section: Section): string {
  return section.blocks.map(renderBlock).join('');
}

/**
 * Render every non-empty section, separated by a single blank line
 */
export function renderDocument(document: ControlDocument): string {
  return document.sections
    .filter(section => !section.isEmpty)
    .map(renderSection)
    .join('\n');
}

/**
 * Human-readable listing of a document's structure, one line per field and
 * chunk. Used for debugging.
 */
export function dumpDocument(document: ControlDocument): string {
  const lines: string[] = [];

  document.sections.forEach((section, index) => {
    lines.push(`------ Section ${index + 1} ------`);
    for (const block of section.blocks) {
      lines.push(`  ${block.name}`);
      for (const chunk of block.chunks) {
        lines.push(chunk.text === undefined ? `[${chunk.kind}]` : `[${chunk.kind}] ${chunk.text}`);
      }
    }
  });

  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}
