import * as fs from 'node:fs';
import * as path from 'node:path';
import { InterpretResult, interpretControl } from './control.js';
import { ControlDocument } from './document.js';
import { collectDiagnostics } from './diagnostics.js';
import { Status } from './errors.js';
import { readString } from './parser.js';

/**
 * Options for loading control files
 */
export interface LoadOptions {
  /** Directory to scan for control files */
  contentDir: string;
  /** Whether to include dot-files (default: false) */
  includeHidden?: boolean;
}

/**
 * Result of loading all control files in a directory
 */
export interface LoadResult {
  /** Parsed documents by file name */
  documents: Map<string, ControlDocument>;
  /** Outcome of parsing each file */
  statuses: Map<string, Status>;
  /** Raw content of each file */
  corpus: Map<string, string>;
  /** Package interpretation of each file that parsed cleanly */
  packages: Map<string, InterpretResult>;
  /** Diagnostics and read failures, one message each */
  errors: string[];
}

function isControlFile(filename: string): boolean {
  return filename === 'control' || filename.endsWith('.control');
}

/**
 * Find all control files in a directory (non-recursive)
 */
function findControlFiles(dir: string, includeHidden: boolean): string[] {
  const files: string[] = [];

  try {
    const entries = fs.readdirSync(dir, { withFileTypes: true });

    for (const entry of entries) {
      if (!entry.isFile() || !isControlFile(entry.name)) {
        continue;
      }
      if (includeHidden || !entry.name.startsWith('.')) {
        files.push(path.join(dir, entry.name));
      }
    }
  } catch (err) {
    console.warn(`Cannot scan ${dir}: ${err}`);
  }

  return files.sort();
}

/**
 * Load and parse every control file in a directory. Each file gets its own
 * document; files that parse are interpreted once as package paragraphs.
 * Diagnostics from both steps are collected rather than printed.
 */
export function loadControlFiles(options: LoadOptions): LoadResult {
  const { contentDir, includeHidden = false } = options;

  const documents = new Map<string, ControlDocument>();
  const statuses = new Map<string, Status>();
  const corpus = new Map<string, string>();
  const packages = new Map<string, InterpretResult>();
  const errors: string[] = [];

  for (const filePath of findControlFiles(contentDir, includeHidden)) {
    const documentId = path.basename(filePath);

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      errors.push(`Failed to read ${documentId}: ${err}`);
      continue;
    }
    corpus.set(documentId, content);

    const { diagnostics, warnings, criticals } = collectDiagnostics();
    const document = new ControlDocument(diagnostics);
    const status = readString(document, content, documentId);

    documents.set(documentId, document);
    statuses.set(documentId, status);
    if (status.ok) {
      packages.set(documentId, interpretControl(document));
    }
    errors.push(...warnings, ...criticals);
  }

  return { documents, statuses, corpus, packages, errors };
}
