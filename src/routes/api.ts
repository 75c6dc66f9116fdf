import { Router, Request, Response } from 'express';
import { LoadResult } from '../loader.js';
import { Block, Section } from '../document.js';
import { Status } from '../errors.js';
import { PackageParagraph, blockValue } from '../control.js';
import { renderDocument } from '../renderer.js';

function describeStatus(status: Status | undefined): { ok: boolean; error?: string; kind?: string } {
  if (!status || status.ok) {
    return { ok: true };
  }
  return { ok: false, error: status.error.message, kind: status.error.kind };
}

function serializeBlock(block: Block) {
  return {
    name: block.name,
    line: block.context.line,
    chunks: block.chunks.map(chunk => ({
      kind: chunk.kind,
      text: chunk.text,
      line: chunk.context.line
    }))
  };
}

function serializeSection(section: Section) {
  return { fields: section.blocks.map(serializeBlock) };
}

function serializePackage(paragraph: PackageParagraph) {
  return {
    name: paragraph.name,
    line: paragraph.context.line,
    fields: Object.fromEntries(paragraph.fields)
  };
}

/**
 * Create API routes for control file access
 */
export function createApiRoutes(data: LoadResult): Router {
  const router = Router();

  /**
   * GET /api/documents
   * List loaded control files with their parse outcome
   */
  router.get('/documents', (_req: Request, res: Response) => {
    const result = Array.from(data.documents.entries()).map(([documentId, document]) => ({
      documentId,
      sections: document.sections.length,
      ...describeStatus(data.statuses.get(documentId))
    }));

    res.json(result);
  });

  /**
   * GET /api/document/:id
   * Raw content of a control file
   */
  router.get('/document/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const content = data.corpus.get(id);

    if (content === undefined) {
      res.status(404).json({ error: `Document not found: ${id}` });
      return;
    }

    res.type('text/plain').send(content);
  });

  /**
   * GET /api/document/:id/sections
   * The parsed document model
   */
  router.get('/document/:id/sections', (req: Request, res: Response) => {
    const { id } = req.params;
    const document = data.documents.get(id);

    if (!document) {
      res.status(404).json({ error: `Document not found: ${id}` });
      return;
    }

    res.json({
      documentId: id,
      ...describeStatus(data.statuses.get(id)),
      sections: document.sections.map(serializeSection)
    });
  });

  /**
   * GET /api/document/:id/field/:name
   * A single field, looked up case-insensitively
   * Query params: ?section=2 (1-based, default 1)
   */
  router.get('/document/:id/field/:name', (req: Request, res: Response) => {
    const { id, name } = req.params;
    const document = data.documents.get(id);

    if (!document) {
      res.status(404).json({ error: `Document not found: ${id}` });
      return;
    }

    let sectionNumber = 1;
    const { section: sectionParam } = req.query;
    if (typeof sectionParam === 'string') {
      sectionNumber = parseInt(sectionParam, 10);
      if (isNaN(sectionNumber) || sectionNumber < 1) {
        res.status(400).json({ error: 'Query parameter "section" must be a positive number' });
        return;
      }
    }

    const block = document.sections[sectionNumber - 1]?.find(name);
    if (!block) {
      res.status(404).json({ error: `Field not found: ${name}` });
      return;
    }

    res.json({ ...serializeBlock(block), value: blockValue(block) });
  });

  /**
   * GET /api/render/:id
   * Re-serialize a parsed document as control file text
   */
  router.get('/render/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const document = data.documents.get(id);

    if (!document) {
      res.status(404).json({ error: `Document not found: ${id}` });
      return;
    }

    res.type('text/plain').send(renderDocument(document));
  });

  /**
   * GET /api/packages/:id
   * Source and binary packages described by a control file, as
   * interpreted when it was loaded
   */
  router.get('/packages/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    if (!data.documents.has(id)) {
      res.status(404).json({ error: `Document not found: ${id}` });
      return;
    }

    const parsed = data.statuses.get(id);
    if (parsed && !parsed.ok) {
      res.status(422).json(describeStatus(parsed));
      return;
    }

    const interpreted = data.packages.get(id);
    if (!interpreted) {
      res.status(404).json({ error: `No package data for: ${id}` });
      return;
    }

    const { status, control } = interpreted;
    res.status(status.ok ? 200 : 422).json({
      ...describeStatus(status),
      source: control.source ? serializePackage(control.source) : null,
      binaries: control.binaries.map(serializePackage)
    });
  });

  return router;
}
