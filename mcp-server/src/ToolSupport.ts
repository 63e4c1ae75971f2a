import * as fs from 'fs';
import JSZip from 'jszip';
import { z } from 'zod';
import type { ConversionHistoryStore } from './ConversionHistoryStore';
import type { DocumentConverter } from './DocumentConverter';
import type { DocumentLock } from './DocumentLock';
import { DocxDocument } from './DocxDocument';
import { DocumentFault, indexOutOfRange, validationError } from './errors';
import type { ErrorCode } from './errors';
import { createLogger } from './logger';
import { requireDocumentName } from './PathResolver';
import type { PathResolver } from './PathResolver';
import { attempt, errorEnvelope, toEnvelope } from './ResponseEnvelope';
import type { Envelope, Outcome } from './ResponseEnvelope';

const log = createLogger('tools');

/** Everything a tool handler may touch. */
export interface ToolContext {
  paths: PathResolver;
  locks: DocumentLock;
  history: ConversionHistoryStore;
  converter: DocumentConverter;
}

export interface Tool {
  name: string;
  description: string;
  code: ErrorCode;
  schema: z.ZodTypeAny;
  run(args: unknown, ctx: ToolContext): Promise<Envelope>;
}

interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  code: ErrorCode;
  schema: S;
  handler: (args: z.infer<S>, ctx: ToolContext) => Promise<Outcome>;
}

/**
 * Binds a request schema to its handler. Arguments are validated before the handler
 * runs and every failure leaves as an envelope carrying the tool's code.
 */
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): Tool {
  return {
    name: definition.name,
    description: definition.description,
    code: definition.code,
    schema: definition.schema,
    async run(args, ctx) {
      const parsed = definition.schema.safeParse(args ?? {});
      if (!parsed.success) {
        const fault = validationError(describeIssues(parsed.error));
        log.warn(`${definition.name}: ${fault.message}`);
        return errorEnvelope(definition.code, fault);
      }
      const outcome = await attempt(() => definition.handler(parsed.data, ctx));
      if (!outcome.ok) log.warn(`${definition.name} failed (${outcome.fault.kind}): ${outcome.fault.message}`);
      return toEnvelope(definition.code, outcome);
    },
  };
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// ============================================================
// Shared request fields
// ============================================================

export const documentName = z.string().describe('Document file name under the documents directory, e.g. "report.docx"');
export const sectionIndex = z.number().int().min(0).default(0).describe('Zero-based section index (default: 0)');
export const paragraphIndex = z.number().int().min(0).describe('Zero-based paragraph index within the section');
export const tableIndex = z.number().int().min(0).describe('Zero-based table index within the section');

// ============================================================
// Document access
// ============================================================

/**
 * Loads `name`, runs `task` on it and, when `mutates` is set, saves it in place, all
 * while holding the document's lock. Name checks run before anything touches the disk.
 */
export async function withDocument<T>(
  ctx: ToolContext,
  name: string,
  mutates: boolean,
  task: (doc: DocxDocument) => Promise<T> | T,
): Promise<T> {
  ctx.paths.resolve(name);
  requireDocumentName(name);
  return ctx.locks.withLock(name, async () => {
    const filePath = ctx.paths.resolveExisting(name);
    const doc = await loadDocument(filePath);
    const result = await task(doc);
    if (mutates) await saveDocument(doc, filePath);
    return result;
  });
}

export async function loadDocument(filePath: string): Promise<DocxDocument> {
  try {
    return await DocxDocument.load(fs.readFileSync(filePath));
  } catch (err) {
    if (err instanceof DocumentFault) throw err;
    throw new Error(`Failed to load document: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Serializes `doc`, checks the package reopens and moves it over `filePath`. */
export async function saveDocument(doc: DocxDocument, filePath: string): Promise<number> {
  const data = await doc.save();
  const zip = await JSZip.loadAsync(data);
  if (!zip.file('[Content_Types].xml')) {
    throw new Error('Save verification failed: [Content_Types].xml is missing');
  }
  writeFileAtomic(filePath, data);
  return data.length;
}

/** Writes through a sibling temp file so readers never see a partial file. */
export function writeFileAtomic(filePath: string, data: Buffer | string): void {
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    fs.writeFileSync(tempPath, data);
    fs.renameSync(tempPath, filePath);
  } catch (err) {
    if (fs.existsSync(tempPath)) fs.unlinkSync(tempPath);
    throw err;
  }
}

// ============================================================
// Index checks
// ============================================================

export function checkSection(doc: DocxDocument, index: number): void {
  const count = doc.sectionCount;
  if (index >= count) throw indexOutOfRange('Section', index, count, 'document');
}

export function checkParagraph(doc: DocxDocument, section: number, index: number): void {
  checkSection(doc, section);
  const count = doc.paragraphCount(section);
  if (index >= count) throw indexOutOfRange('Paragraph', index, count, `section ${section}`);
}

export function checkTable(doc: DocxDocument, section: number, index: number): void {
  checkSection(doc, section);
  const count = doc.tableCount(section);
  if (index >= count) throw indexOutOfRange('Table', index, count, `section ${section}`);
}

// ============================================================
// Text statistics
// ============================================================

export function wordCount(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

export function lineCount(text: string): number {
  return text === '' ? 0 : text.split('\n').length;
}
