import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DocxDocument } from './DocxDocument';
import { validationError } from './errors';
import { requireDocumentName } from './PathResolver';
import { ok } from './ResponseEnvelope';
import { defineTool, documentName, loadDocument, saveDocument, withDocument } from './ToolSupport';
import type { Tool } from './ToolSupport';

// ============================================================
// create_document
// ============================================================

export const CreateDocumentRequest = z.object({
  document_name: documentName,
  template_path: z.string().optional().describe('Optional existing document under the documents directory to copy from'),
});

const createDocument = defineTool({
  name: 'create_document',
  description: 'Create a new Word document, optionally as a copy of a template. An existing file with the same name is overwritten.',
  code: 'DOC_CREATE_ERROR',
  schema: CreateDocumentRequest,
  handler: async (args, ctx) => {
    const target = ctx.paths.resolve(args.document_name);
    requireDocumentName(args.document_name);
    const template = args.template_path;
    if (template !== undefined) {
      ctx.paths.resolve(template);
      requireDocumentName(template);
    }

    return ctx.locks.withLock(template ? [args.document_name, template] : args.document_name, async () => {
      const doc = template
        ? await loadDocument(ctx.paths.resolveExisting(template))
        : await DocxDocument.createBlank();
      doc.setPackageKind(path.extname(args.document_name));
      await saveDocument(doc, target);

      const stats = fs.statSync(target);
      return ok(`Document ${args.document_name} created successfully`, {
        path: target,
        name: args.document_name,
        size: stats.size,
        created: stats.birthtime.toISOString(),
        modified: stats.mtime.toISOString(),
        from_template: template ?? null,
      });
    });
  },
});

// ============================================================
// set_document_protection
// ============================================================

export const PROTECTION_LEVELS = ['none', 'read_only', 'form_filling', 'comments', 'revisions'] as const;

export const SetProtectionRequest = z.object({
  document_name: documentName,
  protection_level: z.enum(PROTECTION_LEVELS).describe('Editing restriction to enforce; "none" removes protection'),
  password: z.string().optional().describe('Optional password required to lift the protection'),
});

const setDocumentProtection = defineTool({
  name: 'set_document_protection',
  description: 'Restrict editing of a document (read only, form filling, comments or tracked revisions), optionally with a password.',
  code: 'DOC_PROTECT_ERROR',
  schema: SetProtectionRequest,
  handler: async (args, ctx) => {
    const hasPassword = args.protection_level !== 'none' && !!args.password;
    await withDocument(ctx, args.document_name, true, doc => {
      doc.setProtection(args.protection_level, hasPassword ? args.password : undefined);
    });
    return ok(`Protection set to ${args.protection_level} for ${args.document_name}`, {
      protection_level: args.protection_level,
      is_protected: args.protection_level !== 'none',
      has_password: hasPassword,
    });
  },
});

// ============================================================
// find_and_replace
// ============================================================

export const FindReplaceRequest = z.object({
  document_name: documentName,
  find_text: z.string().min(1, 'find_text cannot be empty').describe('Text to search for'),
  replace_text: z.string().describe('Replacement text'),
  match_case: z.boolean().default(false),
  match_whole_word: z.boolean().default(false),
});

const findAndReplace = defineTool({
  name: 'find_and_replace',
  description: 'Replace every occurrence of a text in the document body and its tables.',
  code: 'DOC_REPLACE_ERROR',
  schema: FindReplaceRequest,
  handler: async (args, ctx) => {
    const replacements = await withDocument(ctx, args.document_name, true, doc =>
      doc.replaceText(args.find_text, args.replace_text, {
        matchCase: args.match_case,
        matchWholeWord: args.match_whole_word,
      }));
    return ok(`Replaced ${replacements} occurrence${replacements === 1 ? '' : 's'} of "${args.find_text}"`, {
      replacements,
      search_params: {
        find_text: args.find_text,
        replace_text: args.replace_text,
        match_case: args.match_case,
        match_whole_word: args.match_whole_word,
      },
    });
  },
});

// ============================================================
// merge_documents
// ============================================================

export const MergeDocumentsRequest = z.object({
  original_document: documentName.describe('Document whose content comes first'),
  merge_document: documentName.describe('Document appended after a page break'),
  output_document: documentName.describe('Name of the merged document to write'),
});

const mergeDocuments = defineTool({
  name: 'merge_documents',
  description: 'Append one document to another after a page break and save the result under a new name.',
  code: 'DOC_MERGE_ERROR',
  schema: MergeDocumentsRequest,
  handler: async (args, ctx) => {
    const names = [args.original_document, args.merge_document, args.output_document];
    for (const name of names) {
      ctx.paths.resolve(name);
      requireDocumentName(name);
    }

    return ctx.locks.withLock(names, async () => {
      const original = await loadDocument(ctx.paths.resolveExisting(args.original_document));
      const addition = await loadDocument(ctx.paths.resolveExisting(args.merge_document));
      const stats = original.appendDocument(addition);
      const outputPath = ctx.paths.resolve(args.output_document);
      original.setPackageKind(path.extname(args.output_document));
      await saveDocument(original, outputPath);

      return ok(`Merged ${args.merge_document} into ${args.output_document}`, {
        output_path: outputPath,
        merged_sections: stats.sections,
        merged_paragraphs: stats.paragraphs,
        merged_tables: stats.tables,
      });
    });
  },
});

// ============================================================
// add_text_watermark
// ============================================================

const NAMED_COLORS: Record<string, string> = {
  black: '#000000',
  white: '#FFFFFF',
  red: '#FF0000',
  green: '#008000',
  lime: '#00FF00',
  blue: '#0000FF',
  navy: '#000080',
  yellow: '#FFFF00',
  orange: '#FFA500',
  purple: '#800080',
  magenta: '#FF00FF',
  cyan: '#00FFFF',
  teal: '#008080',
  maroon: '#800000',
  olive: '#808000',
  gray: '#808080',
  grey: '#808080',
  silver: '#C0C0C0',
};

/** `#RRGGBB` for a named colour or hex value. */
export function resolveColor(color: string): string {
  const named = NAMED_COLORS[color.trim().toLowerCase()];
  if (named) return named;
  const hex = /^#?([0-9a-f]{6})$/i.exec(color.trim());
  if (!hex) {
    throw validationError(`Unknown color: ${color}. Use #RRGGBB or one of ${Object.keys(NAMED_COLORS).join(', ')}`);
  }
  return `#${hex[1].toUpperCase()}`;
}

export const AddWatermarkRequest = z.object({
  document_name: documentName,
  text: z.string().trim().min(1, 'text cannot be empty').describe('Watermark text'),
  font_size: z.number().int().min(1).max(500).default(65).describe('Font size in points (default: 65)'),
  color: z.string().default('Red').describe('Colour name or #RRGGBB (default: Red)'),
});

const addTextWatermark = defineTool({
  name: 'add_text_watermark',
  description: 'Add a diagonal text watermark behind the content of every page.',
  code: 'DOC_WATERMARK_ERROR',
  schema: AddWatermarkRequest,
  handler: async (args, ctx) => {
    const color = resolveColor(args.color);
    await withDocument(ctx, args.document_name, true, doc => {
      doc.addTextWatermark({ text: args.text, fontSize: args.font_size, color });
    });
    return ok(`Watermark added to ${args.document_name}`, {
      watermark_info: {
        text: args.text,
        font_size: args.font_size,
        color,
        layout: 'diagonal',
      },
    });
  },
});

export const documentTools: Tool[] = [
  createDocument,
  setDocumentProtection,
  findAndReplace,
  mergeDocuments,
  addTextWatermark,
];
