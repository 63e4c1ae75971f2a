import { z } from 'zod';
import { indexOutOfRange } from './errors';
import { ok } from './ResponseEnvelope';
import {
  checkParagraph,
  checkSection,
  defineTool,
  documentName,
  lineCount,
  paragraphIndex,
  sectionIndex,
  withDocument,
  wordCount,
} from './ToolSupport';
import type { Tool } from './ToolSupport';

export const ParagraphRequest = z.object({
  document_name: documentName,
  paragraph_index: paragraphIndex,
  section_index: sectionIndex,
});

const getParagraphText = defineTool({
  name: 'get_paragraph_text',
  description: 'Get the text of a paragraph. Line breaks come back as \\n and tabs as \\t.',
  code: 'PARAGRAPH_TEXT_ERROR',
  schema: ParagraphRequest,
  handler: async (args, ctx) => {
    const text = await withDocument(ctx, args.document_name, false, doc => {
      checkParagraph(doc, args.section_index, args.paragraph_index);
      return doc.getParagraphText(args.section_index, args.paragraph_index);
    });
    return ok(`Retrieved text from paragraph ${args.paragraph_index}`, {
      section_index: args.section_index,
      paragraph_index: args.paragraph_index,
      text,
      text_length: text.length,
      has_text: text.trim().length > 0,
      word_count: wordCount(text),
      line_count: lineCount(text),
    });
  },
});

const deleteParagraph = defineTool({
  name: 'delete_paragraph',
  description: 'Delete a paragraph from a section.',
  code: 'PARAGRAPH_DELETE_ERROR',
  schema: ParagraphRequest,
  handler: async (args, ctx) => {
    const result = await withDocument(ctx, args.document_name, true, doc => {
      checkParagraph(doc, args.section_index, args.paragraph_index);
      const deleted = doc.deleteParagraph(args.section_index, args.paragraph_index);
      return { deleted, remaining: doc.paragraphCount(args.section_index) };
    });
    return ok(`Deleted paragraph ${args.paragraph_index} from section ${args.section_index}`, {
      section_index: args.section_index,
      paragraph_index: args.paragraph_index,
      deleted_text: result.deleted,
      remaining_paragraphs: result.remaining,
    });
  },
});

const getParagraphInfo = defineTool({
  name: 'get_paragraph_info',
  description: 'Get the text, alignment and style of a paragraph.',
  code: 'PARAGRAPH_INFO_ERROR',
  schema: ParagraphRequest,
  handler: async (args, ctx) => {
    const info = await withDocument(ctx, args.document_name, false, doc => {
      checkParagraph(doc, args.section_index, args.paragraph_index);
      return {
        text: doc.getParagraphText(args.section_index, args.paragraph_index),
        alignment: doc.getParagraphFormat(args.section_index, args.paragraph_index).alignment,
        style: doc.getParagraphStyleName(args.section_index, args.paragraph_index),
      };
    });
    return ok(`Retrieved info for paragraph ${args.paragraph_index}`, {
      section_index: args.section_index,
      paragraph_index: args.paragraph_index,
      text: info.text,
      text_length: info.text.length,
      has_text: info.text.trim().length > 0,
      alignment: info.alignment,
      style_name: info.style,
    });
  },
});

export const AddParagraphRequest = z.object({
  document_name: documentName,
  text: z.string().describe('Paragraph text; \\n becomes a line break and \\t a tab'),
  section_index: sectionIndex,
  paragraph_index: z.number().int().min(0).optional()
    .describe('Insert before the paragraph at this index; omit or use the paragraph count to append'),
});

const addParagraph = defineTool({
  name: 'add_paragraph',
  description: 'Add a paragraph to a section, at the end or before a given paragraph.',
  code: 'PARAGRAPH_ADD_ERROR',
  schema: AddParagraphRequest,
  handler: async (args, ctx) => {
    const result = await withDocument(ctx, args.document_name, true, doc => {
      checkSection(doc, args.section_index);
      const count = doc.paragraphCount(args.section_index);
      if (args.paragraph_index !== undefined && args.paragraph_index > count) {
        throw indexOutOfRange('Paragraph', args.paragraph_index, count, `section ${args.section_index}`);
      }
      const index = doc.insertParagraph(args.section_index, args.text, args.paragraph_index);
      return { index, total: doc.paragraphCount(args.section_index) };
    });
    return ok(`Added paragraph ${result.index} to section ${args.section_index}`, {
      section_index: args.section_index,
      paragraph_index: result.index,
      text: args.text,
      text_length: args.text.length,
      word_count: wordCount(args.text),
      total_paragraphs_in_section: result.total,
    });
  },
});

export const UpdateParagraphRequest = z.object({
  document_name: documentName,
  paragraph_index: paragraphIndex,
  new_text: z.string().describe('Replacement text; \\n becomes a line break and \\t a tab'),
  section_index: sectionIndex,
});

const updateParagraphText = defineTool({
  name: 'update_paragraph_text',
  description: 'Replace the text of a paragraph, keeping its paragraph and character formatting.',
  code: 'PARAGRAPH_UPDATE_ERROR',
  schema: UpdateParagraphRequest,
  handler: async (args, ctx) => {
    const original = await withDocument(ctx, args.document_name, true, doc => {
      checkParagraph(doc, args.section_index, args.paragraph_index);
      return doc.setParagraphText(args.section_index, args.paragraph_index, args.new_text);
    });
    return ok(`Updated paragraph ${args.paragraph_index} in section ${args.section_index}`, {
      section_index: args.section_index,
      paragraph_index: args.paragraph_index,
      original_text: original,
      new_text: args.new_text,
      text_length: args.new_text.length,
      word_count: wordCount(args.new_text),
    });
  },
});

export const paragraphTools: Tool[] = [
  getParagraphText,
  deleteParagraph,
  getParagraphInfo,
  addParagraph,
  updateParagraphText,
];
