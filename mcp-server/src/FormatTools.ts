import { z } from 'zod';
import type { ParagraphFormat } from './DocxDocument';
import { ok } from './ResponseEnvelope';
import { checkParagraph, defineTool, documentName, paragraphIndex, sectionIndex, withDocument } from './ToolSupport';
import type { Tool } from './ToolSupport';

const points = z.number().min(0);

export const FormatParagraphRequest = z.object({
  document_name: documentName,
  paragraph_index: paragraphIndex,
  section_index: sectionIndex,
  alignment: z.enum(['left', 'center', 'right', 'justify']).optional(),
  first_line_indent: points.optional().describe('First line indent in points'),
  left_indent: points.optional().describe('Left indent in points'),
  right_indent: points.optional().describe('Right indent in points'),
  line_spacing: points.optional().describe('Line spacing in points; with the multiple rule, 12 is single spacing'),
  line_spacing_rule: z.enum(['at_least', 'exactly', 'multiple']).optional()
    .describe('How line_spacing is applied; ignored unless line_spacing is given'),
  before_spacing: points.optional().describe('Space before the paragraph in points'),
  after_spacing: points.optional().describe('Space after the paragraph in points'),
});

type FormatParagraphArgs = z.infer<typeof FormatParagraphRequest>;

/** Snake-case view of a paragraph format, as it goes over the wire. */
export function formatToWire(format: ParagraphFormat) {
  return {
    alignment: format.alignment,
    first_line_indent: format.firstLineIndent,
    left_indent: format.leftIndent,
    right_indent: format.rightIndent,
    line_spacing: format.lineSpacing,
    line_spacing_rule: format.lineSpacingRule,
    before_spacing: format.beforeSpacing,
    after_spacing: format.afterSpacing,
  };
}

function requestedChanges(args: FormatParagraphArgs): Partial<ParagraphFormat> {
  const changes: Partial<ParagraphFormat> = {};
  if (args.alignment !== undefined) changes.alignment = args.alignment;
  if (args.first_line_indent !== undefined) changes.firstLineIndent = args.first_line_indent;
  if (args.left_indent !== undefined) changes.leftIndent = args.left_indent;
  if (args.right_indent !== undefined) changes.rightIndent = args.right_indent;
  if (args.line_spacing !== undefined) {
    changes.lineSpacing = args.line_spacing;
    if (args.line_spacing_rule !== undefined) changes.lineSpacingRule = args.line_spacing_rule;
  }
  if (args.before_spacing !== undefined) changes.beforeSpacing = args.before_spacing;
  if (args.after_spacing !== undefined) changes.afterSpacing = args.after_spacing;
  return changes;
}

const FORMAT_FIELDS = [
  'alignment', 'first_line_indent', 'left_indent', 'right_indent',
  'line_spacing', 'line_spacing_rule', 'before_spacing', 'after_spacing',
] as const;

function appliedFields(args: FormatParagraphArgs): Record<string, string | number> {
  const applied: Record<string, string | number> = {};
  for (const field of FORMAT_FIELDS) {
    const value = args[field];
    if (value === undefined) continue;
    if (field === 'line_spacing_rule' && args.line_spacing === undefined) continue;
    applied[field] = value;
  }
  return applied;
}

const formatParagraph = defineTool({
  name: 'format_paragraph',
  description: 'Set alignment, indentation and spacing of a paragraph. All lengths are in points.',
  code: 'FORMAT_ERROR',
  schema: FormatParagraphRequest,
  handler: async (args, ctx) => {
    const changes = requestedChanges(args);
    const result = await withDocument(ctx, args.document_name, true, doc => {
      checkParagraph(doc, args.section_index, args.paragraph_index);
      const before = doc.getParagraphFormat(args.section_index, args.paragraph_index);
      doc.applyParagraphFormat(args.section_index, args.paragraph_index, changes);
      return { before, after: doc.getParagraphFormat(args.section_index, args.paragraph_index) };
    });
    return ok(`Formatted paragraph ${args.paragraph_index} in section ${args.section_index}`, {
      section_index: args.section_index,
      paragraph_index: args.paragraph_index,
      original_formatting: formatToWire(result.before),
      current_formatting: formatToWire(result.after),
      changes_applied: appliedFields(args),
    });
  },
});

export const ParagraphFormatRequest = z.object({
  document_name: documentName,
  paragraph_index: paragraphIndex,
  section_index: sectionIndex,
});

const getParagraphFormat = defineTool({
  name: 'get_paragraph_format',
  description: 'Get the alignment, indentation and spacing of a paragraph in points.',
  code: 'FORMAT_INFO_ERROR',
  schema: ParagraphFormatRequest,
  handler: async (args, ctx) => {
    const format = await withDocument(ctx, args.document_name, false, doc => {
      checkParagraph(doc, args.section_index, args.paragraph_index);
      return doc.getParagraphFormat(args.section_index, args.paragraph_index);
    });
    return ok(`Retrieved formatting of paragraph ${args.paragraph_index}`, {
      section_index: args.section_index,
      paragraph_index: args.paragraph_index,
      formatting: formatToWire(format),
    });
  },
});

export const formatTools: Tool[] = [formatParagraph, getParagraphFormat];
