import * as fs from 'fs';
import * as path from 'path';
import { DocxDocument } from './DocxDocument';
import type { DocumentBlock } from './DocxDocument';
import { escapeXml } from './DocxTemplates';
import { unsupportedFormat } from './errors';
import { LIBREOFFICE_FILTERS } from './LibreOfficeRunner';
import type { OfficeConverter } from './LibreOfficeRunner';
import { writeFileAtomic } from './ToolSupport';

export const TARGET_FORMATS = ['doc', 'docx', 'pdf', 'rtf', 'html', 'txt', 'epub', 'odt', 'xml', 'markdown'] as const;
export type TargetFormat = (typeof TARGET_FORMATS)[number];

const FORMAT_ALIASES: Record<string, TargetFormat> = { md: 'markdown' };

/** Lower-cases, resolves aliases and rejects formats nobody can produce. */
export function normalizeFormat(input: string): TargetFormat {
  const lowered = input.trim().toLowerCase();
  const format = FORMAT_ALIASES[lowered] ?? TARGET_FORMATS.find(f => f === lowered);
  if (!format) throw unsupportedFormat(input, TARGET_FORMATS);
  return format;
}

export function extensionFor(format: TargetFormat): string {
  return format === 'markdown' ? '.md' : `.${format}`;
}

/** Output name for `sourceName`: the requested name or the source stem, with the target's extension. */
export function outputNameFor(sourceName: string, format: TargetFormat, requested?: string): string {
  const base = requested ?? sourceName;
  return `${path.parse(base).name}${extensionFor(format)}`;
}

/**
 * Renders a Word document into another format. Text-like formats and docx are produced
 * from the parsed package; the rest are handed to LibreOffice.
 */
export class DocumentConverter {
  constructor(private readonly _office: OfficeConverter) {}

  async convert(sourcePath: string, format: TargetFormat, outputPath: string): Promise<void> {
    if (LIBREOFFICE_FILTERS[format]) {
      await this._office.convert(sourcePath, format, outputPath);
      return;
    }

    const doc = await DocxDocument.load(fs.readFileSync(sourcePath));
    const title = path.parse(sourcePath).name;
    switch (format) {
      case 'docx':
        doc.setPackageKind(extensionFor(format));
        writeFileAtomic(outputPath, await doc.save());
        return;
      case 'txt':
        writeFileAtomic(outputPath, renderText(doc.blocks()));
        return;
      case 'html':
        writeFileAtomic(outputPath, renderHtml(doc.blocks(), title));
        return;
      case 'markdown':
        writeFileAtomic(outputPath, renderMarkdown(doc.blocks()));
        return;
      case 'xml':
        writeFileAtomic(outputPath, await doc.toFlatOpc());
        return;
      default:
        throw unsupportedFormat(format, TARGET_FORMATS);
    }
  }
}

// ============================================================
// Renderers
// ============================================================

export function renderText(blocks: DocumentBlock[]): string {
  const lines = blocks.map(block =>
    block.type === 'paragraph' ? block.text : block.rows.map(row => row.join('\t')).join('\n'));
  return lines.join('\n') + '\n';
}

export function renderHtml(blocks: DocumentBlock[], title: string): string {
  const body: string[] = [];
  for (const block of blocks) {
    if (block.type === 'table') {
      const rows = block.rows
        .map(row => `<tr>${row.map(cell => `<td>${htmlText(cell)}</td>`).join('')}</tr>`)
        .join('\n');
      body.push(`<table border="1">\n${rows}\n</table>`);
      continue;
    }
    const tag = block.headingLevel ? `h${block.headingLevel}` : 'p';
    const style = block.alignment === 'left' ? '' : ` style="text-align: ${block.alignment}"`;
    body.push(`<${tag}${style}>${htmlText(block.text)}</${tag}>`);
  }
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeXml(title)}</title>`,
    '</head>',
    '<body>',
    ...body,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

function htmlText(text: string): string {
  return escapeXml(text).replace(/\n/g, '<br>');
}

export function renderMarkdown(blocks: DocumentBlock[]): string {
  const out: string[] = [];
  for (const block of blocks) {
    if (block.type === 'table') {
      if (block.rows.length === 0) continue;
      const [header, ...rest] = block.rows;
      out.push([
        markdownRow(header),
        markdownRow(header.map(() => '---')),
        ...rest.map(markdownRow),
      ].join('\n'));
      continue;
    }
    if (block.text.trim() === '') continue;
    const text = block.text.replace(/\n/g, '  \n');
    out.push(block.headingLevel ? `${'#'.repeat(block.headingLevel)} ${text}` : text);
  }
  return out.join('\n\n') + '\n';
}

function markdownRow(cells: string[]): string {
  return `| ${cells.map(cell => cell.replace(/\|/g, '\\|').replace(/\n/g, '<br>')).join(' | ')} |`;
}
