import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import { DocxDocument } from './DocxDocument';
import { resolveColor } from './DocumentTools';
import { buildDocx, createWorkspace, readPart } from './DocxFixtures';
import type { TestWorkspace } from './DocxFixtures';

describe('Document tools', () => {
  let ws: TestWorkspace;

  beforeEach(() => {
    ws = createWorkspace();
  });

  afterEach(() => {
    ws.cleanup();
  });

  describe('create_document', () => {
    it('creates an empty document', async () => {
      const result = await ws.dispatcher.dispatch('create_document', { document_name: 'new.docx' });

      expect(result).toMatchObject({
        success: true,
        message: 'Document new.docx created successfully',
        data: { path: ws.file('new.docx'), name: 'new.docx', from_template: null },
      });
      expect(result.data.size).toBe(fs.statSync(ws.file('new.docx')).size);

      const doc = await DocxDocument.load(fs.readFileSync(ws.file('new.docx')));
      expect(doc.sectionCount).toBe(1);
      expect(doc.paragraphCount(0)).toBe(0);
    });

    it('rejects an unsupported extension before touching the disk', async () => {
      const result = await ws.dispatcher.dispatch('create_document', { document_name: 'notes.txt' });
      expect(result).toEqual({
        success: false,
        message: 'Unsupported document format: .txt. Expected one of .docx, .docm, .dotx, .dotm',
        data: {},
        error: {
          code: 'DOC_CREATE_ERROR',
          type: 'VALIDATION_ERROR',
          details: 'Unsupported document format: .txt. Expected one of .docx, .docm, .dotx, .dotm',
          suggestion: 'Please check if the document name is valid and you have write permissions.',
        },
      });
      expect(fs.existsSync(ws.file('notes.txt'))).toBe(false);
    });

    it('rejects path traversal', async () => {
      const result = await ws.dispatcher.dispatch('create_document', { document_name: '../escape.docx' });
      expect(result).toMatchObject({ success: false, error: { code: 'DOC_CREATE_ERROR', type: 'INVALID_PATH' } });
    });

    it('copies a template', async () => {
      await ws.put('template.docx');
      const result = await ws.dispatcher.dispatch('create_document', {
        document_name: 'copy.docx',
        template_path: 'template.docx',
      });
      expect(result).toMatchObject({ success: true, data: { from_template: 'template.docx' } });

      const doc = await DocxDocument.load(fs.readFileSync(ws.file('copy.docx')));
      expect(doc.getParagraphText(0, 0)).toBe('Quarterly Report');
    });

    it('marks a .dotx as a template package', async () => {
      await ws.dispatcher.dispatch('create_document', { document_name: 'letter.dotx' });
      const types = await readPart(fs.readFileSync(ws.file('letter.dotx')), '[Content_Types].xml');
      expect(types).toContain('application/vnd.openxmlformats-officedocument.wordprocessingml.template.main+xml');
    });

    it('keeps macros only in a macro-enabled copy', async () => {
      await ws.put('macros.docm', undefined, { vbaProject: true });
      await ws.dispatcher.dispatch('create_document', { document_name: 'plain.docx', template_path: 'macros.docm' });
      await ws.dispatcher.dispatch('create_document', { document_name: 'copy.docm', template_path: 'macros.docm' });

      const plainTypes = await readPart(fs.readFileSync(ws.file('plain.docx')), '[Content_Types].xml');
      expect(plainTypes).not.toContain('vbaProject');
      await expect(readPart(fs.readFileSync(ws.file('plain.docx')), 'word/vbaProject.bin')).rejects.toThrow('word/vbaProject.bin is missing');

      const copyRels = await readPart(fs.readFileSync(ws.file('copy.docm')), 'word/_rels/document.xml.rels');
      expect(copyRels).toContain('Target="vbaProject.bin"');
      expect(await readPart(fs.readFileSync(ws.file('copy.docm')), 'word/vbaProject.bin')).toBe('not really a compound file');
    });

    it('fails when the template is missing', async () => {
      const result = await ws.dispatcher.dispatch('create_document', {
        document_name: 'copy.docx',
        template_path: 'nope.docx',
      });
      expect(result).toMatchObject({
        success: false,
        error: { code: 'DOC_CREATE_ERROR', type: 'DOCUMENT_NOT_FOUND', details: 'Document file not found: nope.docx' },
      });
    });
  });

  describe('set_document_protection', () => {
    it('protects with a password', async () => {
      await ws.put('report.docx');
      const result = await ws.dispatcher.dispatch('set_document_protection', {
        document_name: 'report.docx',
        protection_level: 'read_only',
        password: 'test-secret',
      });
      expect(result).toMatchObject({
        success: true,
        data: { protection_level: 'read_only', is_protected: true, has_password: true },
      });
      const doc = await DocxDocument.load(fs.readFileSync(ws.file('report.docx')));
      expect(doc.getProtection()).toEqual({ level: 'read_only', hasPassword: true });
    });

    it('ignores the password when removing protection', async () => {
      await ws.put('report.docx');
      const result = await ws.dispatcher.dispatch('set_document_protection', {
        document_name: 'report.docx',
        protection_level: 'none',
        password: 'test-secret',
      });
      expect(result).toMatchObject({
        success: true,
        data: { protection_level: 'none', is_protected: false, has_password: false },
      });
    });

    it('rejects an unknown level', async () => {
      await ws.put('report.docx');
      const result = await ws.dispatcher.dispatch('set_document_protection', {
        document_name: 'report.docx',
        protection_level: 'locked',
      });
      expect(result).toMatchObject({ success: false, error: { code: 'DOC_PROTECT_ERROR', type: 'VALIDATION_ERROR' } });
    });

    it('reports a missing document', async () => {
      const result = await ws.dispatcher.dispatch('set_document_protection', {
        document_name: 'missing.docx',
        protection_level: 'comments',
      });
      expect(result).toMatchObject({ success: false, error: { code: 'DOC_PROTECT_ERROR', type: 'DOCUMENT_NOT_FOUND' } });
    });
  });

  describe('find_and_replace', () => {
    it('returns the actual replacement count', async () => {
      await ws.put('report.docx');
      const result = await ws.dispatcher.dispatch('find_and_replace', {
        document_name: 'report.docx',
        find_text: 'grew',
        replace_text: 'rose',
      });
      expect(result).toEqual({
        success: true,
        message: 'Replaced 1 occurrence of "grew"',
        data: {
          replacements: 1,
          search_params: { find_text: 'grew', replace_text: 'rose', match_case: false, match_whole_word: false },
        },
      });
      const doc = await DocxDocument.load(fs.readFileSync(ws.file('report.docx')));
      expect(doc.getParagraphText(0, 1)).toBe('Sales rose fast');
    });

    it('rejects an empty search text', async () => {
      await ws.put('report.docx');
      const result = await ws.dispatcher.dispatch('find_and_replace', {
        document_name: 'report.docx',
        find_text: '',
        replace_text: 'x',
      });
      expect(result).toMatchObject({
        success: false,
        error: { code: 'DOC_REPLACE_ERROR', type: 'VALIDATION_ERROR', details: 'find_text: find_text cannot be empty' },
      });
    });
  });

  describe('merge_documents', () => {
    it('writes the merged document and leaves the inputs alone', async () => {
      await ws.put('original.docx');
      await ws.put('appendix.docx', '<w:p><w:r><w:t>Appendix</w:t></w:r></w:p><w:sectPr/>');
      const before = fs.readFileSync(ws.file('original.docx'));

      const result = await ws.dispatcher.dispatch('merge_documents', {
        original_document: 'original.docx',
        merge_document: 'appendix.docx',
        output_document: 'merged.docx',
      });
      expect(result).toEqual({
        success: true,
        message: 'Merged appendix.docx into merged.docx',
        data: { output_path: ws.file('merged.docx'), merged_sections: 1, merged_paragraphs: 1, merged_tables: 0 },
      });

      const merged = await DocxDocument.load(fs.readFileSync(ws.file('merged.docx')));
      expect(merged.sectionCount).toBe(3);
      expect(merged.getParagraphText(2, 0)).toBe('Appendix');
      expect(fs.readFileSync(ws.file('original.docx')).equals(before)).toBe(true);
    });

    it('drops the VBA project from a docx merge output', async () => {
      await ws.put('original.docm', undefined, { vbaProject: true });
      await ws.put('appendix.docx', '<w:p><w:r><w:t>Appendix</w:t></w:r></w:p><w:sectPr/>');
      const result = await ws.dispatcher.dispatch('merge_documents', {
        original_document: 'original.docm',
        merge_document: 'appendix.docx',
        output_document: 'merged.docx',
      });
      expect(result.success).toBe(true);

      const rels = await readPart(fs.readFileSync(ws.file('merged.docx')), 'word/_rels/document.xml.rels');
      const types = await readPart(fs.readFileSync(ws.file('merged.docx')), '[Content_Types].xml');
      expect(rels).not.toContain('vbaProject');
      expect(types).toContain('wordprocessingml.document.main+xml');
      expect(types).not.toContain('macroEnabled');
    });

    it('reports a missing input', async () => {
      await ws.put('original.docx');
      const result = await ws.dispatcher.dispatch('merge_documents', {
        original_document: 'original.docx',
        merge_document: 'missing.docx',
        output_document: 'merged.docx',
      });
      expect(result).toMatchObject({ success: false, error: { code: 'DOC_MERGE_ERROR', type: 'DOCUMENT_NOT_FOUND' } });
      expect(fs.existsSync(ws.file('merged.docx'))).toBe(false);
    });
  });

  describe('add_text_watermark', () => {
    it('uses the default size and colour', async () => {
      await ws.put('report.docx');
      const result = await ws.dispatcher.dispatch('add_text_watermark', {
        document_name: 'report.docx',
        text: 'CONFIDENTIAL',
      });
      expect(result).toMatchObject({
        success: true,
        data: { watermark_info: { text: 'CONFIDENTIAL', font_size: 65, color: '#FF0000', layout: 'diagonal' } },
      });
      const header = await readPart(fs.readFileSync(ws.file('report.docx')), 'word/header1.xml');
      expect(header).toContain('string="CONFIDENTIAL"');
    });

    it('rejects an unknown colour', async () => {
      await ws.put('report.docx');
      const result = await ws.dispatcher.dispatch('add_text_watermark', {
        document_name: 'report.docx',
        text: 'DRAFT',
        color: 'chartreuse',
      });
      expect(result).toMatchObject({ success: false, error: { code: 'DOC_WATERMARK_ERROR', type: 'VALIDATION_ERROR' } });
      expect(result.message.startsWith('Unknown color: chartreuse.')).toBe(true);
    });

    it('bounds the font size', async () => {
      await ws.put('report.docx');
      const result = await ws.dispatcher.dispatch('add_text_watermark', {
        document_name: 'report.docx',
        text: 'DRAFT',
        font_size: 501,
      });
      expect(result).toMatchObject({ success: false, error: { type: 'VALIDATION_ERROR' } });
    });
  });

  it('reports a corrupt package as an engine error', async () => {
    fs.writeFileSync(ws.file('broken.docx'), 'not a zip archive');
    const result = await ws.dispatcher.dispatch('find_and_replace', {
      document_name: 'broken.docx',
      find_text: 'a',
      replace_text: 'b',
    });
    expect(result).toMatchObject({ success: false, error: { code: 'DOC_REPLACE_ERROR', type: 'ENGINE_ERROR' } });
    expect(result.message.startsWith('Failed to load document:')).toBe(true);
  });
});

describe('resolveColor', () => {
  it('maps names and normalises hex values', () => {
    expect(resolveColor('Red')).toBe('#FF0000');
    expect(resolveColor('navy')).toBe('#000080');
    expect(resolveColor('#00ff00')).toBe('#00FF00');
    expect(resolveColor('336699')).toBe('#336699');
  });

  it('throws on anything else', () => {
    expect(() => resolveColor('#12345')).toThrow('Unknown color: #12345');
  });
});

describe('buildDocx fixture', () => {
  it('opens as a document', async () => {
    const doc = await DocxDocument.load(await buildDocx('<w:p/>'));
    expect(doc.paragraphCount(0)).toBe(1);
  });
});
