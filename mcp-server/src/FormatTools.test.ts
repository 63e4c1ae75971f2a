import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import { createWorkspace, readPart } from './DocxFixtures';
import type { TestWorkspace } from './DocxFixtures';

const DEFAULT_FORMAT = {
  alignment: 'left',
  first_line_indent: 0,
  left_indent: 0,
  right_indent: 0,
  line_spacing: 12,
  line_spacing_rule: 'multiple',
  before_spacing: 0,
  after_spacing: 0,
};

describe('Format tools', () => {
  let ws: TestWorkspace;

  beforeEach(async () => {
    ws = createWorkspace();
    await ws.put('report.docx');
  });

  afterEach(() => {
    ws.cleanup();
  });

  it('format_paragraph reports before and after', async () => {
    const result = await ws.dispatcher.dispatch('format_paragraph', {
      document_name: 'report.docx',
      paragraph_index: 1,
      alignment: 'center',
      left_indent: 36,
      line_spacing: 18,
      line_spacing_rule: 'exactly',
      before_spacing: 6,
      after_spacing: 12.5,
    });
    expect(result).toEqual({
      success: true,
      message: 'Formatted paragraph 1 in section 0',
      data: {
        section_index: 0,
        paragraph_index: 1,
        original_formatting: DEFAULT_FORMAT,
        current_formatting: {
          alignment: 'center',
          first_line_indent: 0,
          left_indent: 36,
          right_indent: 0,
          line_spacing: 18,
          line_spacing_rule: 'exactly',
          before_spacing: 6,
          after_spacing: 12.5,
        },
        changes_applied: {
          alignment: 'center',
          left_indent: 36,
          line_spacing: 18,
          line_spacing_rule: 'exactly',
          before_spacing: 6,
          after_spacing: 12.5,
        },
      },
    });

    const xml = await readPart(fs.readFileSync(ws.file('report.docx')), 'word/document.xml');
    expect(xml).toContain('w:line="360"');
    expect(xml).toContain('w:lineRule="exact"');
    expect(xml).toContain('w:after="250"');
  });

  it('ignores a line spacing rule without a line spacing', async () => {
    const result = await ws.dispatcher.dispatch('format_paragraph', {
      document_name: 'report.docx',
      paragraph_index: 1,
      line_spacing_rule: 'exactly',
    });
    expect(result.data).toMatchObject({ current_formatting: DEFAULT_FORMAT, changes_applied: {} });
  });

  it('maps justify to both and back', async () => {
    await ws.dispatcher.dispatch('format_paragraph', { document_name: 'report.docx', paragraph_index: 0, alignment: 'justify' });
    const xml = await readPart(fs.readFileSync(ws.file('report.docx')), 'word/document.xml');
    expect(xml).toContain('w:val="both"');

    const read = await ws.dispatcher.dispatch('get_paragraph_format', { document_name: 'report.docx', paragraph_index: 0 });
    expect(read.data).toMatchObject({ formatting: { alignment: 'justify' } });
  });

  it('replaces a hanging indent with a first line indent', async () => {
    await ws.put('hanging.docx', '<w:p><w:pPr><w:ind w:left="720" w:hanging="360"/></w:pPr><w:r><w:t>1. Item</w:t></w:r></w:p><w:sectPr/>');

    const before = await ws.dispatcher.dispatch('get_paragraph_format', { document_name: 'hanging.docx', paragraph_index: 0 });
    expect(before.data).toMatchObject({ formatting: { first_line_indent: -18, left_indent: 36 } });

    const result = await ws.dispatcher.dispatch('format_paragraph', {
      document_name: 'hanging.docx',
      paragraph_index: 0,
      first_line_indent: 10,
    });
    expect(result.data).toMatchObject({ current_formatting: { first_line_indent: 10, left_indent: 36 } });
  });

  it('rejects negative lengths', async () => {
    const result = await ws.dispatcher.dispatch('format_paragraph', {
      document_name: 'report.docx',
      paragraph_index: 0,
      left_indent: -1,
    });
    expect(result).toMatchObject({ success: false, error: { code: 'FORMAT_ERROR', type: 'VALIDATION_ERROR' } });
  });

  it('rejects an unknown alignment', async () => {
    const result = await ws.dispatcher.dispatch('format_paragraph', {
      document_name: 'report.docx',
      paragraph_index: 0,
      alignment: 'middle',
    });
    expect(result).toMatchObject({ success: false, error: { code: 'FORMAT_ERROR', type: 'VALIDATION_ERROR' } });
  });

  it('get_paragraph_format returns defaults for an unformatted paragraph', async () => {
    const result = await ws.dispatcher.dispatch('get_paragraph_format', {
      document_name: 'report.docx',
      section_index: 1,
      paragraph_index: 1,
    });
    expect(result).toEqual({
      success: true,
      message: 'Retrieved formatting of paragraph 1',
      data: { section_index: 1, paragraph_index: 1, formatting: DEFAULT_FORMAT },
    });
  });

  it('get_paragraph_format reports a bad index', async () => {
    const result = await ws.dispatcher.dispatch('get_paragraph_format', {
      document_name: 'report.docx',
      paragraph_index: 9,
    });
    expect(result).toMatchObject({
      success: false,
      error: { code: 'FORMAT_INFO_ERROR', type: 'INDEX_OUT_OF_RANGE' },
    });
  });
});
