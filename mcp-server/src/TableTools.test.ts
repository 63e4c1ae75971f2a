import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import { DocxDocument } from './DocxDocument';
import { createWorkspace, readPart } from './DocxFixtures';
import type { TestWorkspace } from './DocxFixtures';

describe('Table tools', () => {
  let ws: TestWorkspace;

  beforeEach(async () => {
    ws = createWorkspace();
    await ws.put('report.docx');
  });

  afterEach(() => {
    ws.cleanup();
  });

  const reload = async () => DocxDocument.load(fs.readFileSync(ws.file('report.docx')));

  describe('create_table', () => {
    it('inserts after a paragraph', async () => {
      const result = await ws.dispatcher.dispatch('create_table', {
        document_name: 'report.docx',
        rows: 2,
        columns: 3,
        paragraph_index: 1,
      });
      expect(result).toEqual({
        success: true,
        message: 'Created 2x3 table in section 0',
        data: {
          table_index: 0,
          section_index: 0,
          paragraph_index: 1,
          dimensions: { rows: 2, columns: 3 },
          style: null,
          total_tables_in_section: 2,
        },
      });

      const doc = await reload();
      expect(doc.getTable(0, 0)).toEqual({ rows: 2, columns: 3, cells: [['', '', ''], ['', '', '']] });
      expect(doc.getTable(0, 1).cells[0]).toEqual(['A1', 'B1']);
    });

    it('appends to the last section when no paragraph is given', async () => {
      const result = await ws.dispatcher.dispatch('create_table', {
        document_name: 'report.docx',
        rows: 1,
        columns: 1,
        section_index: 1,
        style: 'Table Grid',
      });
      expect(result.data).toMatchObject({ table_index: 0, paragraph_index: null, style: 'Table Grid', total_tables_in_section: 1 });

      const xml = await readPart(fs.readFileSync(ws.file('report.docx')), 'word/document.xml');
      expect(xml).toContain('w:val="TableGrid"');
      expect((await reload()).sectionCount).toBe(2);
    });

    it('accepts the row limits', async () => {
      for (const rows of [1, 100]) {
        const result = await ws.dispatcher.dispatch('create_table', { document_name: 'report.docx', rows, columns: 2 });
        expect(result.success).toBe(true);
      }
    });

    it('rejects rows outside 1-100 without touching the file', async () => {
      const before = fs.readFileSync(ws.file('report.docx'));
      for (const rows of [0, 101]) {
        const result = await ws.dispatcher.dispatch('create_table', { document_name: 'report.docx', rows, columns: 2 });
        expect(result).toMatchObject({ success: false, error: { code: 'TABLE_CREATE_ERROR', type: 'VALIDATION_ERROR' } });
      }
      expect(fs.readFileSync(ws.file('report.docx')).equals(before)).toBe(true);
    });

    it('rejects more than 20 columns', async () => {
      const result = await ws.dispatcher.dispatch('create_table', { document_name: 'report.docx', rows: 1, columns: 21 });
      expect(result).toMatchObject({ success: false, error: { type: 'VALIDATION_ERROR' } });
    });

    it('reports a paragraph outside the section', async () => {
      const result = await ws.dispatcher.dispatch('create_table', {
        document_name: 'report.docx',
        rows: 1,
        columns: 1,
        section_index: 1,
        paragraph_index: 2,
      });
      expect(result).toMatchObject({
        success: false,
        error: {
          code: 'TABLE_CREATE_ERROR',
          type: 'INDEX_OUT_OF_RANGE',
          details: 'Paragraph index 2 out of range (section 1 has 2 paragraphs)',
        },
      });
    });
  });

  it('add_table_after_paragraph defaults to the first paragraph', async () => {
    const result = await ws.dispatcher.dispatch('add_table_after_paragraph', {
      document_name: 'report.docx',
      rows: 1,
      columns: 2,
    });
    expect(result).toMatchObject({ success: true, data: { table_index: 0, paragraph_index: 0, total_tables_in_section: 2 } });
  });

  it('add_table_after_paragraph keeps the section break after the table', async () => {
    const result = await ws.dispatcher.dispatch('add_table_after_paragraph', {
      document_name: 'report.docx',
      rows: 1,
      columns: 2,
      paragraph_index: 2,
    });
    expect(result.data).toMatchObject({ table_index: 1, total_tables_in_section: 2 });

    const doc = await reload();
    expect(doc.sectionCount).toBe(2);
    expect(doc.tableCount(0)).toBe(2);
    expect(doc.tableCount(1)).toBe(0);
  });

  it('add_table_to_section keeps the table inside a non-final section', async () => {
    const result = await ws.dispatcher.dispatch('add_table_to_section', {
      document_name: 'report.docx',
      rows: 3,
      columns: 2,
      section_index: 0,
    });
    expect(result).toMatchObject({
      success: true,
      message: 'Created 3x2 table in section 0',
      data: { table_index: 1, paragraph_index: null, total_tables_in_section: 2 },
    });

    const doc = await reload();
    expect(doc.sectionCount).toBe(2);
    expect(doc.getTable(0, 1).rows).toBe(3);
    expect(doc.getParagraphText(1, 0)).toBe('Line one\nLine two\ttabbed');
  });

  it('get_table_info returns every cell', async () => {
    const result = await ws.dispatcher.dispatch('get_table_info', { document_name: 'report.docx', table_index: 0 });
    expect(result).toEqual({
      success: true,
      message: 'Retrieved table 0 from section 0',
      data: {
        table_index: 0,
        section_index: 0,
        rows: 2,
        columns: 2,
        total_cells: 4,
        cells: [['A1', 'B1'], ['A2', 'B2']],
      },
    });
  });

  it('get_table_info reports a section without tables', async () => {
    const result = await ws.dispatcher.dispatch('get_table_info', {
      document_name: 'report.docx',
      table_index: 0,
      section_index: 1,
    });
    expect(result).toMatchObject({
      success: false,
      error: {
        code: 'TABLE_INFO_ERROR',
        type: 'INDEX_OUT_OF_RANGE',
        details: 'Table index 0 out of range (section 1 has 0 tables)',
      },
    });
  });

  it('delete_table removes the table', async () => {
    const result = await ws.dispatcher.dispatch('delete_table', { document_name: 'report.docx', table_index: 0 });
    expect(result.data).toEqual({
      section_index: 0,
      table_index: 0,
      deleted_dimensions: { rows: 2, columns: 2 },
      total_tables_remaining: 0,
    });
    const doc = await reload();
    expect(doc.tableCount(0)).toBe(0);
    expect(doc.paragraphCount(0)).toBe(3);
  });

  describe('set_cell_text', () => {
    it('replaces the cell text', async () => {
      const result = await ws.dispatcher.dispatch('set_cell_text', {
        document_name: 'report.docx',
        table_index: 0,
        row: 1,
        column: 0,
        text: 'Changed',
      });
      expect(result.data).toEqual({
        section_index: 0,
        table_index: 0,
        row: 1,
        column: 0,
        original_text: 'A2',
        new_text: 'Changed',
      });
      expect((await reload()).getTable(0, 0).cells).toEqual([['A1', 'B1'], ['Changed', 'B2']]);
    });

    it('reports a row past the table', async () => {
      const result = await ws.dispatcher.dispatch('set_cell_text', {
        document_name: 'report.docx',
        table_index: 0,
        row: 2,
        column: 0,
        text: 'x',
      });
      expect(result).toMatchObject({
        success: false,
        error: { code: 'TABLE_CELL_ERROR', details: 'Row index 2 out of range (table 0 has 2 rows)' },
      });
    });

    it('reports a column past the row', async () => {
      const result = await ws.dispatcher.dispatch('set_cell_text', {
        document_name: 'report.docx',
        table_index: 0,
        row: 0,
        column: 5,
        text: 'x',
      });
      expect(result).toMatchObject({
        success: false,
        error: { type: 'INDEX_OUT_OF_RANGE', details: 'Column index 5 out of range (row 0 has 2 columns)' },
      });
    });
  });
});
