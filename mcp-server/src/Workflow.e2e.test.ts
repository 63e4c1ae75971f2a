/**
 * Workflow E2E Tests
 *
 * Multi-step sessions driven through the dispatcher, the way a client would call the tools:
 * create, edit, reopen and convert, with concurrent calls on the same document.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import { DocxDocument } from './DocxDocument';
import { createWorkspace } from './DocxFixtures';
import type { TestWorkspace } from './DocxFixtures';
import type { Envelope } from './ResponseEnvelope';

describe('Workflow E2E', () => {
  let ws: TestWorkspace;

  beforeEach(() => {
    ws = createWorkspace();
  });

  afterEach(() => {
    ws.cleanup();
  });

  it('create, write, format and read back', async () => {
    const created = await ws.dispatcher.dispatch('create_document', { document_name: 'memo.docx' });
    expect(created.success).toBe(true);

    const added = await ws.dispatcher.dispatch('add_paragraph', { document_name: 'memo.docx', text: 'Hello' });
    expect(added.data).toMatchObject({ paragraph_index: 0, total_paragraphs_in_section: 1 });

    const formatted = await ws.dispatcher.dispatch('format_paragraph', {
      document_name: 'memo.docx',
      paragraph_index: 0,
      alignment: 'center',
    });
    expect(formatted.data).toMatchObject({ changes_applied: { alignment: 'center' } });

    const format = await ws.dispatcher.dispatch('get_paragraph_format', { document_name: 'memo.docx', paragraph_index: 0 });
    expect(format.data).toMatchObject({ formatting: { alignment: 'center' } });

    const text = await ws.dispatcher.dispatch('get_paragraph_text', { document_name: 'memo.docx', paragraph_index: 0 });
    expect(text.data).toMatchObject({ text: 'Hello', word_count: 1 });
  });

  it('fills a table with concurrent cell updates', async () => {
    await ws.dispatcher.dispatch('create_document', { document_name: 'grid.docx' });
    const table = await ws.dispatcher.dispatch('create_table', { document_name: 'grid.docx', rows: 3, columns: 3 });
    expect(table.data).toMatchObject({ table_index: 0, total_tables_in_section: 1 });

    const updates: Array<Promise<Envelope>> = [];
    for (let row = 0; row < 3; row++) {
      for (let column = 0; column < 3; column++) {
        updates.push(ws.dispatcher.dispatch('set_cell_text', {
          document_name: 'grid.docx',
          table_index: 0,
          row,
          column,
          text: `r${row}c${column}`,
        }));
      }
    }
    const results = await Promise.all(updates);
    expect(results.every(result => result.success)).toBe(true);

    const info = await ws.dispatcher.dispatch('get_table_info', { document_name: 'grid.docx', table_index: 0 });
    expect(info.data).toMatchObject({
      total_cells: 9,
      cells: [
        ['r0c0', 'r0c1', 'r0c2'],
        ['r1c0', 'r1c1', 'r1c2'],
        ['r2c0', 'r2c1', 'r2c2'],
      ],
    });
  });

  it('keeps every concurrent paragraph append', async () => {
    await ws.dispatcher.dispatch('create_document', { document_name: 'log.docx' });
    const lines = Array.from({ length: 10 }, (_, i) => `entry ${i}`);
    await Promise.all(lines.map(text => ws.dispatcher.dispatch('add_paragraph', { document_name: 'log.docx', text })));

    const doc = await DocxDocument.load(fs.readFileSync(ws.file('log.docx')));
    expect(doc.paragraphCount(0)).toBe(10);
    const texts = Array.from({ length: 10 }, (_, i) => doc.getParagraphText(0, i));
    expect(texts.sort()).toEqual([...lines].sort());
  });

  it('accepts table row bounds at the edges only', async () => {
    await ws.dispatcher.dispatch('create_document', { document_name: 'bounds.docx' });
    const call = (rows: number) => ws.dispatcher.dispatch('create_table', { document_name: 'bounds.docx', rows, columns: 1 });

    expect((await call(0)).success).toBe(false);
    expect((await call(1)).success).toBe(true);
    expect((await call(100)).success).toBe(true);
    expect((await call(101)).success).toBe(false);

    const doc = await DocxDocument.load(fs.readFileSync(ws.file('bounds.docx')));
    expect(doc.tableCount(0)).toBe(2);
  });

  it('edits, protects, merges and converts a report', async () => {
    await ws.put('report.docx');
    await ws.put('appendix.docx', '<w:p><w:r><w:t>Appendix A</w:t></w:r></w:p><w:sectPr/>');

    const replaced = await ws.dispatcher.dispatch('find_and_replace', {
      document_name: 'report.docx',
      find_text: 'sales',
      replace_text: 'Revenue',
    });
    expect(replaced.data).toMatchObject({ replacements: 1 });

    await ws.dispatcher.dispatch('add_text_watermark', { document_name: 'report.docx', text: 'DRAFT', color: 'gray' });
    await ws.dispatcher.dispatch('set_document_protection', {
      document_name: 'report.docx',
      protection_level: 'comments',
      password: 'test-secret',
    });

    const merged = await ws.dispatcher.dispatch('merge_documents', {
      original_document: 'report.docx',
      merge_document: 'appendix.docx',
      output_document: 'final.docx',
    });
    expect(merged.success).toBe(true);

    const final = await DocxDocument.load(fs.readFileSync(ws.file('final.docx')));
    expect(final.getParagraphText(0, 1)).toBe('Revenue grew fast');
    expect(final.getParagraphText(2, 0)).toBe('Appendix A');
    expect(final.getProtection()).toEqual({ level: 'comments', hasPassword: true });
    expect(final.hasWatermark()).toBe(true);

    const converted = await ws.dispatcher.dispatch('convert_document', { document_name: 'final.docx', target_format: 'pdf' });
    expect(converted.data).toMatchObject({ output_path: ws.file('final.pdf'), history_recorded: true });

    const status = await ws.dispatcher.dispatch('get_conversion_status', { document_name: 'final.docx' });
    expect(status.data).toMatchObject({ status: 'converted', last_conversion: { target_format: 'pdf', success: true } });

    const history = await ws.dispatcher.dispatch('get_conversion_history', { document_name: 'final.docx' });
    expect(history.data).toMatchObject({ total_conversions: 1 });
    const reportHistory = await ws.dispatcher.dispatch('get_conversion_history', { document_name: 'report.docx' });
    expect(reportHistory.data).toMatchObject({ total_conversions: 0 });
  });
});
