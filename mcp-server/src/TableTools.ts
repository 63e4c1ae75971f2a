import { z } from 'zod';
import type { DocxDocument } from './DocxDocument';
import { indexOutOfRange } from './errors';
import { ok } from './ResponseEnvelope';
import {
  checkParagraph,
  checkSection,
  checkTable,
  defineTool,
  documentName,
  sectionIndex,
  tableIndex,
  withDocument,
} from './ToolSupport';
import type { Tool, ToolContext } from './ToolSupport';

export const MAX_TABLE_ROWS = 100;
export const MAX_TABLE_COLUMNS = 20;

const rows = z.number().int().min(1).max(MAX_TABLE_ROWS).describe(`Number of rows (1-${MAX_TABLE_ROWS})`);
const columns = z.number().int().min(1).max(MAX_TABLE_COLUMNS).describe(`Number of columns (1-${MAX_TABLE_COLUMNS})`);
const style = z.string().trim().min(1).optional().describe('Table style name, e.g. "Table Grid"; omit for plain single borders');

interface TablePlacement {
  document_name: string;
  rows: number;
  columns: number;
  section_index: number;
  paragraph_index?: number;
  style?: string;
}

async function insertTable(ctx: ToolContext, args: TablePlacement) {
  const result = await withDocument(ctx, args.document_name, true, (doc: DocxDocument) => {
    if (args.paragraph_index !== undefined) {
      checkParagraph(doc, args.section_index, args.paragraph_index);
    } else {
      checkSection(doc, args.section_index);
    }
    const index = doc.insertTable(args.section_index, args.rows, args.columns, {
      afterParagraph: args.paragraph_index,
      style: args.style,
    });
    return { index, total: doc.tableCount(args.section_index) };
  });
  return ok(`Created ${args.rows}x${args.columns} table in section ${args.section_index}`, {
    table_index: result.index,
    section_index: args.section_index,
    paragraph_index: args.paragraph_index ?? null,
    dimensions: { rows: args.rows, columns: args.columns },
    style: args.style ?? null,
    total_tables_in_section: result.total,
  });
}

export const CreateTableRequest = z.object({
  document_name: documentName,
  rows,
  columns,
  section_index: sectionIndex,
  paragraph_index: z.number().int().min(0).optional().describe('Insert after this paragraph; omit to append to the section'),
  style,
});

export const AddTableAfterParagraphRequest = z.object({
  document_name: documentName,
  rows,
  columns,
  section_index: sectionIndex,
  paragraph_index: z.number().int().min(0).default(0).describe('Insert after this paragraph (default: 0)'),
  style,
});

export const AddTableToSectionRequest = z.object({
  document_name: documentName,
  rows,
  columns,
  section_index: sectionIndex,
  style,
});

const createTable = defineTool({
  name: 'create_table',
  description: 'Create an empty table, after a given paragraph or at the end of a section.',
  code: 'TABLE_CREATE_ERROR',
  schema: CreateTableRequest,
  handler: (args, ctx) => insertTable(ctx, args),
});

const addTableAfterParagraph = defineTool({
  name: 'add_table_after_paragraph',
  description: 'Insert an empty table directly after a paragraph.',
  code: 'TABLE_ADD_ERROR',
  schema: AddTableAfterParagraphRequest,
  handler: (args, ctx) => insertTable(ctx, args),
});

const addTableToSection = defineTool({
  name: 'add_table_to_section',
  description: 'Append an empty table to the end of a section.',
  code: 'TABLE_ADD_ERROR',
  schema: AddTableToSectionRequest,
  handler: (args, ctx) => insertTable(ctx, args),
});

export const TableRequest = z.object({
  document_name: documentName,
  table_index: tableIndex,
  section_index: sectionIndex,
});

const getTableInfo = defineTool({
  name: 'get_table_info',
  description: 'Get the dimensions and cell texts of a table.',
  code: 'TABLE_INFO_ERROR',
  schema: TableRequest,
  handler: async (args, ctx) => {
    const table = await withDocument(ctx, args.document_name, false, doc => {
      checkTable(doc, args.section_index, args.table_index);
      return doc.getTable(args.section_index, args.table_index);
    });
    return ok(`Retrieved table ${args.table_index} from section ${args.section_index}`, {
      table_index: args.table_index,
      section_index: args.section_index,
      rows: table.rows,
      columns: table.columns,
      total_cells: table.cells.reduce((sum, row) => sum + row.length, 0),
      cells: table.cells,
    });
  },
});

const deleteTable = defineTool({
  name: 'delete_table',
  description: 'Delete a table from a section.',
  code: 'TABLE_DELETE_ERROR',
  schema: TableRequest,
  handler: async (args, ctx) => {
    const result = await withDocument(ctx, args.document_name, true, doc => {
      checkTable(doc, args.section_index, args.table_index);
      const deleted = doc.deleteTable(args.section_index, args.table_index);
      return { deleted, remaining: doc.tableCount(args.section_index) };
    });
    return ok(`Deleted table ${args.table_index} from section ${args.section_index}`, {
      section_index: args.section_index,
      table_index: args.table_index,
      deleted_dimensions: { rows: result.deleted.rows, columns: result.deleted.columns },
      total_tables_remaining: result.remaining,
    });
  },
});

export const SetCellTextRequest = z.object({
  document_name: documentName,
  table_index: tableIndex,
  row: z.number().int().min(0).describe('Zero-based row index'),
  column: z.number().int().min(0).describe('Zero-based column index'),
  text: z.string().describe('Cell text'),
  section_index: sectionIndex,
});

const setCellText = defineTool({
  name: 'set_cell_text',
  description: 'Set the text of a table cell.',
  code: 'TABLE_CELL_ERROR',
  schema: SetCellTextRequest,
  handler: async (args, ctx) => {
    const original = await withDocument(ctx, args.document_name, true, doc => {
      checkTable(doc, args.section_index, args.table_index);
      const table = doc.getTable(args.section_index, args.table_index);
      if (args.row >= table.rows) throw indexOutOfRange('Row', args.row, table.rows, `table ${args.table_index}`);
      const rowCells = table.cells[args.row].length;
      if (args.column >= rowCells) throw indexOutOfRange('Column', args.column, rowCells, `row ${args.row}`);
      return doc.setCellText(args.section_index, args.table_index, args.row, args.column, args.text);
    });
    return ok(`Set text of cell (${args.row}, ${args.column}) in table ${args.table_index}`, {
      section_index: args.section_index,
      table_index: args.table_index,
      row: args.row,
      column: args.column,
      original_text: original,
      new_text: args.text,
    });
  },
});

export const tableTools: Tool[] = [
  createTable,
  addTableAfterParagraph,
  addTableToSection,
  getTableInfo,
  deleteTable,
  setCellText,
];
