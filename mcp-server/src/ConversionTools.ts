import { z } from 'zod';
import type { ConversionEntry } from './ConversionHistoryStore';
import { normalizeFormat, outputNameFor } from './DocumentConverter';
import { createLogger } from './logger';
import { requireDocumentName } from './PathResolver';
import { ok } from './ResponseEnvelope';
import { defineTool, documentName } from './ToolSupport';
import type { Tool, ToolContext } from './ToolSupport';

const log = createLogger('conversion');

export const ConvertDocumentRequest = z.object({
  document_name: documentName,
  target_format: z.string().min(1).describe('doc, docx, pdf, rtf, html, txt, epub, odt, xml or markdown (md)'),
  output_path: z.string().optional().describe('Output file name under the documents directory; the extension is set from the format'),
});

/** Records an attempt; a store failure is reported back instead of failing the call. */
async function record(ctx: ToolContext, name: string, entry: ConversionEntry): Promise<boolean> {
  try {
    await ctx.history.append(name, entry);
    return true;
  } catch (err) {
    log.error(`Could not record conversion of ${name}: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}

const convertDocument = defineTool({
  name: 'convert_document',
  description: 'Convert a document to another format. The result is written next to the source unless output_path is given.',
  code: 'CONVERSION_ERROR',
  schema: ConvertDocumentRequest,
  handler: async (args, ctx) => {
    ctx.paths.resolve(args.document_name);
    requireDocumentName(args.document_name);
    if (args.output_path !== undefined) ctx.paths.resolve(args.output_path);
    const format = normalizeFormat(args.target_format);
    const outputName = outputNameFor(args.document_name, format, args.output_path);
    const outputPath = ctx.paths.resolve(outputName);

    return ctx.locks.withLock([args.document_name, outputName], async () => {
      const sourcePath = ctx.paths.resolveExisting(args.document_name);
      try {
        await ctx.converter.convert(sourcePath, format, outputPath);
      } catch (err) {
        await record(ctx, args.document_name, {
          source: args.document_name,
          target_format: format,
          output_path: null,
          timestamp: new Date().toISOString(),
          success: false,
          error: err instanceof Error ? err.message : String(err),
        });
        throw err;
      }

      const historyRecorded = await record(ctx, args.document_name, {
        source: args.document_name,
        target_format: format,
        output_path: outputPath,
        timestamp: new Date().toISOString(),
        success: true,
      });
      return ok(`Converted ${args.document_name} to ${format}`, {
        source: args.document_name,
        target_format: format,
        output_path: outputPath,
        history_recorded: historyRecorded,
      });
    });
  },
});

export const ConversionQueryRequest = z.object({
  document_name: documentName,
});

const getConversionStatus = defineTool({
  name: 'get_conversion_status',
  description: 'Get the outcome of the most recent conversion of a document.',
  code: 'CONVERSION_STATUS_ERROR',
  schema: ConversionQueryRequest,
  handler: async (args, ctx) => {
    ctx.paths.resolve(args.document_name);
    const history = await ctx.history.list(args.document_name);
    const last = history.length > 0 ? history[history.length - 1] : null;
    const status = last === null ? 'never_converted' : last.success ? 'converted' : 'failed';
    return ok(`Conversion status of ${args.document_name}: ${status}`, {
      document: args.document_name,
      status,
      last_conversion: last,
    });
  },
});

const getConversionHistory = defineTool({
  name: 'get_conversion_history',
  description: 'List every conversion attempted for a document since the server started.',
  code: 'CONVERSION_HISTORY_ERROR',
  schema: ConversionQueryRequest,
  handler: async (args, ctx) => {
    ctx.paths.resolve(args.document_name);
    const history = await ctx.history.list(args.document_name);
    return ok(`Found ${history.length} conversion${history.length === 1 ? '' : 's'} for ${args.document_name}`, {
      document: args.document_name,
      history,
      total_conversions: history.length,
    });
  },
});

export const conversionTools: Tool[] = [convertDocument, getConversionStatus, getConversionHistory];
