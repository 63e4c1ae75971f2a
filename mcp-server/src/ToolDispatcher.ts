import { zodToJsonSchema } from 'zod-to-json-schema';
import { conversionTools } from './ConversionTools';
import { documentTools } from './DocumentTools';
import { DocumentFault } from './errors';
import { formatTools } from './FormatTools';
import { createLogger } from './logger';
import { paragraphTools } from './ParagraphTools';
import { errorEnvelope } from './ResponseEnvelope';
import type { Envelope } from './ResponseEnvelope';
import { tableTools } from './TableTools';
import type { Tool, ToolContext } from './ToolSupport';

const log = createLogger('dispatcher');

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export const ALL_TOOLS: Tool[] = [
  ...documentTools,
  ...paragraphTools,
  ...tableTools,
  ...formatTools,
  ...conversionTools,
];

/** Routes a tool name to its single definition. */
export class ToolDispatcher {
  private _tools = new Map<string, Tool>();

  constructor(
    private readonly _ctx: ToolContext,
    tools: Tool[] = ALL_TOOLS,
  ) {
    for (const tool of tools) {
      if (this._tools.has(tool.name)) throw new Error(`Duplicate tool name: ${tool.name}`);
      this._tools.set(tool.name, tool);
    }
  }

  list(): ToolDescriptor[] {
    return [...this._tools.values()].map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool),
    }));
  }

  async dispatch(name: string, args: unknown): Promise<Envelope> {
    const tool = this._tools.get(name);
    if (!tool) {
      log.warn(`Unknown tool: ${name}`);
      return errorEnvelope('UNKNOWN_OPERATION', new DocumentFault('UNKNOWN_OPERATION', `Unknown tool: ${name}`));
    }
    log.debug(`Calling ${name}`);
    return tool.run(args, this._ctx);
  }
}

function toInputSchema(tool: Tool): ToolDescriptor['inputSchema'] {
  const json = zodToJsonSchema(tool.schema, { $refStrategy: 'none' });
  const properties: Record<string, unknown> = {};
  if ('properties' in json && json.properties) {
    for (const [key, value] of Object.entries(json.properties)) properties[key] = value;
  }
  const required = 'required' in json && Array.isArray(json.required)
    ? json.required.filter((key): key is string => typeof key === 'string')
    : [];
  return required.length > 0 ? { type: 'object', properties, required } : { type: 'object', properties };
}
