/**
 * MCP Service Module
 *
 * Purpose: JSON-RPC dispatch of MCP tool and resource calls onto the engines
 * Dependencies: Record Store, Filter, Matching and Aggregation engines
 *
 * Data-layer errors (NotFound, InvalidCriteria, LoadFailure) are tool results
 * with `isError: true`, so a caller can tell "nothing matched" from "no such
 * record". Protocol problems are JSON-RPC errors.
 */

import { z } from 'zod';
import { isRealtyError } from '../../errors';
import type { EntityType } from '../../types';
import { errorMessage } from '../../utils';
import { buildTools } from './tools';
import type { McpTool, RealtyEngines, ToolHandler } from './tools';

export { buildTools } from './tools';
export type { McpTool, RealtyEngines, ToolHandler } from './tools';

export interface McpResource {
  uri: string;
  name: string;
  description: string;
  mimeType?: string;
}

export type McpRequestId = string | number | null;

export interface McpRequest {
  jsonrpc: '2.0';
  id: McpRequestId;
  method: string;
  params?: Record<string, unknown>;
}

export interface McpResponse {
  jsonrpc: '2.0';
  id: McpRequestId;
  result?: unknown;
  error?: {
    code: number;
    message: string;
    data?: unknown;
  };
}

export interface McpContent {
  type: 'text';
  text: string;
}

export interface McpToolResult {
  content: McpContent[];
  isError?: boolean;
}

export const JSON_RPC_ERRORS = {
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internal: -32603,
} as const;

export const McpRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).default(null),
  method: z.string(),
  params: z.record(z.unknown()).optional(),
});

const ToolCallParams = z.object({
  name: z.string(),
  arguments: z.unknown().optional(),
});

const ResourceReadParams = z.object({ uri: z.string() });

const RESOURCE_SCHEME = 'realty://';

const COLLECTION_RESOURCES: Record<string, EntityType> = {
  listings: 'listing',
  agents: 'agent',
  clients: 'client',
  transactions: 'transaction',
  areas: 'area',
  amenities: 'amenity',
};

class InvalidParamsError extends Error {
  constructor(message: string, readonly data?: unknown) {
    super(message);
    this.name = 'InvalidParamsError';
  }
}

function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function textContent(value: unknown): McpContent[] {
  return [{ type: 'text', text: JSON.stringify(value, null, 2) }];
}

export class McpService {
  private readonly tools = new Map<string, ToolHandler>();

  constructor(private engines: RealtyEngines) {
    for (const handler of buildTools(engines)) {
      this.tools.set(handler.tool.name, handler);
    }
  }

  /**
   * Entry point for a raw JSON body. Rejects anything that is not a JSON-RPC
   * 2.0 request envelope.
   */
  async handleMessage(body: unknown): Promise<McpResponse> {
    const parsed = McpRequestSchema.safeParse(body);
    if (!parsed.success) {
      return {
        jsonrpc: '2.0',
        id: null,
        error: { code: JSON_RPC_ERRORS.invalidRequest, message: `Invalid request: ${describeZodError(parsed.error)}` },
      };
    }
    return this.handleRequest(parsed.data);
  }

  async handleRequest(request: McpRequest): Promise<McpResponse> {
    try {
      switch (request.method) {
        case 'initialize': return this.handleInitialize(request);
        case 'tools/list': return this.handleToolsList(request);
        case 'tools/call': return await this.handleToolsCall(request);
        case 'resources/list': return this.handleResourcesList(request);
        case 'resources/read': return this.handleResourcesRead(request);
        case 'ping': return { jsonrpc: '2.0', id: request.id, result: { pong: true } };
        default:
          return {
            jsonrpc: '2.0',
            id: request.id,
            error: { code: JSON_RPC_ERRORS.methodNotFound, message: `Method not found: ${request.method}` },
          };
      }
    } catch (error) {
      if (error instanceof InvalidParamsError) {
        return {
          jsonrpc: '2.0',
          id: request.id,
          error: { code: JSON_RPC_ERRORS.invalidParams, message: error.message, data: error.data },
        };
      }
      console.error(`❌ ${request.method} failed:`, error);
      return {
        jsonrpc: '2.0',
        id: request.id,
        error: { code: JSON_RPC_ERRORS.internal, message: errorMessage(error) },
      };
    }
  }

  listTools(): McpTool[] {
    return [...this.tools.values()].map((handler) => handler.tool);
  }

  listResources(): McpResource[] {
    const collections = Object.keys(COLLECTION_RESOURCES).map((collection) => ({
      uri: `${RESOURCE_SCHEME}${collection}`,
      name: collection,
      description: `Every record in the ${collection} collection`,
      mimeType: 'application/json',
    }));

    return [
      ...collections,
      {
        uri: `${RESOURCE_SCHEME}market`,
        name: 'market',
        description: 'Market overview and per-area performance',
        mimeType: 'application/json',
      },
      {
        uri: `${RESOURCE_SCHEME}city`,
        name: 'city',
        description: 'City overview',
        mimeType: 'application/json',
      },
    ];
  }

  /**
   * Run one tool. Data-layer errors come back as an error result; malformed
   * arguments and unknown tools raise InvalidParamsError.
   */
  async callTool(name: string, args: unknown): Promise<McpToolResult> {
    const handler = this.tools.get(name);
    if (!handler) {
      throw new InvalidParamsError(`Unknown tool: ${name}`);
    }

    try {
      return { content: textContent(await handler.call(args)) };
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new InvalidParamsError(`Invalid arguments for ${name}: ${describeZodError(error)}`, error.issues);
      }
      if (isRealtyError(error)) {
        return {
          content: textContent({ error: error.code, message: error.message, details: error.details }),
          isError: true,
        };
      }
      throw error;
    }
  }

  private handleInitialize(request: McpRequest): McpResponse {
    return {
      jsonrpc: '2.0', id: request.id,
      result: {
        protocolVersion: '2024-11-05',
        capabilities: { tools: {}, resources: {} },
        serverInfo: { name: 'realty-atlas', version: '0.1.0' },
      },
    };
  }

  private handleToolsList(request: McpRequest): McpResponse {
    return { jsonrpc: '2.0', id: request.id, result: { tools: this.listTools() } };
  }

  private async handleToolsCall(request: McpRequest): Promise<McpResponse> {
    const params = ToolCallParams.safeParse(request.params ?? {});
    if (!params.success) {
      throw new InvalidParamsError(`Invalid tools/call params: ${describeZodError(params.error)}`);
    }

    const result = await this.callTool(params.data.name, params.data.arguments);
    return { jsonrpc: '2.0', id: request.id, result };
  }

  private handleResourcesList(request: McpRequest): McpResponse {
    return { jsonrpc: '2.0', id: request.id, result: { resources: this.listResources() } };
  }

  private handleResourcesRead(request: McpRequest): McpResponse {
    const params = ResourceReadParams.safeParse(request.params ?? {});
    if (!params.success) {
      throw new InvalidParamsError(`Invalid resources/read params: ${describeZodError(params.error)}`);
    }

    const { uri } = params.data;
    return {
      jsonrpc: '2.0', id: request.id,
      result: { contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(this.readResource(uri), null, 2) }] },
    };
  }

  private readResource(uri: string): unknown {
    if (!uri.startsWith(RESOURCE_SCHEME)) {
      throw new InvalidParamsError(`Unknown resource: ${uri}`);
    }

    const name = uri.slice(RESOURCE_SCHEME.length);
    const { store, aggregation } = this.engines;
    if (name === 'market') {
      return aggregation.marketOverview();
    }
    if (name === 'city') {
      return aggregation.cityOverview();
    }
    if (Object.prototype.hasOwnProperty.call(COLLECTION_RESOURCES, name)) {
      return store.all(COLLECTION_RESOURCES[name]);
    }
    throw new InvalidParamsError(`Unknown resource: ${uri}`);
  }
}

export function createMcpService(engines: RealtyEngines): McpService {
  return new McpService(engines);
}
