/**
 * Artifact server: MCP access to the Resolved Specification.
 *
 * Execution agents read committed artifacts through this server instead of
 * re-reading generation prose. Every tool is read-only; the pipeline state
 * file is loaded again on each call, so agents see the latest committed run.
 *
 * @packageDocumentation
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import { assembleContext } from '../../assembly/assembler.js';
import { SchemaRegistry } from '../../generation/schema-registry.js';
import { ArtifactNotFoundError } from '../../store/store.js';
import { isNonEmptyString } from '../../utils/guards.js';
import { loadState } from '../../workflow/persistence.js';
import type { PipelineState } from '../../workflow/types.js';
import { createServerLogger } from '../logging.js';
import {
  SpecificationUnavailableError,
  ToolArgumentError,
  WorkItemNotFoundError,
  type ArtifactServerConfig,
  type GetArtifactResult,
  type GetSpecificationResult,
  type GetWorkItemResult,
  type ListUncoveredResult,
} from './types.js';

const ID_ARGUMENT: Tool['inputSchema'] = {
  type: 'object',
  properties: {
    id: { type: 'string', description: 'Artifact ID, e.g. "WI-001" or "CAP-002"' },
  },
  required: ['id'],
};

const NO_ARGUMENTS: Tool['inputSchema'] = { type: 'object', properties: {} };

/**
 * Tool listing served on `tools/list`.
 */
export const ARTIFACT_TOOLS: Tool[] = [
  {
    name: 'get_specification',
    description:
      'Returns the Resolved Specification of the run: the confirmed concept anchor, ' +
      'capabilities, decisions, entities and ordered work items with every reference resolved.',
    inputSchema: NO_ARGUMENTS,
  },
  {
    name: 'get_work_item',
    description:
      'Returns one work item of the Resolved Specification with the capabilities it implements, ' +
      'the work items it depends on and its position in the order.',
    inputSchema: ID_ARGUMENT,
  },
  {
    name: 'get_artifact',
    description:
      'Returns any stored artifact by ID, including superseded ones, with its derived status.',
    inputSchema: ID_ARGUMENT,
  },
  {
    name: 'list_uncovered',
    description: 'Lists current capabilities that no current architecture decision serves.',
    inputSchema: NO_ARGUMENTS,
  },
];

function requireId(tool: string, args: Record<string, unknown> | undefined): string {
  const id = args?.id;
  if (!isNonEmptyString(id)) {
    throw new ToolArgumentError(tool, '"id" must be a non-empty string');
  }
  return id.trim();
}

function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

/**
 * Creates the artifact server without connecting a transport.
 */
export function createArtifactServer(config: ArtifactServerConfig): Server {
  const { statePath, debug = false } = config;
  const logger = config.logger ?? createServerLogger({ serverName: 'artifact-server', debug });
  let registry: Promise<SchemaRegistry> | undefined =
    config.registry !== undefined ? Promise.resolve(config.registry) : undefined;

    const server = new Server(
    { name: 'throughline-artifact-server', version: '1.0.0' },
    { capabilities: { tools: {} } }
  );

  async function readState(): Promise<PipelineState> {
    registry ??= SchemaRegistry.load();
    return loadState(statePath, await registry);
  }

  async function handleGetSpecification(): Promise<GetSpecificationResult> {
    const state = await readState();
    if (state.specification === null) {
      throw new SpecificationUnavailableError(state.status);
    }
    return { runId: state.runId, specification: state.specification };
  }

  async function handleGetWorkItem(id: string): Promise<GetWorkItemResult> {
    const { runId, specification } = await handleGetSpecification();
    const workItem = specification.workItems.find((item) => item.workItem.id === id);
    if (workItem === undefined) {
      throw new WorkItemNotFoundError(id);
    }
    return { runId, workItem };
  }

  async function handleGetArtifact(id: string): Promise<GetArtifactResult> {
    const { store } = await readState();
    const artifact = store.getById(id);
    if (artifact === undefined) {
      throw new ArtifactNotFoundError(id);
    }
    return { artifact, status: store.deriveStatus(id) };
  }

  async function handleListUncovered(): Promise<ListUncoveredResult> {
    const state = await readState();
    if (state.anchor === null) {
      return { uncovered: [] };
    }
    return { uncovered: assembleContext(state.store, state.anchor, { logger }).uncovered };
  }

  server.setRequestHandler(ListToolsRequestSchema, () => Promise.resolve({ tools: ARTIFACT_TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    logger.debug('tool_call', { name, args });

    try {
      switch (name) {
        case 'get_specification':
          return jsonResult(await handleGetSpecification());
        case 'get_work_item':
          return jsonResult(await handleGetWorkItem(requireId(name, args)));
        case 'get_artifact':
          return jsonResult(await handleGetArtifact(requireId(name, args)));
        case 'list_uncovered':
          return jsonResult(await handleListUncovered());
        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('tool_failed', { name, error: message });
      return {
        content: [{ type: 'text', text: JSON.stringify({ error: message }) }],
        isError: true,
      };
    }
  });

  return server;
}

/**
 * Starts the artifact server on stdio.
 */
export async function startArtifactServer(config: ArtifactServerConfig): Promise<void> {
  const server = createArtifactServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
