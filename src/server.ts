import { resolve } from 'path';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError, type Tool } from '@modelcontextprotocol/sdk/types.js';
import type { AppConfig } from './config.js';
import { ExternalProviderError } from './errors.js';
import { evaluateRetrieval, loadEvalSet } from './eval/metrics.js';
import type { AnswerAssembler } from './rag/answer-assembler.js';
import { getProviderInfo } from './rag/generator.js';
import { normalizeQuery, type SynonymTable } from './rag/query-normalizer.js';
import type { ChunkStore } from './storage/chunk-store.js';
import type { Retriever } from './types/rag.js';
import { logger } from './util/logger.js';
import {
  AddDocumentationArgsSchema,
  AskDocumentationArgsSchema,
  DeleteDocumentationArgsSchema,
  EvaluateRetrievalArgsSchema,
  SearchDocumentationArgsSchema,
  addInjectionWarnings,
  detectPromptInjection,
  sanitizeErrorMessage,
  validateToolArgs,
  wrapExternalContent,
} from './util/security.js';

export const SERVER_NAME = 'cited-docs-assistant';
export const SERVER_VERSION = '0.1.0';

/** The store operations the tools use */
export type DocsStore = Pick<ChunkStore, 'addSource' | 'searchByText' | 'listSources' | 'deleteSource' | 'getInfo'>;

export interface DocsAnswerServerDeps {
  store: DocsStore;
  assembler: Pick<AnswerAssembler, 'answer' | 'providerName'>;
  retriever: Retriever;
  config: Readonly<AppConfig>;
  synonyms?: SynonymTable;
}

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function jsonResult(value: unknown, isError = false): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError } : {}),
  };
}

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: 'ask_documentation',
    description: `Answer a question from the indexed documentation.

Every factual sentence in the answer carries citations to the retrieved chunks that support it, or is explicitly flagged as unverified. Depending on the server's policy, unsupported sentences may instead be redacted or the whole answer rejected.

The result is JSON with a "status" of:
- "answered": the answer text, its segments with citations, and the retrieved sources
- "empty_retrieval": nothing relevant is indexed, so no answer was generated
- "unsupported_claim": the answer was rejected because some sentences had no source
- "blocked": the question was refused by the input screen`,
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'The question to answer, e.g. "How do I initialize a Chroma vector store?"',
        },
        k: {
          type: 'number',
          description: 'Number of chunks to retrieve (default: server RETRIEVAL_K)',
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'search_documentation',
    description: 'Search the indexed documentation by semantic similarity and return the matching chunks',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'Search query',
        },
        limit: {
          type: 'number',
          description: 'Maximum number of results (default: 10)',
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'add_documentation',
    description: 'Index a documentation page. Re-adding a source replaces its previous chunks.',
    inputSchema: {
      type: 'object',
      properties: {
        source: {
          type: 'string',
          description: 'URL or repository path identifying the page, e.g. docs/chroma_init.md',
        },
        title: {
          type: 'string',
          description: 'Optional title (default: derived from the source)',
        },
        section: {
          type: 'string',
          description: 'Optional section heading',
        },
        content: {
          type: 'string',
          description: 'Plain text or markdown content of the page',
        },
      },
      required: ['source', 'content'],
    },
  },
  {
    name: 'list_documentation',
    description: 'List indexed documentation sources',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'delete_documentation',
    description: 'Delete an indexed documentation source and all of its chunks',
    inputSchema: {
      type: 'object',
      properties: {
        source: {
          type: 'string',
          description: 'Source to delete, as shown by list_documentation',
        },
      },
      required: ['source'],
    },
  },
  {
    name: 'get_system_info',
    description: 'Show the active model provider, citation policy and knowledge base statistics',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'evaluate_retrieval',
    description:
      'Measure retrieval precision@k and recall@k against a JSONL eval set of {"query", "relevant_ids", "description"?} records',
    inputSchema: {
      type: 'object',
      properties: {
        evalFile: {
          type: 'string',
          description: 'Path to the JSONL eval set',
        },
        k: {
          type: 'number',
          description: 'Number of chunks to retrieve per query (default: server RETRIEVAL_K)',
        },
      },
      required: ['evalFile'],
    },
  },
];

/**
 * MCP front end over the answer assembler and the chunk store.
 */
export class DocsAnswerServer {
  private readonly server: McpServer;
  private readonly store: DocsStore;
  private readonly assembler: Pick<AnswerAssembler, 'answer' | 'providerName'>;
  private readonly retriever: Retriever;
  private readonly config: Readonly<AppConfig>;
  private readonly synonyms?: SynonymTable;

  constructor({ store, assembler, retriever, config, synonyms }: DocsAnswerServerDeps) {
    this.store = store;
    this.assembler = assembler;
    this.retriever = retriever;
    this.config = config;
    this.synonyms = synonyms;

    this.server = new McpServer(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();

    this.server.server.onerror = (error: Error) => logger.error('[MCP Error]', error);
  }

  private setupToolHandlers() {
    this.server.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: TOOL_DEFINITIONS,
    }));

    this.server.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.callTool(request.params.name, request.params.arguments)
    );
  }

  async callTool(name: string, args: Record<string, unknown> | undefined): Promise<ToolResult> {
    switch (name) {
      case 'ask_documentation':
        return this.handleAskDocumentation(args);
      case 'search_documentation':
        return this.handleSearchDocumentation(args);
      case 'add_documentation':
        return this.handleAddDocumentation(args);
      case 'list_documentation':
        return this.handleListDocumentation();
      case 'delete_documentation':
        return this.handleDeleteDocumentation(args);
      case 'get_system_info':
        return this.handleGetSystemInfo();
      case 'evaluate_retrieval':
        return this.handleEvaluateRetrieval(args);
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  }

  private async handleAskDocumentation(args: Record<string, unknown> | undefined) {
    let validatedArgs;
    try {
      validatedArgs = validateToolArgs(args, AskDocumentationArgsSchema);
    } catch (error) {
      throw new McpError(ErrorCode.InvalidParams, sanitizeErrorMessage(error));
    }

    const { query, k } = validatedArgs;

    try {
      const outcome = await this.assembler.answer(query, { k });
      logger.info(`[DocsAnswerServer] ask_documentation → ${outcome.status}`);
      return jsonResult(outcome);
    } catch (error) {
      if (error instanceof ExternalProviderError) {
        logger.error(`[DocsAnswerServer] ${error.stage} failed (${error.kind}):`, error);
        return jsonResult(
          {
            status: 'error',
            stage: error.stage,
            kind: error.kind,
            message: sanitizeErrorMessage(error),
          },
          true
        );
      }
      throw error;
    }
  }

  private async handleSearchDocumentation(args: Record<string, unknown> | undefined) {
    let validatedArgs;
    try {
      validatedArgs = validateToolArgs(args, SearchDocumentationArgsSchema);
    } catch (error) {
      throw new McpError(ErrorCode.InvalidParams, sanitizeErrorMessage(error));
    }

    const { query, limit = 10 } = validatedArgs;
    const results = await this.store.searchByText(query, limit);

    let blockedCount = 0;
    const safeResults = results
      .map((result) => {
        const injectionResult = detectPromptInjection(result.text);

        if (injectionResult.maxSeverity === 'high') {
          blockedCount++;
          logger.debug(
            `[Security] Blocked search result from ${result.sourceUrl} due to high-severity injection pattern: ${injectionResult.detections[0]?.description}`
          );
          return null;
        }

        const safeContent = wrapExternalContent(addInjectionWarnings(result.text, injectionResult), result.sourceUrl);

        return {
          ...result,
          text: safeContent,
          security: {
            isExternalContent: true,
            injectionDetected: injectionResult.hasInjection,
            injectionSeverity: injectionResult.maxSeverity,
            detectionCount: injectionResult.detections.length,
          },
        };
      })
      .filter((result): result is NonNullable<typeof result> => result !== null);

    const response: { results: typeof safeResults; securityNotice?: string } = {
      results: safeResults,
    };

    if (blockedCount > 0) {
      response.securityNotice = `${blockedCount} result(s) were blocked due to high-severity prompt injection patterns detected in the content.`;
    }

    return jsonResult(response);
  }

  private async handleAddDocumentation(args: Record<string, unknown> | undefined) {
    let validatedArgs;
    try {
      validatedArgs = validateToolArgs(args, AddDocumentationArgsSchema);
    } catch (error) {
      throw new McpError(ErrorCode.InvalidParams, sanitizeErrorMessage(error));
    }

    const { source, title, section, content } = validatedArgs;
    const chunks = await this.store.addSource({ sourceUrl: source, content, title, section });
    logger.info(`[DocsAnswerServer] Indexed ${source} (${chunks} chunks)`);

    return jsonResult({ status: 'indexed', source, chunks });
  }

  private async handleListDocumentation() {
    return jsonResult(await this.store.listSources());
  }

  private async handleDeleteDocumentation(args: Record<string, unknown> | undefined) {
    let validatedArgs;
    try {
      validatedArgs = validateToolArgs(args, DeleteDocumentationArgsSchema);
    } catch (error) {
      throw new McpError(ErrorCode.InvalidParams, sanitizeErrorMessage(error));
    }

    const source = validatedArgs.source.trim();
    const removed = await this.store.deleteSource(source);
    if (removed === 0) {
      return jsonResult({
        status: 'not_found',
        message: `Documentation not found: ${source}`,
        source,
      });
    }

    logger.info(`[DocsAnswerServer] Deleted ${source} (${removed} chunks)`);
    return jsonResult({ status: 'deleted', source, chunksRemoved: removed });
  }

  private async handleGetSystemInfo() {
    return jsonResult({
      name: SERVER_NAME,
      version: SERVER_VERSION,
      generator: this.assembler.providerName,
      providers: getProviderInfo(this.config),
      retrievalK: this.config.retrievalK,
      citation: this.config.citation,
      normalizer: this.config.normalizer,
      store: await this.store.getInfo(),
    });
  }

  private async handleEvaluateRetrieval(args: Record<string, unknown> | undefined) {
    let validatedArgs;
    try {
      validatedArgs = validateToolArgs(args, EvaluateRetrievalArgsSchema);
    } catch (error) {
      throw new McpError(ErrorCode.InvalidParams, sanitizeErrorMessage(error));
    }

    const { evalFile, k = this.config.retrievalK } = validatedArgs;

    let records;
    try {
      records = await loadEvalSet(resolve(evalFile));
    } catch (error) {
      throw new McpError(ErrorCode.InvalidParams, sanitizeErrorMessage(error));
    }

    const report = await evaluateRetrieval(
      records,
      async (query, limit) => {
        const normalized = normalizeQuery(query, this.config.normalizer, this.synonyms);
        const chunks = await this.retriever.retrieve(normalized.normalized, normalized.expansions, limit);
        return chunks.map((chunk) => chunk.id);
      },
      k
    );

    logger.info(
      `[DocsAnswerServer] Evaluated ${report.samples} queries at k=${k}: precision ${report.meanPrecision.toFixed(3)}, recall ${report.meanRecall.toFixed(3)}`
    );
    return jsonResult(report);
  }

  async run() {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    logger.info('Cited docs MCP server running on stdio');
  }

  async close() {
    await this.server.close();
  }
}
