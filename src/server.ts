import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { ToolDispatcher } from './tools/tool-dispatcher';
import type { ServerConfig } from './types';
import { Logger, createLogger } from './utils/logger';

/**
 * MCP server exposing the Cost Explorer tools over stdio
 */
export class CostExplorerMcpServer {
  readonly server: Server;
  private dispatcher: ToolDispatcher;
  private logger: Logger;

  constructor(private readonly config: ServerConfig, dispatcher?: ToolDispatcher) {
    this.logger = createLogger('CostExplorerMcpServer');
    this.dispatcher = dispatcher ?? new ToolDispatcher(config.profile, undefined, this.logger);
    this.server = new Server(
      { name: config.serverName, version: config.serverVersion },
      { capabilities: { tools: {} } }
    );
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.dispatcher.listTools()
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async request => {
      const { name, arguments: args } = request.params;
      this.logger.debug('Tool call received', { tool: name });

      const text = await this.dispatcher.dispatch(name, args ?? {});
      return {
        content: [{ type: 'text' as const, text }]
      };
    });
  }

  /**
   * Connects to stdio; the process then runs until the channel closes
   */
  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger.info('AWS Cost Explorer MCP server started', {
      serverName: this.config.serverName,
      version: this.config.serverVersion,
      profile: this.config.profile ?? 'default'
    });
  }

  async close(): Promise<void> {
    await this.server.close();
  }
}
