import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { TranscriptionService } from '../application/services/TranscriptionService.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { registerTranscribeAudioTool } from './tools/TranscribeAudioTool.js';
import { registerQueueStatusTools } from './tools/QueueStatusTools.js';
import { registerHealthCheckTool, type ServerProbe } from './tools/HealthCheckTool.js';

/**
 * MCP server exposing the transcription queue as tools over stdio
 */
export class McpServer {
  private server: BaseMcpServer;

  constructor(
    config: Config,
    service: TranscriptionService,
    whisper: ServerProbe,
    dbConnection: DatabaseConnection | null,
    private debugLog: (message: string) => void = () => undefined
  ) {
    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });

    registerTranscribeAudioTool(this.server, service);
    registerQueueStatusTools(this.server, service);
    registerHealthCheckTool(this.server, service, whisper, dbConnection);
  }

  /**
   * Connect the stdio transport. stdout belongs to the protocol from here on.
   */
  async start() {
    const transport = new StdioServerTransport();

    // Add stdio error handling to prevent unexpected disconnections
    process.stdin.on('error', (error) => {
      console.error('⚠️ stdin error (non-fatal):', error.message);
    });

    process.stdout.on('error', (error) => {
      console.error('⚠️ stdout error (non-fatal):', error.message);
    });

    process.stdin.on('end', () => {
      console.error('⚠️ stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    console.error('\n✅ Transcription MCP server running on stdio');
    this.debugLog('stdio transport connected successfully');
  }

  async shutdown() {
    await this.server.close();
  }
}
