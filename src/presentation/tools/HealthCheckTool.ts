import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { QueueStatistics } from '../../core/entities/Job.js';
import { TranscriptionService } from '../../application/services/TranscriptionService.js';
import { DatabaseConnection } from '../../infrastructure/database/DatabaseConnection.js';
import type { ProbeResult } from '../../infrastructure/http/WhisperApiClient.js';

interface ComponentHealth {
  status: 'healthy' | 'degraded' | 'error' | 'disabled';
  message: string;
}

export interface HealthReport {
  timestamp: string;
  status: 'healthy' | 'degraded';
  components: {
    model: ComponentHealth;
    whisperServer: ComponentHealth;
    database: ComponentHealth;
    queue: QueueStatistics;
  };
}

export interface ServerProbe {
  probe(): Promise<ProbeResult>;
}

export async function checkHealth(
  service: TranscriptionService,
  whisper: ServerProbe,
  dbConnection: DatabaseConnection | null
): Promise<HealthReport> {
  const snapshot = service.getSnapshot();

  const model: ComponentHealth = snapshot.ready
    ? { status: 'healthy', message: 'Model loaded' }
    : snapshot.state === 'failed'
      ? { status: 'error', message: snapshot.initializationError ?? 'Model initialization failed' }
      : { status: 'degraded', message: `Model not ready (${snapshot.state})` };

  let whisperServer: ComponentHealth;
  try {
    const probe = await whisper.probe();
    whisperServer =
      probe === 'ready'
        ? { status: 'healthy', message: 'whisper-server is answering' }
        : { status: probe === 'loading' ? 'degraded' : 'error', message: `whisper-server is ${probe}` };
  } catch (error) {
    whisperServer = { status: 'error', message: error instanceof Error ? error.message : String(error) };
  }

  let database: ComponentHealth;
  if (!dbConnection) {
    database = { status: 'disabled', message: 'History is disabled' };
  } else {
    try {
      const stats = dbConnection.getStatistics();
      database = {
        status: 'healthy',
        message: `Database connected - ${stats.totalJobs} jobs (${stats.doneJobs} done, ${stats.failedJobs} failed)`,
      };
    } catch (error) {
      database = { status: 'error', message: error instanceof Error ? error.message : String(error) };
    }
  }

  const healthy = [model, whisperServer, database].every(
    (component) => component.status === 'healthy' || component.status === 'disabled'
  );

  return {
    timestamp: new Date().toISOString(),
    status: healthy ? 'healthy' : 'degraded',
    components: { model, whisperServer, database, queue: service.getStatistics() },
  };
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(
  server: McpServer,
  service: TranscriptionService,
  whisper: ServerProbe,
  dbConnection: DatabaseConnection | null
) {
  server.tool(
    'health-check',
    'Check the health of the transcription server and its components (model readiness, whisper-server, database)',
    {},
    async () => {
      try {
        const health = await checkHealth(service, whisper, dbConnection);
        return {
          content: [
            {
              type: 'text',
              text: `# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Health check error: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
