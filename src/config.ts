import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  whisper: {
    command: string;
    modelPath: string;
    host: string;
    port: number;
    language: string;
    threads: number;
    convert: boolean;
    startupAttempts: number;
    startupDelayMs: number;
  };
  queue: {
    readinessTimeoutMs: number;
    readinessRetryDelayMs: number;
    progressIntervalMs: number;
  };
  output: {
    header: string;
  };
  history: {
    enabled: boolean;
    databasePath: string;
  };
  webUI: {
    enabled: boolean;
    port: number;
  };
  mcp: {
    enabled: boolean;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  whisper: z.object({
    command: z.string().min(1, 'Whisper command must not be empty'),
    modelPath: z.string().min(1, 'Model path must not be empty'),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    language: z.string().min(1),
    threads: z.number().int().min(1).max(64),
    convert: z.boolean(),
    startupAttempts: z.number().int().min(1),
    startupDelayMs: z.number().int().min(10).max(60000),
  }),
  queue: z.object({
    readinessTimeoutMs: z.number().int().min(1).max(60000),
    readinessRetryDelayMs: z.number().int().min(0).max(60000),
    progressIntervalMs: z.number().int().min(10).max(10000),
  }),
  output: z.object({
    header: z.string(),
  }),
  history: z.object({
    enabled: z.boolean(),
    databasePath: z.string().min(1),
  }),
  webUI: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1024).max(65535),
  }),
  mcp: z.object({
    enabled: z.boolean(),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --model models/ggml-base.bin --language en --port 3001 --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = argv[i + 1];

      // Check if next arg is a value or another flag
      if (next !== undefined && !next.startsWith('--')) {
        args[key] = next;
        i++;
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build and validate configuration. Priority: CLI args > env vars > defaults.
 * Throws ZodError when the result is invalid.
 */
export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string | null, envKey: string | null, defaultValue: string): string => {
    const cliValue = cliKey ? cliArgs[cliKey] : undefined;
    if (typeof cliValue === 'string') return cliValue;
    return (envKey && env[envKey]) || defaultValue;
  };

  const getBoolean = (cliKey: string | null, envKey: string | null, defaultValue: boolean): boolean => {
    const cliValue = cliKey ? cliArgs[cliKey] : undefined;
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = envKey ? env[envKey] : undefined;
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  // NaN fails validation instead of silently falling back
  const getNumber = (cliKey: string | null, envKey: string | null, defaultValue: number): number => {
    const cliValue = cliKey ? cliArgs[cliKey] : undefined;
    if (cliValue !== undefined) return Number(cliValue);
    const envValue = envKey ? env[envKey] : undefined;
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'transcription-queue'),
      version: getString(null, 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    whisper: {
      command: getString('whisper-command', 'WHISPER_COMMAND', 'whisper-server'),
      modelPath: getString('model', 'WHISPER_MODEL_PATH', 'models/ggml-medium.bin'),
      host: getString(null, 'WHISPER_HOST', '127.0.0.1'),
      port: getNumber(null, 'WHISPER_PORT', 8178),
      language: getString('language', 'WHISPER_LANGUAGE', 'auto'),
      threads: getNumber(null, 'WHISPER_THREADS', 4),
      convert: getBoolean(null, 'WHISPER_CONVERT', true),
      startupAttempts: getNumber(null, 'WHISPER_STARTUP_ATTEMPTS', 120),
      startupDelayMs: getNumber(null, 'WHISPER_STARTUP_DELAY_MS', 1000),
    },
    queue: {
      readinessTimeoutMs: getNumber(null, 'READINESS_TIMEOUT_MS', 100),
      readinessRetryDelayMs: getNumber(null, 'READINESS_RETRY_DELAY_MS', 100),
      progressIntervalMs: getNumber(null, 'PROGRESS_INTERVAL_MS', 50),
    },
    output: {
      header: getString(null, 'TRANSCRIPT_HEADER', 'Audio transcription:'),
    },
    history: {
      enabled: getBoolean(null, 'HISTORY_ENABLED', true),
      databasePath: getString(null, 'HISTORY_DB_PATH', 'data/transcriptions.db'),
    },
    webUI: {
      enabled: getBoolean('web-ui', 'WEB_UI_ENABLED', true),
      port: getNumber('port', 'WEB_PORT', 3001),
    },
    mcp: {
      enabled: getBoolean('mcp', 'MCP_ENABLED', false),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration from the process environment, exiting on validation failure
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Ports and timings must be whole numbers');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('═'.repeat(68));
  console.error('            Transcription Queue - Configuration');
  console.error('═'.repeat(68));

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🎙️  Whisper: ${config.whisper.command} @ ${config.whisper.host}:${config.whisper.port}`);
  console.error(`   Model: ${config.whisper.modelPath} | Language: ${config.whisper.language} | Threads: ${config.whisper.threads}`);
  console.error(`⚙️  Queue: readiness ${config.queue.readinessTimeoutMs}ms (+${config.queue.readinessRetryDelayMs}ms) | progress every ${config.queue.progressIntervalMs}ms`);

  if (config.history.enabled) {
    console.error(`💾 History: ${config.history.databasePath}`);
  }

  if (config.webUI.enabled) {
    console.error(`\n🌐 Web API: http://localhost:${config.webUI.port}`);
  }

  if (config.mcp.enabled) {
    console.error('📡 MCP: STDIO mode');
  }

  console.error('\n' + '─'.repeat(68));
}
