import express, { Express, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import { z } from 'zod';
import type { EnqueueReport, Job } from '../../core/entities/Job.js';
import { errorMessage } from '../../core/errors.js';
import type { IPipelineObserver } from '../../core/interfaces/IPipelineObserver.js';
import type { TranscriptionService } from '../../application/services/TranscriptionService.js';

const EnqueueBodySchema = z
  .object({
    paths: z.array(z.string()).optional(),
    dropData: z.string().optional(),
  })
  .refine((body) => (body.paths?.length ?? 0) > 0 || Boolean(body.dropData), {
    message: 'Provide paths or dropData',
  });

const HoursSchema = z.coerce.number().positive().default(24);

export type PipelineEvent =
  | { type: 'connected'; timestamp: string }
  | { type: 'progress'; value: number; timestamp: string }
  | { type: 'status'; text: string; timestamp: string }
  | { type: 'error'; message: string; timestamp: string }
  | { type: 'job_updated'; job: Job; timestamp: string };

/**
 * 202 when anything was queued, 422 when everything was rejected, otherwise 200
 */
export function enqueueStatusCode(reports: EnqueueReport[]): number {
  if (reports.some((report) => report.status === 'queued')) return 202;
  if (reports.length > 0 && reports.every((report) => report.status === 'rejected')) return 422;
  return 200;
}

/**
 * REST API for the queue, plus a WebSocket feed of pipeline events
 */
export class WebServer implements IPipelineObserver {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private lastProgress: number | null = null;

  constructor(
    private service: TranscriptionService,
    private port: number = 3001
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    // API: Pipeline snapshot
    this.app.get('/api/status', (req: Request, res: Response) => {
      res.json({ success: true, data: this.service.getSnapshot() });
    });

    // API: Current, pending and finished jobs
    this.app.get('/api/jobs', (req: Request, res: Response) => {
      try {
        const snapshot = this.service.getSnapshot();
        res.json({
          success: true,
          data: {
            current: snapshot.current,
            pending: snapshot.pending,
            history: this.service.getHistory(),
          },
        });
      } catch (error) {
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    });

    // API: Get job by ID
    this.app.get('/api/jobs/:id', (req: Request, res: Response) => {
      try {
        const job = this.service.getJob(req.params.id);
        if (!job) {
          res.status(404).json({ success: false, error: 'Job not found' });
          return;
        }
        res.json({ success: true, data: job });
      } catch (error) {
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    });

    // API: Enqueue paths or a drop payload
    this.app.post('/api/jobs', (req: Request, res: Response) => {
      const parsed = EnqueueBodySchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({
          success: false,
          error: parsed.error.errors.map((err) => err.message).join('; '),
        });
        return;
      }

      try {
        const reports: EnqueueReport[] = [];
        if (parsed.data.paths) {
          reports.push(...this.service.enqueue(parsed.data.paths));
        }
        if (parsed.data.dropData) {
          reports.push(...this.service.enqueueDropData(parsed.data.dropData));
        }
        res.status(enqueueStatusCode(reports)).json({ success: true, data: reports });
      } catch (error) {
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    });

    // API: Prune finished jobs
    this.app.delete('/api/history', (req: Request, res: Response) => {
      const hours = HoursSchema.safeParse(req.query.hours);
      if (!hours.success) {
        res.status(400).json({ success: false, error: 'hours must be a positive number' });
        return;
      }

      try {
        const cleared = this.service.clearOldJobs(hours.data);
        res.json({ success: true, data: { cleared } });
      } catch (error) {
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    });

    // API: Get statistics
    this.app.get('/api/stats', (req: Request, res: Response) => {
      res.json({ success: true, data: this.service.getStatistics() });
    });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      console.error('[WebServer] New WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        console.error('[WebServer] WebSocket client disconnected');
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });

      // Send initial connection confirmation
      this.send(ws, { type: 'connected', timestamp: new Date().toISOString() });
    });
  }

  private send(client: WebSocket, event: PipelineEvent): void {
    client.send(JSON.stringify(event));
  }

  public broadcast(event: PipelineEvent): void {
    const payload = JSON.stringify(event);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  onProgress(fraction: number): void {
    if (fraction === this.lastProgress) return;
    this.lastProgress = fraction;
    this.broadcast({ type: 'progress', value: fraction, timestamp: new Date().toISOString() });
  }

  onStatus(text: string): void {
    this.broadcast({ type: 'status', text, timestamp: new Date().toISOString() });
  }

  onError(message: string): void {
    this.broadcast({ type: 'error', message, timestamp: new Date().toISOString() });
  }

  onJobUpdate(job: Job): void {
    // Every job starts its progress feed from scratch
    if (job.status !== 'pending') {
      this.lastProgress = null;
    }
    this.broadcast({ type: 'job_updated', job, timestamp: new Date().toISOString() });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.httpServer = this.app.listen(this.port, () => {
          console.error(`[WebServer] API available at http://localhost:${this.port}`);
          this.setupWebSocket();
          resolve();
        });

        this.httpServer.on('error', (error) => {
          console.error('[WebServer] Server error:', error);
          reject(error);
        });
      } catch (error) {
        reject(error);
      }
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      // Close all WebSocket connections
      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      // Close WebSocket server
      if (this.wss) {
        this.wss.close(() => {
          console.error('[WebServer] WebSocket server closed');
        });
      }

      // Close HTTP server
      if (this.httpServer) {
        this.httpServer.close(() => {
          console.error('[WebServer] HTTP server closed');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}
