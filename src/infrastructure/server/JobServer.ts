import express, { Express, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { z } from 'zod';
import { JobStatus } from '../../core/entities/Job.js';
import { JobManager } from './JobManager.js';

const JobIdSchema = z.string().uuid();

/**
 * Simulated job server
 * - POST /job            -> 201 { job_id, status }
 * - GET  /status/:jobId  -> 200 { result } | 400 invalid id | 404 unknown id
 */
export class JobServer {
  private app: Express;
  private httpServer: HttpServer | null = null;

  constructor(
    private readonly jobManager: JobManager = new JobManager(),
    private readonly port: number = 5000,
    private readonly host: string = '127.0.0.1'
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    this.app.post('/job', (req: Request, res: Response) => this.handleCreateJob(req, res));
    this.app.get('/status/:jobId', (req: Request, res: Response) => this.handleGetStatus(req, res));
  }

  handleCreateJob(_req: Request, res: Response): void {
    try {
      const job = this.jobManager.createJob();
      res.status(201).json({ job_id: job.id, status: JobStatus.Pending });
    } catch (error) {
      res.status(500).json({
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  handleGetStatus(req: Request, res: Response): void {
    try {
      const parsed = JobIdSchema.safeParse(req.params.jobId);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid job ID' });
        return;
      }

      const status = this.jobManager.getJobStatus(parsed.data.toLowerCase());
      if (status === null) {
        res.status(404).json({ error: 'Job not found' });
        return;
      }

      res.json({ result: status });
    } catch (error) {
      res.status(500).json({
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  getApp(): Express {
    return this.app;
  }

  async start(): Promise<void> {
    if (this.httpServer) {
      throw new Error('Job server is already running');
    }

    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        console.error(`[JobServer] Listening on ${this.getUrl()}`);
        resolve();
      });
      server.once('error', reject);
      this.httpServer = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
    this.httpServer = null;
    console.error('[JobServer] Stopped');
  }

  isRunning(): boolean {
    return this.httpServer !== null;
  }

  /**
   * Port the server is bound to; differs from the configured one when that was 0
   */
  getPort(): number {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : this.port;
  }

  getUrl(): string {
    return `http://${this.host}:${this.getPort()}`;
  }
}
