/**
 * Minimal static server for browsing a capture offline
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import * as http from 'http';
import * as path from 'path';
import { ServerError } from '../domain/errors';
import { LoggingService } from '../services/LoggingService';

/**
 * Express app serving the output root, with extension-based content types
 * and `index.html` resolution for directory requests
 */
export function createStaticApp(outRoot: string, logger?: LoggingService): Express {
  const app = express();

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.on('finish', () => {
      logger?.debug(`${req.method} ${req.originalUrl} ${res.statusCode}`);
    });
    next();
  });

  app.use(express.static(path.resolve(outRoot), { index: ['index.html'], dotfiles: 'allow' }));

  app.use((req: Request, res: Response) => {
    logger?.warn(`Not captured: ${req.originalUrl}`);
    res.status(404).type('text/plain').send(`Not found: ${req.path}\n`);
  });

  return app;
}

export class StaticServer {
  private server: http.Server | null = null;
  private outRoot: string;
  private port: number;
  private logger?: LoggingService;

  constructor(outRoot: string, port: number = 8000, logger?: LoggingService) {
    this.outRoot = outRoot;
    this.port = port;
    this.logger = logger;
  }

  /**
   * Start listening
   * @throws ServerError if the port is taken or cannot be bound
   */
  async start(): Promise<void> {
    if (this.isRunning()) {
      this.logger?.info(`Server already running at ${this.getUrl()}`);
      return;
    }

    const server = http.createServer(createStaticApp(this.outRoot, this.logger));

    await new Promise<void>((resolve, reject) => {
      server.once('error', (error: NodeJS.ErrnoException) => {
        const reason = error.code === 'EADDRINUSE' ? `port ${this.port} is already in use` : error.message;
        reject(new ServerError(`Cannot serve ${this.outRoot}: ${reason}`, this.port, { cause: error }));
      });
      server.listen(this.port, () => resolve());
    });

    const address = server.address();
    if (typeof address === 'object' && address !== null) {
      this.port = address.port;
    }
    this.server = server;
    this.logger?.info(`Serving ${this.outRoot} at ${this.getUrl()}`);
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
        } else {
          this.server = null;
          this.logger?.info('Server stopped');
          resolve();
        }
      });
    });
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  getUrl(): string {
    return `http://localhost:${this.port}`;
  }
}
