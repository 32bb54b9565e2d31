// MARK: - Health Check Server
// Express server exposing liveness and dispatcher metrics

import express from 'express';
import type { Express, Request, Response } from 'express';
import mongoose from 'mongoose';
import type { Server } from 'http';
import type { Dispatcher } from './services/Dispatcher';
import type { SchedulerStore } from './store/types';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

export interface HealthDependencies {
  client: { isReady(): boolean };
  dispatcher: Pick<Dispatcher, 'getTotals' | 'isRunning'>;
  store: Pick<SchedulerStore, 'countSchedules'>;
  isDatabaseConnected?: () => boolean;
}

const MONGO_CONNECTED = 1;

export function createHealthApp(deps: HealthDependencies): Express {
  const app = express();
  const isDatabaseConnected = deps.isDatabaseConnected ?? (() => mongoose.connection.readyState === MONGO_CONNECTED);

  /**
   * Health check endpoint
   */
  app.get('/health', (_req: Request, res: Response) => {
    const health = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: {
        mongodb: 'unknown',
        discord: 'unknown',
        dispatcher: 'unknown',
      },
    };

    if (isDatabaseConnected()) {
      health.checks.mongodb = 'connected';
    } else {
      health.status = 'degraded';
      health.checks.mongodb = 'disconnected';
    }

    if (deps.client.isReady()) {
      health.checks.discord = 'ready';
    } else {
      health.status = 'degraded';
      health.checks.discord = 'not ready';
    }

    if (deps.dispatcher.isRunning()) {
      health.checks.dispatcher = 'running';
    } else {
      health.status = 'degraded';
      health.checks.dispatcher = 'stopped';
    }

    res.status(health.status === 'healthy' ? 200 : 503).json(health);
  });

  /**
   * Metrics endpoint
   */
  app.get('/metrics', async (_req: Request, res: Response) => {
    try {
      const [active, paused] = await Promise.all([
        deps.store.countSchedules('active'),
        deps.store.countSchedules('paused'),
      ]);
      const totals = deps.dispatcher.getTotals();

      res.json({
        memory: process.memoryUsage(),
        uptime: process.uptime(),
        schedules: { active, paused },
        dispatcher: {
          ...totals,
          lastCycleAt: totals.lastCycleAt?.toISOString() ?? null,
        },
      });
    } catch (error) {
      logger.error('Failed to fetch metrics', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to fetch metrics' });
    }
  });

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: 'Discord Ping Scheduler',
      version: '1.0.0',
      status: 'running',
    });
  });

  return app;
}

export interface HealthServer {
  port: number;
  stop(): Promise<void>;
}

/**
 * Start health server, falling back to an ephemeral port when the preferred
 * one is taken and no port was configured explicitly.
 */
export async function startHealthServer(app: Express, preferredPort: number, allowFallback: boolean): Promise<HealthServer> {
  const server = await new Promise<Server>((resolve, reject) => {
    const attemptListen = (port: number, canFallback: boolean): void => {
      const instance = app.listen(port, () => resolve(instance));

      instance.once('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          logger.error('Health server port already in use', { port });

          if (canFallback) {
            logger.warn('Attempting to start health server on an ephemeral port');
            instance.close(() => attemptListen(0, false));
            return;
          }

          reject(new Error(`Port ${port} is already in use for health server`));
          return;
        }

        reject(error);
      });
    };

    attemptListen(preferredPort, allowFallback);
  });

  const address = server.address();
  const activePort = typeof address === 'object' && address !== null ? address.port : preferredPort;
  logger.info('Health server started', { port: activePort });

  return {
    port: activePort,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
            return;
          }
          logger.info('Health server stopped', { port: activePort });
          resolve();
        });
      }),
  };
}
