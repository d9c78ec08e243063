/**
 * Express Application Configuration
 * Status surface of the fixed relay endpoint
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { errorHandler } from './middleware/error-handler';
import { RotationStateReader } from './lib/state';
import { RelayController } from './modules/relay/relay.controller';
import { RelayEndpoint } from './modules/relay/relay.render';
import { createRelayRouter } from './modules/relay/relay.router';

export interface AppDependencies {
  reader: RotationStateReader;
  endpoint: () => RelayEndpoint;
}

export const createApp = ({ reader, endpoint }: AppDependencies): Application => {
  const app = express();

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  app.use(helmet());

  // Other devices on the network read the status page
  app.use(cors({ methods: ['GET'] }));

  // ============================================================================
  // Routes
  // ============================================================================

  app.use('/', createRelayRouter(new RelayController(reader, endpoint)));

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};
