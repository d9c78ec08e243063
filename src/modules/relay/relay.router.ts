/**
 * Relay Router
 */

import { Router } from 'express';
import { RelayController } from './relay.controller';

export function createRelayRouter(controller: RelayController): Router {
  const router = Router();

  /**
   * @route   GET /
   * @desc    Current egress status of the fixed endpoint
   * @access  Public
   */
  router.get('/', controller.getStatus);

  return router;
}
