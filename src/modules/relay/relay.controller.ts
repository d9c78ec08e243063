/**
 * Relay Controller
 * Read-only status surface over the shared rotation state
 */

import { Request, Response } from 'express';
import { RotationStateReader } from '../../lib/state';
import { RelayEndpoint, renderStatusPage } from './relay.render';

export class RelayController {
  constructor(
    private readonly reader: RotationStateReader,
    private readonly endpoint: () => RelayEndpoint
  ) {}

  /**
   * GET /
   * Current egress status, or 503 when no proxy is applied
   */
  getStatus = (req: Request, res: Response): void => {
    const page = renderStatusPage(this.reader.snapshot(), this.endpoint());

    if (page === null) {
      res.status(503).type('text/plain').send('No active proxy configured');
      return;
    }

    res.status(200).type('html').send(page);
  };
}
