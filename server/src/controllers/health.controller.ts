/**
 * Health Endpoints
 *
 * - /healthz: plain-text liveness for load balancers
 * - /api/v1/health: JSON liveness with the state of optional integrations
 */

import type { Request, Response } from 'express';

export interface HealthChecks {
  llm: boolean;
  places: boolean;
}

export function legacyHealthHandler(_req: Request, res: Response): void {
  res.status(200).send('ok');
}

export function createLivenessHandler(checks: HealthChecks) {
  return (_req: Request, res: Response): void => {
    res.status(200).json({
      status: 'UP',
      timestamp: new Date().toISOString(),
      checks: {
        process: 'UP',
        llm: checks.llm ? 'CONFIGURED' : 'DISABLED',
        places: checks.places ? 'CONFIGURED' : 'DISABLED'
      }
    });
  };
}
