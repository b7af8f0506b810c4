import type { Express } from 'express';
import { HEALTH_ROUTE, RESOURCE_ROUTE, type HealthResponse } from '@chart-relay/api-contracts';
import { createResourceController } from '../controllers/resource/resourceController.js';
import { isShuttingDown } from '../server/shutdown.js';
import type { ResourceStore } from '../storage/index.js';

export type RouteDeps = {
  store: ResourceStore;
  contentType: string | null;
};

export function setupRoutes(app: Express, deps: RouteDeps) {
  app.get(HEALTH_ROUTE, (_req, res) => {
    // Lets the load balancer stop routing here while connections drain.
    if (isShuttingDown()) {
      const body: HealthResponse = { status: 'shutting_down' };
      res.status(503).set('Connection', 'close').json(body);
      return;
    }
    const body: HealthResponse = { status: 'ok' };
    res.json(body);
  });

  const resourceController = createResourceController(deps);
  // Express also answers HEAD through this handler.
  app.get(RESOURCE_ROUTE, resourceController.getResource);
}
