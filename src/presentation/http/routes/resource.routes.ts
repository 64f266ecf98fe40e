import { Router } from 'express';
import type { ResourceController } from '../controllers/ResourceController';

/**
 * Creates and configures resource routes
 */
export function createResourceRoutes(resourceController: ResourceController): Router {
  const router = Router();

  // Health check
  router.get('/health', (_req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  // List a range of resources
  router.get('/resources', (req, res, next) => {
    resourceController.list(req, res).catch(next);
  });

  // Add resource endpoint
  router.post('/resources', (req, res, next) => {
    resourceController.add(req, res).catch(next);
  });

  // Remove resource endpoint
  router.delete('/resources/:id', (req, res, next) => {
    resourceController.remove(req, res).catch(next);
  });

  return router;
}
