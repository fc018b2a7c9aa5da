// File: src/web/routes.ts (relative to project root)
import express from 'express';
import type { Response } from 'express';
import type { HandlerResult } from './handlers';
import { handleEfficiency, handleImprove, handleOptimize, handleScenario, handleScenarioList } from './handlers';
import { ScenarioLibrary } from '../simulation/ScenarioLibrary';

function send<T>(res: Response, result: HandlerResult<T>): void {
  res.status(result.status).json(result.body);
}

export function createApiRouter(library: ScenarioLibrary = new ScenarioLibrary()): express.Router {
  const router = express.Router();
  router.use(express.json({ limit: '1mb' }));

  router.post('/efficiency', (req, res) => send(res, handleEfficiency(req.body)));
  router.post('/improve', (req, res) => send(res, handleImprove(req.body)));
  router.post('/optimize', (req, res) => send(res, handleOptimize(req.body)));

  router.get('/scenarios', (_req, res) => send(res, handleScenarioList(library)));
  router.get('/scenarios/:name', (req, res) => send(res, handleScenario(library, req.params.name)));

  return router;
}
