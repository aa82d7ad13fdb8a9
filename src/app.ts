import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import { createAssessRouter, AssessRouteDeps, sendError } from './routes/assess';

export type AppDeps = AssessRouteDeps & {
  assessmentMode: 'assistant' | 'chat' | 'disabled';
};

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp(deps: AppDeps) {
  const app = express();
  app.use(bodyParser.json({ limit: '1mb' }));

  app.use('/api', createAssessRouter(deps));

  app.get('/health', (req, res) => {
    res.json({ ok: true, assessmentMode: deps.assessmentMode });
  });

  // error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) return res.status(400).json({ error: 'invalid_json' });
    return sendError(res, err, 'request');
  });

  return app;
}

export default createApp;
