import express from 'express';
import type { Response } from 'express';
import { assessSchema, AssessInput } from '../validators/assessSchema';
import { AppError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { RepositoryProfiler } from '../services/profiler';
import type { RiskAssessor } from '../types/assessment';
import { formatReport } from '../services/report';

export type AssessRouteDeps = {
  profiler: Pick<RepositoryProfiler, 'profile'>;
  // absent when no model credentials are configured
  assessor?: RiskAssessor;
};

export function sendError(res: Response, err: unknown, context: string) {
  if (err instanceof AppError) {
    logger.warn({ err }, `${context} failed`);
    return res.status(err.statusCode).json({ error: err.code, message: err.message });
  }
  logger.error({ err }, `${context} error`);
  return res.status(500).json({ error: 'internal_error' });
}

export function createAssessRouter(deps: AssessRouteDeps) {
  const router = express.Router();

  router.post('/profile', async (req, res) => {
    const parsed = assessSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.errors });
    const input: AssessInput = parsed.data;
    try {
      const metadata = await deps.profiler.profile(input.repoUrl);
      return res.json({ metadata });
    } catch (err) {
      return sendError(res, err, 'profile route');
    }
  });

  router.post('/assess', async (req, res) => {
    const parsed = assessSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.errors });
    if (!deps.assessor) return res.status(503).json({ error: 'assessment_unavailable' });
    const input: AssessInput = parsed.data;
    try {
      const metadata = await deps.profiler.profile(input.repoUrl);
      const result = await deps.assessor.assess(metadata);
      const report = formatReport(result);
      return res.json({
        metadata,
        assessment: {
          verdictText: result.verdictText,
          citations: result.citations,
          displayCitations: report.sources,
          report: report.text
        }
      });
    } catch (err) {
      return sendError(res, err, 'assess route');
    }
  });

  return router;
}

export default createAssessRouter;
