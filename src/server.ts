import type { Server } from 'http';
import createApp, { AppDeps } from './app';
import { config } from './config';
import { logger } from './lib/logger';
import { GitHubClient } from './services/github';
import { RepositoryProfiler } from './services/profiler';
import { RiskAssessmentPipeline } from './services/assessment';
import { OpenAIAssistantService } from './services/assistant';
import { ChatRiskAssessor, createOpenAIClient } from './services/llm';

function buildDeps(): AppDeps {
  const profiler = new RepositoryProfiler({
    client: new GitHubClient({ token: config.githubToken, baseUrl: config.githubApiUrl }),
    readmeExcerptLength: config.readmeExcerptLength,
    manifestPath: config.manifestPath,
    ciConfigPath: config.ciConfigPath
  });

  if (!config.openaiApiKey) {
    logger.warn('OPENAI_API_KEY not set, assessment disabled');
    return { profiler, assessmentMode: 'disabled' };
  }

  const client = createOpenAIClient({
    apiKey: config.openaiApiKey,
    maxRetries: config.openaiMaxRetries,
    timeoutMs: config.openaiTimeoutMs
  });

  if (config.openaiAssistantId) {
    const assessor = new RiskAssessmentPipeline({
      service: new OpenAIAssistantService(client, config.openaiAssistantId),
      instruction: config.assessmentInstruction,
      pollIntervalMs: config.runPollIntervalMs,
      maxPollAttempts: config.runMaxPollAttempts,
      evidenceScope: config.evidenceScope
    });
    return { profiler, assessor, assessmentMode: 'assistant' };
  }

  logger.info({ model: config.openaiModel }, 'OPENAI_ASSISTANT_ID not set, using chat completions without citations');
  return {
    profiler,
    assessor: new ChatRiskAssessor({ client, model: config.openaiModel }),
    assessmentMode: 'chat'
  };
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

async function main() {
  const deps = buildDeps();
  const app = createApp(deps);
  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, assessmentMode: deps.assessmentMode }, 'server listening');
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down');
    closeServer(server).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'error during shutdown');
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'unhandledRejection');
  });
}

main().catch((err) => {
  logger.error({ err }, 'failed to start');
  process.exit(1);
});
