import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import type { EvidenceScope } from '../types/assessment';

// working directory wins over the project root
const ENV_FILES = [path.resolve(process.cwd(), '.env'), path.resolve(__dirname, '../../.env')];
const envFile = ENV_FILES.find((candidate) => fs.existsSync(candidate));
dotenv.config(envFile ? { path: envFile } : undefined);

/** Non-negative integers only; anything else keeps the default. */
function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

function evidenceScopeFromEnv(): EvidenceScope {
  return process.env.EVIDENCE_SCOPE === 'all-calls' ? 'all-calls' : 'first-call';
}

export const config = {
  port: intFromEnv('PORT', 4000),
  githubToken: process.env.GITHUB_TOKEN || undefined,
  githubApiUrl: process.env.GITHUB_API_URL || 'https://api.github.com',
  openaiApiKey: process.env.OPENAI_API_KEY || undefined,
  // chat model used when no assistant is configured
  openaiModel: process.env.OPENAI_MODEL || 'gpt-4o',
  openaiAssistantId: process.env.OPENAI_ASSISTANT_ID || undefined,
  openaiMaxRetries: intFromEnv('OPENAI_MAX_RETRIES', 2),
  openaiTimeoutMs: intFromEnv('OPENAI_TIMEOUT_MS', 30000),
  readmeExcerptLength: intFromEnv('README_EXCERPT_LENGTH', 500),
  manifestPath: process.env.MANIFEST_PATH || 'requirements.txt',
  ciConfigPath: process.env.CI_CONFIG_PATH || '.github/workflows',
  runPollIntervalMs: intFromEnv('RUN_POLL_INTERVAL_MS', 1000),
  runMaxPollAttempts: intFromEnv('RUN_MAX_POLL_ATTEMPTS', 120),
  evidenceScope: evidenceScopeFromEnv(),
  assessmentInstruction: process.env.ASSESSMENT_INSTRUCTION || undefined
};

export type AppConfig = typeof config;
