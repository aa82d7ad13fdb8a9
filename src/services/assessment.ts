import { logger as rootLogger, Logger } from '../lib/logger';
import { AssessmentServiceError, AssessmentServiceTimeoutError } from '../lib/errors';
import { DEFAULT_ASSESSMENT_INSTRUCTION } from '../config/assessment';
import type {
  AssessmentResult,
  EvidenceChunk,
  EvidenceScope,
  GenerationService,
  RiskAssessor,
  RunState
} from '../types/assessment';
import type { MetadataRecord } from '../types/repository';
import { renderDocument } from './document';
import { extractCitations } from './citations';

const PENDING_STATUSES = new Set(['created', 'queued', 'in_progress', 'cancelling']);

export type RiskAssessmentPipelineOptions = {
  service: GenerationService;
  instruction?: string;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
  evidenceScope?: EvidenceScope;
  logger?: Logger;
};

export class RiskAssessmentPipeline implements RiskAssessor {
  private readonly service: GenerationService;
  private readonly instruction: string;
  private readonly pollIntervalMs: number;
  private readonly maxPollAttempts: number;
  private readonly evidenceScope: EvidenceScope;
  private readonly logger: Logger;

  constructor(opts: RiskAssessmentPipelineOptions) {
    this.service = opts.service;
    this.instruction = opts.instruction ?? DEFAULT_ASSESSMENT_INSTRUCTION;
    this.pollIntervalMs = opts.pollIntervalMs ?? 1000;
    this.maxPollAttempts = Math.max(1, opts.maxPollAttempts ?? 120);
    this.evidenceScope = opts.evidenceScope ?? 'first-call';
    this.logger = opts.logger ?? rootLogger;
  }

  async assess(record: MetadataRecord): Promise<AssessmentResult> {
    const log = this.logger.child({ repository: record.repository });
    const document = renderDocument(record);
    if (process.env.NODE_ENV !== 'production') {
      log.debug({ documentPreview: document.slice(0, 500) }, 'assessment document');
    }

    const threadId = await this.service.createThread();
    await this.service.addUserMessage(threadId, document);
    const started = await this.service.startRun(threadId, this.instruction);
    log.info({ threadId, runId: started.id }, 'assessment run started');

    const run = await this.waitForRun(threadId, started, log);
    if (run.status !== 'completed') {
      throw new AssessmentServiceError(run.status, run.lastError);
    }

    const chunks = await this.collectEvidence(threadId, run.id);
    const message = await this.service.getAssistantMessage(threadId, run.id);
    if (!message) throw new AssessmentServiceError('no_assistant_message');

    const citations = extractCitations(message.annotations, chunks);
    const dropped = message.annotations.length - citations.length;
    if (dropped > 0) log.debug({ dropped }, 'skipped unresolvable citation markers');
    log.info({ runId: run.id, citations: citations.length }, 'assessment completed');
    return { verdictText: message.text, citations };
  }

  private async waitForRun(threadId: string, started: RunState, log: Logger): Promise<RunState> {
    let run = started;
    for (let attempt = 1; PENDING_STATUSES.has(run.status); attempt++) {
      if (attempt > this.maxPollAttempts) {
        await this.cancelQuietly(threadId, run.id, log);
        throw new AssessmentServiceTimeoutError(this.maxPollAttempts, run.status);
      }
      await new Promise((r) => setTimeout(r, this.pollIntervalMs));
      try {
        run = await this.service.getRun(threadId, run.id);
      } catch (err) {
        // the run may still be going; don't leave it behind
        await this.cancelQuietly(threadId, run.id, log);
        throw err;
      }
    }
    return run;
  }

  private async cancelQuietly(threadId: string, runId: string, log: Logger) {
    try {
      await this.service.cancelRun(threadId, runId);
      log.warn({ threadId, runId }, 'assessment run abandoned, cancellation requested');
    } catch (err) {
      log.warn({ err, threadId, runId }, 'could not cancel abandoned assessment run');
    }
  }

  private async collectEvidence(threadId: string, runId: string): Promise<EvidenceChunk[]> {
    const steps = (await this.service.listRunSteps(threadId, runId)).filter((s) => s.fileSearchCallIds.length > 0);
    if (!steps.length) return [];
    if (this.evidenceScope === 'first-call') {
      const perCall = await this.service.getRetrievedEvidence(threadId, runId, steps[0].id);
      return perCall[0] ?? [];
    }
    const chunks: EvidenceChunk[] = [];
    for (const step of steps) {
      const perCall = await this.service.getRetrievedEvidence(threadId, runId, step.id);
      for (const callChunks of perCall) chunks.push(...callChunks);
    }
    return chunks;
  }
}

export default RiskAssessmentPipeline;
