import { RiskAssessmentPipeline } from '../src/services/assessment';
import { renderDocument } from '../src/services/document';
import { DEFAULT_ASSESSMENT_INSTRUCTION } from '../src/config/assessment';
import { AssessmentServiceError, AssessmentServiceTimeoutError } from '../src/lib/errors';
import type {
  EvidenceChunk,
  GeneratedMessage,
  GenerationService,
  RunState,
  RunStepSummary
} from '../src/types/assessment';
import { makeRecord } from './helpers/records';

const article5: EvidenceChunk = { text: 'Article 5 prohibits certain practices.', score: 0.91, fileName: 'eu-ai-act.pdf' };
const annex3: EvidenceChunk = { text: 'Annex III lists high-risk systems.', score: 0.77, fileName: 'eu-ai-act.pdf' };
const article50: EvidenceChunk = { text: 'Article 50 sets transparency duties.', score: 0.64, fileName: 'eu-ai-act.pdf' };

class FakeGenerationService implements GenerationService {
  // first entry is returned by startRun, the rest by successive getRun calls
  statuses: string[] = ['completed'];
  steps: RunStepSummary[] = [];
  evidence: Record<string, EvidenceChunk[][]> = {};
  message: GeneratedMessage | null = { text: 'Minimal risk.', annotations: [] };
  cancelError: Error | null = null;
  getRunError: Error | null = null;

  userMessages: string[] = [];
  instructions: Array<string | undefined> = [];
  getRunCalls = 0;
  cancelled: string[] = [];
  evidenceRequests: string[] = [];

  async createThread() {
    return 'thread_1';
  }

  async addUserMessage(_threadId: string, content: string) {
    this.userMessages.push(content);
  }

  async startRun(_threadId: string, instructions?: string): Promise<RunState> {
    this.instructions.push(instructions);
    return { id: 'run_1', status: this.statuses[0] };
  }

  async getRun(): Promise<RunState> {
    this.getRunCalls++;
    if (this.getRunError) throw this.getRunError;
    const status = this.statuses[Math.min(this.getRunCalls, this.statuses.length - 1)];
    return { id: 'run_1', status, lastError: status === 'failed' ? 'rate_limit_exceeded' : undefined };
  }

  async cancelRun(_threadId: string, runId: string) {
    if (this.cancelError) throw this.cancelError;
    this.cancelled.push(runId);
  }

  async listRunSteps() {
    return this.steps;
  }

  async getRetrievedEvidence(_threadId: string, _runId: string, stepId: string) {
    this.evidenceRequests.push(stepId);
    return this.evidence[stepId] ?? [];
  }

  async getAssistantMessage() {
    return this.message;
  }
}

function pipelineFor(service: GenerationService, extra: Partial<{ maxPollAttempts: number; evidenceScope: 'first-call' | 'all-calls' }> = {}) {
  return new RiskAssessmentPipeline({ service, pollIntervalMs: 0, ...extra });
}

describe('RiskAssessmentPipeline.assess', () => {
  it('polls to completion and resolves citations against the retrieval step', async () => {
    const service = new FakeGenerationService();
    service.statuses = ['queued', 'in_progress', 'completed'];
    service.steps = [
      { id: 'step_search', fileSearchCallIds: ['call_1'] },
      { id: 'step_message', fileSearchCallIds: [] }
    ];
    service.evidence.step_search = [[article5, annex3]];
    service.message = {
      text: 'High risk【4:1†source】, not prohibited【4:0†source】【4:5†source】.',
      annotations: [
        { marker: '【4:1†source】', startIndex: 9, endIndex: 21 },
        { marker: '【4:0†source】', startIndex: 37, endIndex: 49 },
        { marker: '【4:5†source】', startIndex: 49, endIndex: 61 }
      ]
    };
    const record = makeRecord();

    const result = await pipelineFor(service).assess(record);

    expect(service.userMessages).toEqual([renderDocument(record)]);
    expect(service.instructions).toEqual([DEFAULT_ASSESSMENT_INSTRUCTION]);
    expect(service.getRunCalls).toBe(2);
    expect(service.evidenceRequests).toEqual(['step_search']);
    expect(result).toEqual({
      verdictText: 'High risk【4:1†source】, not prohibited【4:0†source】【4:5†source】.',
      citations: [
        { marker: '【4:1†source】', evidenceText: annex3.text, relevanceScore: 0.77, sourceName: 'eu-ai-act.pdf' },
        { marker: '【4:0†source】', evidenceText: article5.text, relevanceScore: 0.91, sourceName: 'eu-ai-act.pdf' }
      ]
    });
  });

  it('keeps polling a run that is still created', async () => {
    const service = new FakeGenerationService();
    service.statuses = ['created', 'queued', 'completed'];

    const result = await pipelineFor(service).assess(makeRecord());

    expect(result.verdictText).toBe('Minimal risk.');
    expect(service.getRunCalls).toBe(2);
  });

  it('cancels the run when polling itself fails', async () => {
    const service = new FakeGenerationService();
    service.statuses = ['queued'];
    service.getRunError = new Error('socket hang up');

    await expect(pipelineFor(service).assess(makeRecord())).rejects.toThrow('socket hang up');
    expect(service.getRunCalls).toBe(1);
    expect(service.cancelled).toEqual(['run_1']);
  });

  it('uses a configured instruction', async () => {
    const service = new FakeGenerationService();

    await new RiskAssessmentPipeline({ service, pollIntervalMs: 0, instruction: 'Answer with one tier.' }).assess(makeRecord());

    expect(service.instructions).toEqual(['Answer with one tier.']);
  });

  it('returns the verdict without citations when nothing was retrieved', async () => {
    const service = new FakeGenerationService();
    service.message = { text: 'Minimal risk【4:0†source】', annotations: [{ marker: '【4:0†source】', startIndex: 12, endIndex: 24 }] };

    const result = await pipelineFor(service).assess(makeRecord());

    expect(result).toEqual({ verdictText: 'Minimal risk【4:0†source】', citations: [] });
    expect(service.evidenceRequests).toEqual([]);
  });

  it('surfaces a failed run with its status', async () => {
    const service = new FakeGenerationService();
    service.statuses = ['queued', 'failed'];

    const err = await pipelineFor(service).assess(makeRecord()).catch((e) => e);

    expect(err).toBeInstanceOf(AssessmentServiceError);
    expect(err.status).toBe('failed');
    expect(err.message).toBe('assessment run ended with status failed: rate_limit_exceeded');
  });

  it.each(['cancelled', 'expired', 'incomplete', 'requires_action'])('treats %s as a failure terminal', async (status) => {
    const service = new FakeGenerationService();
    service.statuses = ['in_progress', status];

    await expect(pipelineFor(service).assess(makeRecord())).rejects.toMatchObject({ status });
  });

  it('fails when the run produced no assistant message', async () => {
    const service = new FakeGenerationService();
    service.message = null;

    await expect(pipelineFor(service).assess(makeRecord())).rejects.toMatchObject({
      code: 'assessment_service_error',
      status: 'no_assistant_message'
    });
  });

  it('stops polling at the limit and cancels the run', async () => {
    const service = new FakeGenerationService();
    service.statuses = ['queued'];

    const err = await pipelineFor(service, { maxPollAttempts: 3 }).assess(makeRecord()).catch((e) => e);

    expect(err).toBeInstanceOf(AssessmentServiceTimeoutError);
    expect(err.attempts).toBe(3);
    expect(err.lastStatus).toBe('queued');
    expect(service.getRunCalls).toBe(3);
    expect(service.cancelled).toEqual(['run_1']);
  });

  it('still reports the timeout when cancellation fails', async () => {
    const service = new FakeGenerationService();
    service.statuses = ['in_progress'];
    service.cancelError = new Error('network down');

    await expect(pipelineFor(service, { maxPollAttempts: 1 }).assess(makeRecord())).rejects.toBeInstanceOf(
      AssessmentServiceTimeoutError
    );
  });

  describe('evidence scope', () => {
    function multiCallService() {
      const service = new FakeGenerationService();
      service.steps = [
        { id: 'step_a', fileSearchCallIds: ['call_1', 'call_2'] },
        { id: 'step_b', fileSearchCallIds: ['call_3'] }
      ];
      service.evidence.step_a = [[article5], [annex3]];
      service.evidence.step_b = [[article50]];
      service.message = {
        text: 'Limited risk【7:2†source】',
        annotations: [{ marker: '【7:2†source】', startIndex: 12, endIndex: 24 }]
      };
      return service;
    }

    it('first-call only indexes the first retrieval call', async () => {
      const service = multiCallService();

      const result = await pipelineFor(service).assess(makeRecord());

      expect(result.citations).toEqual([]);
      expect(service.evidenceRequests).toEqual(['step_a']);
    });

    it('all-calls concatenates chunk lists in call order', async () => {
      const service = multiCallService();

      const result = await pipelineFor(service, { evidenceScope: 'all-calls' }).assess(makeRecord());

      expect(result.citations).toEqual([
        { marker: '【7:2†source】', evidenceText: article50.text, relevanceScore: 0.64, sourceName: 'eu-ai-act.pdf' }
      ]);
      expect(service.evidenceRequests).toEqual(['step_a', 'step_b']);
    });
  });
});
