import type OpenAI from 'openai';
import type {
  CitationAnnotation,
  EvidenceChunk,
  GeneratedMessage,
  GenerationService,
  RunState,
  RunStepSummary
} from '../types/assessment';

// run step listings omit chunk bodies unless asked for them
const FILE_SEARCH_CONTENT = 'step_details.tool_calls[*].file_search.results[*].content' as const;

/** Assistants API (threads, runs, run steps) behind the GenerationService port. */
export class OpenAIAssistantService implements GenerationService {
  constructor(private readonly client: OpenAI, private readonly assistantId: string) {}

  async createThread(): Promise<string> {
    const thread = await this.client.beta.threads.create();
    return thread.id;
  }

  async addUserMessage(threadId: string, content: string): Promise<void> {
    await this.client.beta.threads.messages.create(threadId, { role: 'user', content });
  }

  async startRun(threadId: string, instructions?: string): Promise<RunState> {
    const run = await this.client.beta.threads.runs.create(threadId, {
      assistant_id: this.assistantId,
      ...(instructions ? { additional_instructions: instructions } : {})
    });
    return { id: run.id, status: run.status, lastError: run.last_error?.message };
  }

  async getRun(threadId: string, runId: string): Promise<RunState> {
    const run = await this.client.beta.threads.runs.retrieve(threadId, runId);
    return { id: run.id, status: run.status, lastError: run.last_error?.message };
  }

  async cancelRun(threadId: string, runId: string): Promise<void> {
    await this.client.beta.threads.runs.cancel(threadId, runId);
  }

  async listRunSteps(threadId: string, runId: string): Promise<RunStepSummary[]> {
    const page = await this.client.beta.threads.runs.steps.list(threadId, runId, { order: 'asc', limit: 100 });
    return page.data.map((step) => ({
      id: step.id,
      fileSearchCallIds:
        step.step_details.type === 'tool_calls'
          ? step.step_details.tool_calls.filter((call) => call.type === 'file_search').map((call) => call.id)
          : []
    }));
  }

  async getRetrievedEvidence(threadId: string, runId: string, stepId: string): Promise<EvidenceChunk[][]> {
    const step = await this.client.beta.threads.runs.steps.retrieve(threadId, runId, stepId, {
      include: [FILE_SEARCH_CONTENT]
    });
    if (step.step_details.type !== 'tool_calls') return [];
    const perCall: EvidenceChunk[][] = [];
    for (const call of step.step_details.tool_calls) {
      if (call.type !== 'file_search') continue;
      perCall.push(
        (call.file_search.results ?? []).map((result) => ({
          text: (result.content ?? []).map((c) => c.text ?? '').join('\n'),
          score: result.score,
          fileName: result.file_name
        }))
      );
    }
    return perCall;
  }

  async getAssistantMessage(threadId: string, runId: string): Promise<GeneratedMessage | null> {
    const page = await this.client.beta.threads.messages.list(threadId, { run_id: runId, order: 'desc' });
    const message = page.data.find((m) => m.role === 'assistant');
    if (!message) return null;

    let text = '';
    const annotations: CitationAnnotation[] = [];
    for (const block of message.content) {
      if (block.type !== 'text') continue;
      const offset = text.length;
      text += block.text.value;
      for (const a of block.text.annotations) {
        if (a.type !== 'file_citation') continue;
        annotations.push({ marker: a.text, startIndex: a.start_index + offset, endIndex: a.end_index + offset });
      }
    }
    return { text, annotations };
  }
}

export default OpenAIAssistantService;
