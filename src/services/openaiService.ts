/**
 * OpenAI Assistants integration: threads, runs and tool outputs
 */

import OpenAI from 'openai';
import { LlmProvider, ProviderRunStatus, RunSnapshot, ToolCall, ToolOutput } from '../types/core';
import type { FunctionDefinition } from '../tools/registry';
import { classifyProviderError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('openai');

export interface OpenAIServiceOptions {
  apiKey: string;
  assistantId: string;
  instructions?: string;
}

export class OpenAIService implements LlmProvider {
  private client: OpenAI;
  private readonly assistantId: string;
  private readonly instructions?: string;

  constructor(options: OpenAIServiceOptions, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey: options.apiKey });
    this.assistantId = options.assistantId;
    this.instructions = options.instructions;
  }

  async createThread(): Promise<string> {
    const thread = await this.call('create thread', () => this.client.beta.threads.create());
    return thread.id;
  }

  async appendMessage(threadId: string, text: string): Promise<void> {
    await this.call('append message', () =>
      this.client.beta.threads.messages.create(threadId, { role: 'user', content: text })
    );
  }

  async createRun(threadId: string): Promise<string> {
    const run = await this.call('create run', () =>
      this.client.beta.threads.runs.create(threadId, {
        assistant_id: this.assistantId,
        ...(this.instructions ? { additional_instructions: this.instructions } : {})
      })
    );
    return run.id;
  }

  async getRunStatus(threadId: string, runId: string): Promise<RunSnapshot> {
    const run = await this.call('retrieve run', () => this.client.beta.threads.runs.retrieve(threadId, runId));

    const toolCalls = run.required_action?.submit_tool_outputs.tool_calls ?? [];
    return {
      runId: run.id,
      threadId,
      status: mapRunStatus(run.status),
      requestedToolCalls: toolCalls.map((call): ToolCall => ({
        callId: call.id,
        functionName: call.function.name,
        arguments: parseArguments(call.function.arguments)
      })),
      lastError: run.last_error ? `${run.last_error.code}: ${run.last_error.message}` : undefined
    };
  }

  async submitToolOutputs(threadId: string, runId: string, outputs: ToolOutput[]): Promise<void> {
    await this.call('submit tool outputs', () =>
      this.client.beta.threads.runs.submitToolOutputs(threadId, runId, {
        tool_outputs: outputs.map(output => ({ tool_call_id: output.callId, output: output.outputText }))
      })
    );
  }

  async getLatestAssistantMessage(threadId: string): Promise<string | null> {
    const page = await this.call('list messages', () =>
      this.client.beta.threads.messages.list(threadId, { order: 'desc', limit: 10 })
    );

    const latest = page.data.find(message => message.role === 'assistant');
    if (!latest) return null;

    const text = latest.content
      .map(part => (part.type === 'text' ? part.text.value : ''))
      .join('\n')
      .trim();
    return text || null;
  }

  /**
   * Push the registry's function definitions onto the configured assistant
   */
  async syncTools(definitions: FunctionDefinition[]): Promise<void> {
    await this.call('update assistant', () =>
      this.client.beta.assistants.update(this.assistantId, {
        tools: definitions.map(definition => ({ type: 'function' as const, function: definition }))
      })
    );
    log.info({ count: definitions.length }, 'Assistant tool definitions updated');
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const classified = classifyProviderError(error, `OpenAI ${operation}`);
      log.error({ err: error, operation, code: classified.code }, 'OpenAI request failed');
      throw classified;
    }
  }
}

export function mapRunStatus(status: string): ProviderRunStatus {
  switch (status) {
    case 'queued':
    case 'in_progress':
    case 'requires_action':
    case 'completed':
    case 'failed':
    case 'cancelled':
      return status;
    case 'cancelling':
      return 'in_progress';
    default:
      // expired, incomplete and anything newer
      return 'failed';
  }
}

function parseArguments(raw: string): unknown {
  if (!raw.trim()) return {};
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
