/**
 * @fileoverview LLM tools: reasoning and summarization through a narrow
 * client interface, with a deterministic heuristic fallback.
 *
 * @module explorer/tools/llm-tools
 * @version 0.1.0
 */

import { ActionKind } from '../types/core.types.js';
import type { LlmReasoningResult, LlmSummaryResult, ToolFunction } from '../types/tools.types.js';
import { toErrorMessage } from '../types/errors.js';
import { LlmReasoningParamsSchema, LlmSummaryParamsSchema } from './validation.js';

export interface ReasoningRequest {
  readonly context: string;
  readonly question: string;
  readonly agentType: string;
}

export interface SummaryRequest {
  readonly content: string;
  readonly summaryType: string;
  readonly focus: string;
}

export type ReasoningResponse = Omit<LlmReasoningResult, 'fallback'>;
export type SummaryResponse = Omit<LlmSummaryResult, 'fallback'>;

/**
 * Anything that can answer reasoning and summary requests.
 */
export interface LlmClient {
  reason(request: ReasoningRequest, signal?: AbortSignal): Promise<ReasoningResponse>;
  summarize(request: SummaryRequest, signal?: AbortSignal): Promise<SummaryResponse>;
}

/**
 * Offline client producing canned reasoning and an outline-based summary.
 */
export class HeuristicLlmClient implements LlmClient {
  async reason(request: ReasoningRequest): Promise<ReasoningResponse> {
    return {
      reasoning: `Based on the context, I should focus on ${request.question}`,
      confidence: 0.5,
      suggestedActions: [ActionKind.READ_FILE, ActionKind.SEARCH_FILES, ActionKind.ANALYZE_CODE],
    };
  }

  async summarize(request: SummaryRequest): Promise<SummaryResponse> {
    const lines = request.content
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0);

    const headings = lines
      .filter(line => line.startsWith('#'))
      .map(line => line.replace(/^#+\s*/, ''))
      .filter(line => line.length > 0);

    const keyPoints = (headings.length > 0 ? headings : lines).slice(0, 5);
    const lead = lines.find(line => !line.startsWith('#')) ?? 'no content';

    return {
      summary: `Summary of ${request.summaryType} (focus: ${request.focus}): ${lead}`,
      keyPoints,
      confidence: lines.length > 0 ? 0.5 : 0.1,
    };
  }
}

/**
 * Creates the LLM tools. Without a client, or when the client fails, the
 * heuristic client answers and the result is flagged as a fallback.
 */
export function createLlmTools(
  client: LlmClient | null,
  fallback: LlmClient = new HeuristicLlmClient(),
): Readonly<Partial<Record<ActionKind, ToolFunction>>> {
  const reasoning: ToolFunction<LlmReasoningResult> = async (params, context) => {
    const input = LlmReasoningParamsSchema.parse(params);
    if (client !== null) {
      try {
        return { ...(await client.reason(input, context.abortSignal)), fallback: false };
      } catch (error) {
        context.abortSignal.throwIfAborted();
        context.logger.warn('LLM reasoning failed, using fallback', { reason: toErrorMessage(error) });
      }
    }
    return { ...(await fallback.reason(input, context.abortSignal)), fallback: true };
  };

  const summary: ToolFunction<LlmSummaryResult> = async (params, context) => {
    const input = LlmSummaryParamsSchema.parse(params);
    if (client !== null) {
      try {
        return { ...(await client.summarize(input, context.abortSignal)), fallback: false };
      } catch (error) {
        context.abortSignal.throwIfAborted();
        context.logger.warn('LLM summary failed, using fallback', { reason: toErrorMessage(error) });
      }
    }
    return { ...(await fallback.summarize(input, context.abortSignal)), fallback: true };
  };

  return {
    [ActionKind.LLM_REASONING]: reasoning,
    [ActionKind.LLM_SUMMARY]: summary,
  };
}
