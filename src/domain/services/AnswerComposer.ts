import type { ChatProvider } from './AIProvider';
import type { Retriever } from './Retriever';
import type { QueryLogRepository } from '../repositories/QueryLogRepository';
import type { SearchResult } from '../entities/SearchResult';
import { createQueryRecord, makeTextPreview, type QueryRecord } from '../entities/QueryRecord';
import { ValidationError } from '../errors';
import { log } from '../../utils/logger';

export const INSUFFICIENT_INFORMATION_ANSWER =
  "I don't have enough information to answer this question based on the meeting content.";

const EVIDENCE_K = 5;
const CONTEXT_CHUNKS = 3;

const SYSTEM_PROMPT = `You are an assistant that answers questions about meeting content.
Use only the numbered meeting transcript excerpts provided by the user to answer the question.
If the answer is not contained in the excerpts, say that you don't have enough information to answer.
Be specific and refer to the excerpts you rely on by their number, for example [1] or [2].`;

export function buildExcerptBlock(evidence: SearchResult[]): string {
  return evidence
    .map((result, i) => `[${i + 1}] (chunk ${result.chunkId})\n${result.text}`)
    .join('\n\n---\n\n');
}

export function buildUserPrompt(query: string, evidence: SearchResult[]): string {
  return `Question: ${query}\n\nMeeting transcript excerpts:\n\n${buildExcerptBlock(evidence)}`;
}

export class AnswerComposer {
  constructor(
    private retriever: Retriever,
    private chat: ChatProvider,
    private queryLog: QueryLogRepository
  ) {}

  async answer(meetingId: string, query: string): Promise<QueryRecord> {
    if (!query.trim()) {
      throw new ValidationError('Query must not be empty');
    }

    log('info', 'Answering question', { meetingId, query });

    const evidence = await this.retriever.retrieve(meetingId, query, EVIDENCE_K);

    let record: QueryRecord;
    if (evidence.length === 0) {
      log('warn', 'No relevant chunks found for query', { meetingId });
      record = createQueryRecord(meetingId, query, INSUFFICIENT_INFORMATION_ANSWER, []);
    } else {
      const context = evidence.slice(0, CONTEXT_CHUNKS);
      const response = await this.chat.complete({
        systemPrompt: SYSTEM_PROMPT,
        userPrompt: buildUserPrompt(query, context),
        temperature: 0.2,
        maxTokens: 800,
      });

      log('info', 'Answer generated', {
        meetingId,
        sources: context.length,
        tokensUsed: response.metadata.totalTokens,
        responseTimeMs: Math.round(response.metadata.responseTimeMs),
      });

      record = createQueryRecord(
        meetingId,
        query,
        response.content,
        context.map((result) => ({
          chunkId: result.chunkId,
          similarityScore: result.similarityScore,
          textPreview: makeTextPreview(result.text),
        }))
      );
    }

    await this.queryLog.append(meetingId, record);
    return record;
  }

  async history(meetingId: string): Promise<QueryRecord[]> {
    return this.queryLog.list(meetingId);
  }
}
