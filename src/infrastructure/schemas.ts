import { z } from 'zod';
import type { IndexMetadata, TranscriptChunk } from '../domain/entities/IndexMetadata';
import type { QueryRecord, SourceReference } from '../domain/entities/QueryRecord';
import type { Transcript } from '../domain/entities/Transcript';
import type { MeetingSummary } from '../domain/entities/MeetingSummary';
import type { MeetingInsights } from '../domain/entities/MeetingInsights';
import type { SearchResult } from '../domain/entities/SearchResult';

// Files on disk and HTTP payloads use snake_case; the domain uses camelCase.

export const transcriptChunkSchema = z.object({
  chunk_id: z.number().int().nonnegative(),
  text: z.string().min(1),
  embedding: z.array(z.number()),
});

export const indexMetadataSchema = z.object({
  meeting_id: z.string().min(1),
  project_id: z.string(),
  created_at: z.string(),
  num_chunks: z.number().int().nonnegative(),
  chunk_size_words: z.number().int().positive(),
  overlap_words: z.number().int().nonnegative(),
  embedding_model: z.string(),
  index_type: z.string(),
  dimension: z.number().int().nonnegative(),
  vectors: z.array(transcriptChunkSchema),
});

export const sourceReferenceSchema = z.object({
  chunk_id: z.number().int().nonnegative(),
  similarity_score: z.number(),
  text_preview: z.string(),
});

export const queryRecordSchema = z.object({
  meeting_id: z.string(),
  query: z.string(),
  answer: z.string(),
  sources: z.array(sourceReferenceSchema),
  timestamp: z.string(),
});

export const queryLogSchema = z.array(queryRecordSchema);

export const transcriptSchema = z.object({
  meeting_id: z.string(),
  project_id: z.string().optional(),
  created_at: z.string().optional(),
  transcript: z.string(),
  language: z.string().optional(),
});

export const meetingSummarySchema = z.object({
  meeting_id: z.string(),
  project_id: z.string(),
  created_at: z.string(),
  summary: z.string(),
});

export const importantMomentSchema = z.object({
  start_time: z.string(),
  end_time: z.string(),
  text: z.string(),
  description: z.string(),
});

export const meetingInsightsSchema = z.object({
  meeting_id: z.string(),
  project_id: z.string(),
  created_at: z.string(),
  insights: z.string(),
  important_moments: z.array(importantMomentSchema),
});

export type IndexMetadataJson = z.infer<typeof indexMetadataSchema>;
export type QueryRecordJson = z.infer<typeof queryRecordSchema>;
export type TranscriptJson = z.infer<typeof transcriptSchema>;
export type MeetingSummaryJson = z.infer<typeof meetingSummarySchema>;
export type MeetingInsightsJson = z.infer<typeof meetingInsightsSchema>;

export interface SearchResultJson {
  rank: number;
  chunk_id: number;
  text: string;
  similarity_score: number;
  distance: number;
}

function chunkToJson(chunk: TranscriptChunk): z.infer<typeof transcriptChunkSchema> {
  return { chunk_id: chunk.chunkId, text: chunk.text, embedding: chunk.embedding };
}

export function indexMetadataToJson(metadata: IndexMetadata): IndexMetadataJson {
  return {
    meeting_id: metadata.meetingId,
    project_id: metadata.projectId,
    created_at: metadata.createdAt,
    num_chunks: metadata.numChunks,
    chunk_size_words: metadata.chunkSizeWords,
    overlap_words: metadata.overlapWords,
    embedding_model: metadata.embeddingModel,
    index_type: metadata.indexType,
    dimension: metadata.dimension,
    vectors: metadata.vectors.map(chunkToJson),
  };
}

export function indexMetadataFromJson(json: IndexMetadataJson): IndexMetadata {
  return {
    meetingId: json.meeting_id,
    projectId: json.project_id,
    createdAt: json.created_at,
    numChunks: json.num_chunks,
    chunkSizeWords: json.chunk_size_words,
    overlapWords: json.overlap_words,
    embeddingModel: json.embedding_model,
    indexType: json.index_type,
    dimension: json.dimension,
    vectors: json.vectors.map((v) => ({ chunkId: v.chunk_id, text: v.text, embedding: v.embedding })),
  };
}

function sourceToJson(source: SourceReference): z.infer<typeof sourceReferenceSchema> {
  return {
    chunk_id: source.chunkId,
    similarity_score: source.similarityScore,
    text_preview: source.textPreview,
  };
}

export function queryRecordToJson(record: QueryRecord): QueryRecordJson {
  return {
    meeting_id: record.meetingId,
    query: record.query,
    answer: record.answer,
    sources: record.sources.map(sourceToJson),
    timestamp: record.timestamp,
  };
}

export function queryRecordFromJson(json: QueryRecordJson): QueryRecord {
  return {
    meetingId: json.meeting_id,
    query: json.query,
    answer: json.answer,
    sources: json.sources.map((s) => ({
      chunkId: s.chunk_id,
      similarityScore: s.similarity_score,
      textPreview: s.text_preview,
    })),
    timestamp: json.timestamp,
  };
}

export function transcriptToJson(transcript: Transcript): TranscriptJson {
  return {
    meeting_id: transcript.meetingId,
    project_id: transcript.projectId,
    created_at: transcript.createdAt,
    transcript: transcript.transcript,
    language: transcript.language,
  };
}

export function transcriptFromJson(json: TranscriptJson, defaultProjectId: string): Transcript {
  return {
    meetingId: json.meeting_id,
    projectId: json.project_id ?? defaultProjectId,
    createdAt: json.created_at ?? '',
    transcript: json.transcript,
    language: json.language,
  };
}

export function meetingSummaryToJson(summary: MeetingSummary): MeetingSummaryJson {
  return {
    meeting_id: summary.meetingId,
    project_id: summary.projectId,
    created_at: summary.createdAt,
    summary: summary.summary,
  };
}

export function meetingSummaryFromJson(json: MeetingSummaryJson): MeetingSummary {
  return {
    meetingId: json.meeting_id,
    projectId: json.project_id,
    createdAt: json.created_at,
    summary: json.summary,
  };
}

export function searchResultToJson(result: SearchResult): SearchResultJson {
  return {
    rank: result.rank,
    chunk_id: result.chunkId,
    text: result.text,
    similarity_score: result.similarityScore,
    distance: result.distance,
  };
}

export function meetingInsightsToJson(insights: MeetingInsights): MeetingInsightsJson {
  return {
    meeting_id: insights.meetingId,
    project_id: insights.projectId,
    created_at: insights.createdAt,
    insights: insights.insights,
    important_moments: insights.importantMoments.map((moment) => ({
      start_time: moment.startTime,
      end_time: moment.endTime,
      text: moment.text,
      description: moment.description,
    })),
  };
}

export function meetingInsightsFromJson(json: MeetingInsightsJson): MeetingInsights {
  return {
    meetingId: json.meeting_id,
    projectId: json.project_id,
    createdAt: json.created_at,
    insights: json.insights,
    importantMoments: json.important_moments.map((moment) => ({
      startTime: moment.start_time,
      endTime: moment.end_time,
      text: moment.text,
      description: moment.description,
    })),
  };
}
