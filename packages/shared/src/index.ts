export type KnownTaskStatus = 'queued' | 'processing' | 'finished' | 'failed';

// The remote service owns the vocabulary; unknown values mean "still processing".
export type TaskStatus = KnownTaskStatus | (string & {});

export enum SpeechLanguage {
  ENGLISH_US = 'en-US',
  ENGLISH_GB = 'en-GB',
  PORTUGUESE_BR = 'pt-BR',
  SPANISH = 'es-ES'
}

export interface WordTimeOffset {
  start_time?: number;
  end_time?: number;
  word?: string;
  confidence?: number;
}

export type SpeakerRecord = Record<string, unknown>;

/**
 * One status response from the speech service, already lifted out of its wire envelope.
 * Every field is optional: the service only fills what it has at that moment.
 */
export interface StatusResponse {
  status?: TaskStatus;
  transcript?: string;
  word_time_offsets?: WordTimeOffset[];
  speakers?: SpeakerRecord[];
  summary?: string;
  remaining_seconds?: number;
  error?: string;
  raw?: unknown; // body as received, kept for diagnostics
}

export interface TrackingResult {
  transcript: string;
  remainingQuotaSeconds?: number;
  pollCount: number;
}

export interface UploadOptions {
  language: SpeechLanguage | string;
  punctuation: boolean;
  speakers: boolean;
  summary: boolean;
  summarySize: number; // percent of the transcript
}

export type RecordingStatus = 'SUBMITTING' | 'TRANSCRIBING' | 'SUMMARIZING' | 'COMPLETED' | 'FAILED';

// One processed recording as kept in the run ledger
export interface RecordingRecord {
  id: string;
  fileName: string;
  filePath: string;
  status: RecordingStatus;
  createdAt: string; // ISO format
  updatedAt: string;
  taskId?: string;
  transcriptLogPath?: string;
  remainingSeconds?: number;
  error?: string;
}

export interface BatchReport {
  found: number;
  processed: number;
  succeeded: number;
  failed: number;
  remainingMinutes?: number;
}
