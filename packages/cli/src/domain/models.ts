import type { StatusResponse } from '@minutes-pipeline/shared';

export class PipelineError extends Error {
    // Last quota the tracker saw before giving up, if any
    public remainingQuotaSeconds?: number;

    constructor(message: string) {
        super(message);
        this.name = 'PipelineError';
    }
}

// Submission rejected by the speech service (non-2xx, or no task id in the reply)
export class UploadFailedError extends PipelineError {
    constructor(
        message: string,
        public readonly statusCode?: number,
        public readonly body?: unknown
    ) {
        super(message);
        this.name = 'UploadFailedError';
    }
}

export class TranscriptionFailedError extends PipelineError {
    public readonly body: unknown;

    constructor(
        public readonly taskId: string,
        public readonly snapshot: StatusResponse
    ) {
        const body = snapshot.raw ?? snapshot;
        super(`Transcription failed: ${JSON.stringify(body)}`);
        this.name = 'TranscriptionFailedError';
        this.body = body;
    }
}

export class UnexpectedResponseError extends PipelineError {
    constructor(
        public readonly taskId: string,
        public readonly body: unknown
    ) {
        super(`Unexpected response format for task ${taskId}`);
        this.name = 'UnexpectedResponseError';
    }
}

export class MissingTranscriptError extends PipelineError {
    constructor(public readonly taskId: string) {
        super(`No transcript found in final results for task ${taskId}`);
        this.name = 'MissingTranscriptError';
    }
}

export class TrackingTimeoutError extends PipelineError {
    constructor(
        public readonly taskId: string,
        public readonly pollCount: number,
        public readonly elapsedMs: number
    ) {
        super(`Task ${taskId} still unfinished after ${pollCount} polls (${Math.round(elapsedMs / 1000)}s)`);
        this.name = 'TrackingTimeoutError';
    }
}

export class ServiceError extends Error {
    constructor(
        message: string,
        public readonly isTransient: boolean, // true for ECONNREFUSED/ECONNRESET/5xx, false for 4xx (bad key, unknown task)
        public readonly statusCode?: number
    ) {
        super(message);
        this.name = 'ServiceError';
    }
}

export interface Recording {
    filePath: string;
    fileName: string;
    baseName: string; // file name without extension
}
