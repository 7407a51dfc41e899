import type { RecordingRecord, RecordingStatus, StatusResponse, TrackingResult, UploadOptions } from '@minutes-pipeline/shared';

export interface ISpeechClient {
  /**
   * Uploads a recording and returns the task id issued by the speech service.
   * Throws UploadFailedError on a rejected submission.
   */
  submit(filePath: string, options: UploadOptions): Promise<string>;

  /**
   * Queries the current state of a submitted task. The parsed response keeps
   * the body as received in `raw`. Request failures are thrown as
   * ServiceError; nothing here retries.
   */
  getStatus(taskId: string): Promise<StatusResponse>;
}

/** Append-only destination for poll snapshots. Single writer. */
export interface ISnapshotSink {
  append(text: string): Promise<void>;
}

export interface IResultStore extends ISnapshotSink {
  readonly path: string;
  open(title: string): Promise<void>;
}

export interface ITaskTracker {
  awaitCompletion(taskId: string, sink: ISnapshotSink): Promise<TrackingResult>;
}

export interface ISummaryGenerator {
  summarize(transcript: string): Promise<string>;
}

export interface IDocumentRenderer {
  transcriptPathFor(baseName: string): string;
  renderTranscript(sourceName: string, transcript: string, transcriptLogPath?: string): Promise<string>;
  renderSummary(sourceName: string, summary: string): Promise<string>;
}

export interface IRunLedger {
  startRecording(filePath: string): Promise<RecordingRecord>;
  setTaskId(id: string, taskId: string, transcriptLogPath: string): Promise<void>;
  updateStatus(id: string, status: RecordingStatus): Promise<void>;
  setRemainingSeconds(id: string, remainingSeconds: number): Promise<void>;
  setError(id: string, errorMsg: string): Promise<void>;
  markCompleted(id: string): Promise<void>;
  getAll(): Promise<RecordingRecord[]>;
  getFailed(): Promise<RecordingRecord[]>;
}

export interface IFileManager {
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
  appendFile(filePath: string, content: string): Promise<void>;
  fileExists(filePath: string): Promise<boolean>;
  listFiles(dirPath: string): Promise<string[]>;
  moveFile(fromPath: string, toPath: string): Promise<void>;
  joinPaths(...parts: string[]): string;
}
