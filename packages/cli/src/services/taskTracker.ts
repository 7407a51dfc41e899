import type { TrackingResult } from '@minutes-pipeline/shared';
import type { ISnapshotSink, ISpeechClient, ITaskTracker } from '../domain/ports';
import {
  MissingTranscriptError,
  PipelineError,
  TrackingTimeoutError,
  TranscriptionFailedError,
  UnexpectedResponseError
} from '../domain/models';
import { formatFinalBlock, formatPollBlock } from './transcriptLog';

export interface TaskTrackerOptions {
  pollIntervalMs: number;
  /** Give up after this many recorded polls. Unset: poll until a terminal state. */
  maxPolls?: number;
  /** Give up once this much time has passed since the first query. */
  maxWaitMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export const DEFAULT_POLL_INTERVAL_MS = 15_000;

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Polls one speech task until it finishes or fails, appending every
 * observed snapshot to the sink in arrival order.
 * State lives only for the duration of one awaitCompletion call.
 */
export class TaskTracker implements ITaskTracker {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    private readonly statusQuery: Pick<ISpeechClient, 'getStatus'>,
    private readonly options: TaskTrackerOptions = { pollIntervalMs: DEFAULT_POLL_INTERVAL_MS }
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  public async awaitCompletion(taskId: string, sink: ISnapshotSink): Promise<TrackingResult> {
    let pollCount = 0;
    let remainingQuotaSeconds: number | undefined;
    const startedAt = this.now().getTime();

    const withQuota = <E extends PipelineError>(error: E): E => {
      error.remainingQuotaSeconds = remainingQuotaSeconds;
      return error;
    };

    console.log('⏳ Waiting for transcription to complete...');

    while (true) {
      const snapshot = await this.statusQuery.getStatus(taskId);

      if (snapshot.status === undefined) {
        throw withQuota(new UnexpectedResponseError(taskId, snapshot.raw ?? snapshot));
      }

      pollCount += 1;
      console.log(`📊 Task status: ${snapshot.status} (Poll #${pollCount})`);
      await sink.append(formatPollBlock(pollCount, snapshot, this.now()));

      if (snapshot.remaining_seconds !== undefined) {
        remainingQuotaSeconds = snapshot.remaining_seconds;
      }

      if (snapshot.status === 'failed') {
        throw withQuota(new TranscriptionFailedError(taskId, snapshot));
      }

      if (snapshot.status === 'finished') {
        if (snapshot.transcript === undefined) {
          throw withQuota(new MissingTranscriptError(taskId));
        }

        await sink.append(formatFinalBlock(snapshot.transcript));
        console.log('🎉 Transcription completed!');
        return { transcript: snapshot.transcript, remainingQuotaSeconds, pollCount };
      }

      const elapsedMs = this.now().getTime() - startedAt;
      if (
        (this.options.maxPolls !== undefined && pollCount >= this.options.maxPolls) ||
        (this.options.maxWaitMs !== undefined && elapsedMs >= this.options.maxWaitMs)
      ) {
        throw withQuota(new TrackingTimeoutError(taskId, pollCount, elapsedMs));
      }

      await this.sleep(this.options.pollIntervalMs);
    }
  }
}
