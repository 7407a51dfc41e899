import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import path from 'path';
import { randomUUID } from 'crypto';
import type { RecordingRecord, RecordingStatus } from '@minutes-pipeline/shared';
import type { IRunLedger } from '../domain/ports';

interface LedgerSchema {
  recordings: RecordingRecord[];
}

/**
 * History of processed recordings. Write-only bookkeeping for the batch
 * driver; a tracked task is never resumed from here.
 */
export class RunLedger implements IRunLedger {
  private db: Low<LedgerSchema>;
  private ready: Promise<void>;

  constructor(dbPath: string) {
    const adapter = new JSONFile<LedgerSchema>(dbPath);
    this.db = new Low(adapter, { recordings: [] });
    this.ready = this.init();
  }

  private async init(): Promise<void> {
    await this.db.read();
    this.db.data ||= { recordings: [] };
  }

  public async startRecording(filePath: string): Promise<RecordingRecord> {
    await this.ready;
    const now = new Date().toISOString();
    const record: RecordingRecord = {
      id: randomUUID(),
      fileName: path.basename(filePath),
      filePath,
      status: 'SUBMITTING',
      createdAt: now,
      updatedAt: now
    };

    this.db.data.recordings.push(record);
    await this.db.write();
    return record;
  }

  public async setTaskId(id: string, taskId: string, transcriptLogPath: string): Promise<void> {
    await this.update(id, record => {
      record.taskId = taskId;
      record.transcriptLogPath = transcriptLogPath;
      record.status = 'TRANSCRIBING';
    });
  }

  public async updateStatus(id: string, status: RecordingStatus): Promise<void> {
    await this.update(id, record => {
      record.status = status;
    });
  }

  public async setRemainingSeconds(id: string, remainingSeconds: number): Promise<void> {
    await this.update(id, record => {
      record.remainingSeconds = remainingSeconds;
    });
  }

  public async setError(id: string, errorMsg: string): Promise<void> {
    await this.update(id, record => {
      record.status = 'FAILED';
      record.error = errorMsg;
    });
  }

  public async markCompleted(id: string): Promise<void> {
    await this.update(id, record => {
      record.status = 'COMPLETED';
      record.error = undefined;
    });
  }

  public async getAll(): Promise<RecordingRecord[]> {
    await this.ready;
    return [...this.db.data.recordings].sort((a, b) =>
      new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime()
    );
  }

  public async getFailed(): Promise<RecordingRecord[]> {
    const all = await this.getAll();
    return all.filter(r => r.status === 'FAILED');
  }

  private async update(id: string, apply: (record: RecordingRecord) => void): Promise<void> {
    await this.ready;
    const record = this.db.data.recordings.find(r => r.id === id);
    if (record) {
      apply(record);
      record.updatedAt = new Date().toISOString();
      await this.db.write();
    }
  }
}
