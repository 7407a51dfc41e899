import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { RecordingRecord } from '@minutes-pipeline/shared';
import { historyCommand } from '../../src/commands/history';

// Keep the settings in memory instead of the user's config directory
vi.mock('conf', () => {
  return {
    default: class {
      store: Record<string, unknown>;
      path = '/tmp/minutes-pipeline/config.json';

      constructor(options: { defaults: Record<string, unknown> }) {
        this.store = { ...options.defaults };
      }

      get(key: string) {
        return this.store[key];
      }

      set(key: string, value: unknown) {
        this.store[key] = value;
      }
    }
  };
});

const failedRecord: RecordingRecord = {
  id: 'rec-1',
  fileName: 'a.webm',
  filePath: '/out/a.webm',
  status: 'FAILED',
  createdAt: '2026-01-05T09:00:00.000Z',
  updatedAt: '2026-01-05T09:01:00.000Z',
  taskId: 'task-1',
  error: 'boom'
};

const completedRecord: RecordingRecord = {
  id: 'rec-2',
  fileName: 'b.webm',
  filePath: '/out/b.webm',
  status: 'COMPLETED',
  createdAt: '2026-01-05T10:00:00.000Z',
  updatedAt: '2026-01-05T10:05:00.000Z'
};

function ledgerWith(all: RecordingRecord[]) {
  return {
    startRecording: vi.fn(),
    setTaskId: vi.fn(),
    updateStatus: vi.fn(),
    setRemainingSeconds: vi.fn(),
    setError: vi.fn(),
    markCompleted: vi.fn(),
    getAll: vi.fn().mockResolvedValue(all),
    getFailed: vi.fn().mockResolvedValue(all.filter(r => r.status === 'FAILED'))
  };
}

describe('historyCommand()', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('prints every record', async () => {
    const ledger = ledgerWith([completedRecord, failedRecord]);

    await historyCommand({}, ledger);

    expect(ledger.getFailed).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledTimes(2);
    expect(console.log).toHaveBeenNthCalledWith(1, '2026-01-05T10:00:00.000Z  COMPLETED    b.webm');
  });

  it('prints only failed records with their task and error when asked', async () => {
    const ledger = ledgerWith([completedRecord, failedRecord]);

    await historyCommand({ failed: true }, ledger);

    expect(ledger.getAll).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith('2026-01-05T09:00:00.000Z  FAILED       a.webm task=task-1 error="boom"');
  });

  it('says so when nothing has failed', async () => {
    await historyCommand({ failed: true }, ledgerWith([completedRecord]));

    expect(console.log).toHaveBeenCalledWith('✅ No failed recordings.');
  });
});
