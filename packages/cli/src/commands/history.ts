import path from 'path';
import { configService } from '../services/config';
import { RunLedger } from '../services/db';
import type { IRunLedger } from '../domain/ports';
import { LEDGER_FILE } from '../pipeline';

interface HistoryOptions {
  failed?: boolean;
}

export async function historyCommand(
  options: HistoryOptions = {},
  ledger: IRunLedger = new RunLedger(path.join(configService.get('paths').output, LEDGER_FILE))
): Promise<void> {
  const records = options.failed ? await ledger.getFailed() : await ledger.getAll();

  if (records.length === 0) {
    console.log(options.failed ? '✅ No failed recordings.' : '📭 No recordings processed yet.');
    return;
  }

  for (const record of records) {
    const task = record.taskId ? ` task=${record.taskId}` : '';
    const error = record.error ? ` error="${record.error}"` : '';
    console.log(`${record.createdAt}  ${record.status.padEnd(12)} ${record.fileName}${task}${error}`);
  }
}
