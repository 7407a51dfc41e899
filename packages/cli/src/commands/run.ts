import type { BatchReport } from '@minutes-pipeline/shared';
import { configService, getSecrets } from '../services/config';
import { buildPipeline } from '../pipeline';

export async function runCommand(): Promise<BatchReport> {
  const config = configService.getAll();

  console.log('🚀 Meeting Transcription Pipeline');
  console.log(`Inbox:  ${config.paths.inbox}`);
  console.log(`Output: ${config.paths.output}`);
  console.log('='.repeat(70));

  const { processor } = buildPipeline(config, getSecrets());
  return processor.run();
}
