import type { TrackingResult } from '@minutes-pipeline/shared';
import { configService, getSecrets } from '../services/config';
import { remainingMinutes } from '../services/speechText';
import { buildPipeline } from '../pipeline';

interface TrackOptions {
  name?: string;
}

/**
 * Follows a task that was already submitted, e.g. after an interrupted run.
 */
export async function trackCommand(taskId: string, options: TrackOptions): Promise<TrackingResult> {
  const baseName = options.name ?? `task_${taskId}`;
  const { processor } = buildPipeline(configService.getAll(), getSecrets());

  console.log(`🔎 Tracking task ${taskId} as "${baseName}"`);
  const result = await processor.trackExisting(taskId, baseName);

  const minutes = remainingMinutes(result.remainingQuotaSeconds);
  if (minutes !== undefined) {
    console.log(`⏰ SpeechText.AI remaining time: ${minutes.toFixed(1)} minutes`);
  }
  return result;
}
