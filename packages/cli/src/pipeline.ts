import fs from 'fs';
import path from 'path';
import type { AppConfig, Secrets } from './domain/configs';
import { NodeFileSystem } from './utils/nodeFS';
import { SpeechTextClient } from './services/speechText';
import { TaskTracker } from './services/taskTracker';
import { SummaryService } from './services/summarizer';
import { DocumentRenderer } from './services/renderer';
import { RunLedger } from './services/db';
import { BatchProcessor } from './services/batchProcessor';

export const PROMPT_TEMPLATE_FILE = 'summary_prompt_template.txt';
export const LEDGER_FILE = 'pipeline-db.json';

/**
 * Wires the services together from the stored settings and API keys.
 */
export function buildPipeline(config: AppConfig, secrets: Secrets): { processor: BatchProcessor; ledger: RunLedger } {
  const fileSystem = new NodeFileSystem();
  const outputDir = config.paths.output;

  if (!fs.existsSync(outputDir)) fs.mkdirSync(outputDir, { recursive: true });

  const speech = new SpeechTextClient({
    apiKey: secrets.speechTextApiKey,
    baseUrl: config.speech.baseUrl
  });

  const tracker = new TaskTracker(speech, {
    pollIntervalMs: config.polling.intervalSeconds * 1000,
    maxPolls: config.polling.maxPolls,
    maxWaitMs: config.polling.maxWaitMinutes !== undefined ? config.polling.maxWaitMinutes * 60_000 : undefined
  });

  const summarizer = new SummaryService(fileSystem, {
    apiKey: secrets.geminiApiKey,
    model: config.summary.model,
    promptTemplatePath: config.paths.promptTemplate ?? path.join(path.dirname(outputDir), PROMPT_TEMPLATE_FILE)
  });

  const ledger = new RunLedger(path.join(outputDir, LEDGER_FILE));

  const processor = new BatchProcessor(
    {
      speech,
      tracker,
      summarizer,
      renderer: new DocumentRenderer(fileSystem, outputDir),
      ledger,
      fs: fileSystem
    },
    {
      inboxDir: config.paths.inbox,
      outputDir,
      extensions: config.speech.extensions,
      upload: {
        language: config.speech.language,
        punctuation: true,
        speakers: true,
        summary: true,
        summarySize: config.speech.summarySize
      }
    }
  );

  return { processor, ledger };
}
