import 'dotenv/config';
import { program } from 'commander';
import { runSetup } from './setup';
import { missingEnvironment } from './services/config';
import { runCommand } from './commands/run';
import { trackCommand } from './commands/track';
import { historyCommand } from './commands/history';

program
  .name('minutes-pipeline')
  .description('Transcribe meeting recordings and generate AI summaries')
  .version('1.0.0');

/**
 * Exits when an API key the pipeline needs is not set.
 */
function ensureEnvironment(): void {
  const missing = missingEnvironment();
  if (missing.length === 0) return;

  console.error('❌ Missing required environment variables:');
  missing.forEach(name => console.error(`   - ${name}`));
  console.error('\nPlease set these in your .env file:');
  missing.forEach(name => console.error(`   ${name}=your_api_key_here`));
  process.exit(1);
}

async function guarded(action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error('❌ Pipeline failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

// --- CLI Command Definitions ---

program
  .command('run', { isDefault: true })
  .description('Collect recordings, transcribe, summarize and render documents')
  .action(async () => {
    ensureEnvironment();
    await guarded(async () => {
      const report = await runCommand();
      if (report.failed > 0) process.exitCode = 1;
    });
  });

program
  .command('track <taskId>')
  .description('Follow an already submitted transcription task to completion')
  .option('-n, --name <name>', 'base name for the log and transcript files')
  .action(async (taskId: string, options: { name?: string }) => {
    ensureEnvironment();
    await guarded(() => trackCommand(taskId, options));
  });

program
  .command('history')
  .description('List recordings processed so far')
  .option('-f, --failed', 'only list recordings that failed')
  .action((options: { failed?: boolean }) => guarded(() => historyCommand(options)));

program
  .command('settings')
  .description('Run setup wizard')
  .action(() => guarded(runSetup));

program.parseAsync().catch((error: unknown) => {
  console.error('❌ An unexpected error occurred:', error);
  process.exit(1);
});
