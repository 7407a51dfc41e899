import inquirer from 'inquirer';
import { SpeechLanguage } from '@minutes-pipeline/shared';
import { configService } from './services/config';

interface SetupAnswers {
  inbox: string;
  output: string;
  promptTemplate: string;
  language: string;
  summarySize: number;
  intervalSeconds: number;
  maxPolls?: number;
  maxWaitMinutes?: number;
}

const optionalNumber = (input: string): number | undefined => {
  const value = parseInt(input, 10);
  return Number.isNaN(value) ? undefined : value;
};

const validateOptionalNumber = (input: string) =>
  !input || !Number.isNaN(parseInt(input, 10)) || 'Please enter a number';

export async function runSetup(): Promise<void> {
  console.log('Welcome to Meeting Pipeline Setup');

  const currentPaths = configService.get('paths');
  const currentSpeech = configService.get('speech');
  const currentPolling = configService.get('polling');

  const answers = await inquirer.prompt<SetupAnswers>([
    // --- PATHS ---
    {
      type: 'input',
      name: 'inbox',
      message: 'Directory to collect recordings from:',
      default: currentPaths.inbox,
      filter: (input: string) => input.trim()
    },
    {
      type: 'input',
      name: 'output',
      message: 'Output directory for transcripts and summaries:',
      default: currentPaths.output,
      filter: (input: string) => input.trim()
    },
    {
      type: 'input',
      name: 'promptTemplate',
      message: 'Summary prompt template file (optional):',
      default: currentPaths.promptTemplate ?? '',
      filter: (input: string) => input.trim()
    },

    // --- SPEECH ---
    {
      type: 'list',
      name: 'language',
      message: 'Recording language:',
      choices: Object.values(SpeechLanguage),
      default: currentSpeech.language
    },
    {
      type: 'number',
      name: 'summarySize',
      message: 'Service summary size (% of transcript):',
      default: currentSpeech.summarySize
    },

    // --- POLLING ---
    {
      type: 'number',
      name: 'intervalSeconds',
      message: 'Seconds between status polls:',
      default: currentPolling.intervalSeconds
    },
    {
      type: 'input',
      name: 'maxPolls',
      message: 'Max polls per task (optional, press Enter for no limit):',
      default: currentPolling.maxPolls?.toString() ?? '',
      filter: optionalNumber,
      validate: validateOptionalNumber
    },
    {
      type: 'input',
      name: 'maxWaitMinutes',
      message: 'Max minutes to wait per task (optional, press Enter for no limit):',
      default: currentPolling.maxWaitMinutes?.toString() ?? '',
      filter: optionalNumber,
      validate: validateOptionalNumber
    }
  ]);

  configService.setPaths({
    inbox: answers.inbox,
    output: answers.output,
    promptTemplate: answers.promptTemplate || undefined
  });

  configService.set('speech', {
    ...currentSpeech,
    language: answers.language,
    summarySize: answers.summarySize
  });

  configService.set('polling', {
    intervalSeconds: answers.intervalSeconds,
    maxPolls: answers.maxPolls,
    maxWaitMinutes: answers.maxWaitMinutes
  });

  console.log('✅ Configuration saved successfully!');
  console.log('Config file location:', configService.filePath);
}
