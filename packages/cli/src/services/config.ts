import Conf from 'conf';
import os from 'os';
import path from 'path';
import type { AppConfig, PathConfig, Secrets } from '../domain/configs';

export const REQUIRED_ENV_VARS = ['SPEECHTEXT_API_KEY', 'GEMINI_API_KEY'] as const;

const defaults: AppConfig = {
  paths: {
    inbox: path.join(os.homedir(), 'Downloads'),
    output: path.join(process.cwd(), 'meeting_outputs')
  },
  speech: {
    baseUrl: 'https://api.speechtext.ai',
    language: 'en-US',
    summarySize: 15,
    extensions: ['.webm']
  },
  polling: {
    intervalSeconds: 15
  },
  summary: {
    model: 'gemini-2.5-flash'
  }
};

class ConfigService {
  private store: Conf<AppConfig>;

  constructor() {
    this.store = new Conf<AppConfig>({
      projectName: 'minutes-pipeline',
      defaults
    });
  }

  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.store.get(key);
  }

  set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): void {
    this.store.set(key, value);
  }

  setPaths(paths: PathConfig): void {
    this.set('paths', {
      inbox: path.normalize(paths.inbox),
      output: path.normalize(paths.output),
      promptTemplate: paths.promptTemplate ? path.normalize(paths.promptTemplate) : undefined
    });
  }

  getAll(): AppConfig {
    return this.store.store;
  }

  get filePath(): string {
    return this.store.path;
  }
}

/**
 * Names of required API keys that are not set.
 */
export function missingEnvironment(env: NodeJS.ProcessEnv = process.env): string[] {
  return REQUIRED_ENV_VARS.filter(name => !env[name]);
}

export function getSecrets(env: NodeJS.ProcessEnv = process.env): Secrets {
  return {
    speechTextApiKey: env.SPEECHTEXT_API_KEY ?? '',
    geminiApiKey: env.GEMINI_API_KEY ?? ''
  };
}

export const configService = new ConfigService();
