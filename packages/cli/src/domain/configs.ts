export interface PathConfig {
  inbox: string;
  output: string;
  promptTemplate?: string;
}

export interface SpeechConfig {
  baseUrl: string;
  language: string;
  summarySize: number;
  extensions: string[];
}

export interface PollingConfig {
  intervalSeconds: number;
  maxPolls?: number;
  maxWaitMinutes?: number;
}

export interface SummaryConfig {
  model: string;
}

export interface AppConfig {
  paths: PathConfig;
  speech: SpeechConfig;
  polling: PollingConfig;
  summary: SummaryConfig;
}

export interface Secrets {
  speechTextApiKey: string;
  geminiApiKey: string;
}
