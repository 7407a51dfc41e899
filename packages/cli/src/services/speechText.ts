import axios, { type AxiosInstance } from 'axios';
import fsPromises from 'fs/promises';
import http from 'http';
import path from 'path';
import type { StatusResponse, UploadOptions, WordTimeOffset } from '@minutes-pipeline/shared';
import type { ISpeechClient } from '../domain/ports';
import { ServiceError, UploadFailedError } from '../domain/models';

export const SPEECHTEXT_BASE_URL = 'https://api.speechtext.ai';

export interface SpeechTextClientOptions {
  apiKey: string;
  baseUrl?: string;
}

type JsonObject = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function toWordOffset(raw: JsonObject): WordTimeOffset {
  const word: WordTimeOffset = {};
  if (typeof raw.start_time === 'number') word.start_time = raw.start_time;
  if (typeof raw.end_time === 'number') word.end_time = raw.end_time;
  if (typeof raw.word === 'string') word.word = raw.word;
  if (typeof raw.confidence === 'number') word.confidence = raw.confidence;
  return word;
}

/**
 * Lifts a /results body into a StatusResponse.
 * Wire shape: { status, results: { transcript, word_time_offsets, speakers, summary }, "remaining seconds" }
 */
export function parseStatusResponse(body: unknown): StatusResponse {
  if (!isRecord(body)) return {};

  const response: StatusResponse = {};
  if (typeof body.status === 'string') response.status = body.status;
  if (typeof body.error === 'string') response.error = body.error;

  const remaining = body['remaining seconds'] ?? body.remaining_seconds;
  if (typeof remaining === 'number') response.remaining_seconds = remaining;

  const results = body.results;
  if (isRecord(results)) {
    if (typeof results.transcript === 'string') response.transcript = results.transcript;
    if (Array.isArray(results.word_time_offsets)) {
      response.word_time_offsets = results.word_time_offsets.filter(isRecord).map(toWordOffset);
    }
    if (Array.isArray(results.speakers)) response.speakers = results.speakers.filter(isRecord);
    if (typeof results.summary === 'string') response.summary = results.summary;
  }

  return response;
}

export function remainingMinutes(seconds?: number): number | undefined {
  return seconds === undefined ? undefined : seconds / 60;
}

export class SpeechTextClient implements ISpeechClient {
  private _client: AxiosInstance | null = null;

  constructor(private readonly options: SpeechTextClientOptions) {}

  private get client(): AxiosInstance {
    if (!this._client) {
      this._client = axios.create({
        baseURL: this.options.baseUrl ?? SPEECHTEXT_BASE_URL,
        timeout: 30000,
        httpAgent: new http.Agent({ keepAlive: true })
      });
    }
    return this._client;
  }

  public async submit(filePath: string, options: UploadOptions): Promise<string> {
    try {
      await fsPromises.access(filePath);
    } catch {
      throw new Error(`File not found: ${filePath}`);
    }

    const audio = await fsPromises.readFile(filePath);
    const format = path.extname(filePath).slice(1).toLowerCase();

    console.log(`🎤 Starting transcription for: ${path.basename(filePath)}`);
    console.log('📤 Uploading file to SpeechText.AI...');

    let data: unknown;
    let status: number;
    try {
      const response = await this.client.post<unknown>('/recognize', audio, {
        headers: { 'Content-Type': 'application/octet-stream' },
        params: {
          key: this.options.apiKey,
          language: options.language,
          punctuation: options.punctuation,
          format,
          speakers: options.speakers,
          summary: options.summary,
          summary_size: options.summarySize
        },
        maxContentLength: Infinity,
        maxBodyLength: Infinity,
        timeout: 0 // large recordings take as long as they take
      });
      data = response.data;
      status = response.status;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        const body: unknown = error.response.data;
        const detail = typeof body === 'string' ? body : JSON.stringify(body);
        throw new UploadFailedError(`Upload failed: ${detail}`, error.response.status, body);
      }
      throw this.formatError(error);
    }

    const taskId = isRecord(data) && typeof data.id === 'string' ? data.id : undefined;
    if (!taskId) {
      throw new UploadFailedError('Upload failed: no task id in response', status, data);
    }

    console.log(`✅ Upload successful. Task ID: ${taskId}`);
    return taskId;
  }

  public async getStatus(taskId: string): Promise<StatusResponse> {
    try {
      const response = await this.client.get<unknown>('/results', {
        params: { key: this.options.apiKey, task: taskId }
      });
      return { ...parseStatusResponse(response.data), raw: response.data };
    } catch (error) {
      throw this.formatError(error);
    }
  }

  // Translates raw Axios errors into ServiceError
  private formatError(error: unknown): ServiceError | Error {
    if (axios.isAxiosError(error)) {
      const statusCode = error.response?.status;
      const body: unknown = error.response?.data;
      const msg = isRecord(body) && typeof body.error === 'string' ? body.error : error.message;

      // Connection-level failures and 5xx are transient; 4xx (bad key, unknown task) are not
      const isTransient = !statusCode || statusCode >= 500 || ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT'].includes(error.code || '');

      return new ServiceError(msg, isTransient, statusCode);
    }

    if (error instanceof Error) return error;
    return new Error('Unknown SpeechText.AI error occurred');
  }
}
