import axios, { AxiosInstance } from "axios";
import FormData from "form-data";
import fs from "node:fs";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";

import { readEnv } from "./env";
import { Transcript } from "./types";

export const STT_API_KEY_ENV = "STT_API_KEY";
export const DEFAULT_STT_BASE_URL = "https://api.soniox.com";
export const DEFAULT_STT_MODEL = "stt-async-preview";
export const DEFAULT_POLL_INTERVAL = 1.0;

export class SpeechApiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SpeechApiError";
  }
}

export function requireApiKey(
  envVar = STT_API_KEY_ENV,
  options?: { searchPaths?: string[] }
): string {
  const apiKey = readEnv(envVar, options?.searchPaths);
  if (!apiKey) {
    throw new Error(
      `${envVar} is not set.\n` +
        "Create a speech-to-text API key and export it:\n" +
        `  export ${envVar}=<YOUR_API_KEY>`
    );
  }
  return apiKey;
}

interface IdResponse {
  id?: string;
}

interface StatusResponse {
  status?: string;
  error_message?: string;
}

/**
 * The subset of the speech-to-text API used for batch transcription.
 */
export interface SpeechApi {
  uploadFile(audioPath: string): Promise<string>;
  createTranscription(options: { model: string; fileId: string }): Promise<string>;
  waitForCompletion(transcriptionId: string, pollInterval?: number): Promise<void>;
  fetchTranscript(transcriptionId: string): Promise<Transcript>;
  deleteTranscription(transcriptionId: string): Promise<void>;
  deleteFile(fileId: string): Promise<void>;
}

export class SpeechClient implements SpeechApi {
  private readonly client: AxiosInstance;

  constructor(apiKey: string, baseUrl: string = DEFAULT_STT_BASE_URL) {
    this.client = axios.create({
      baseURL: baseUrl,
      headers: {
        Authorization: `Bearer ${apiKey}`
      },
      timeout: 120_000,
      validateStatus: () => true
    });
  }

  async uploadFile(audioPath: string): Promise<string> {
    const resolved = path.resolve(audioPath);
    const form = new FormData();
    form.append("file", fs.createReadStream(resolved));

    const response = await this.client.post<IdResponse>("/v1/files", form, {
      headers: form.getHeaders()
    });
    if (![200, 201, 202].includes(response.status)) {
      throw new SpeechApiError(`File upload failed: ${response.status} ${response.statusText}`);
    }
    const fileId = response.data?.id;
    if (!fileId) {
      throw new SpeechApiError(`Unexpected upload response: ${JSON.stringify(response.data)}`);
    }
    return fileId;
  }

  async deleteFile(fileId: string): Promise<void> {
    const response = await this.client.delete(`/v1/files/${fileId}`);
    if (![200, 204].includes(response.status)) {
      throw new SpeechApiError(`Failed to delete file ${fileId}: ${response.statusText}`);
    }
  }

  async createTranscription(options: { model: string; fileId: string }): Promise<string> {
    const payload = { model: options.model, file_id: options.fileId, enable_speaker_diarization: true };

    const response = await this.client.post<IdResponse>("/v1/transcriptions", payload);
    if (![200, 201, 202].includes(response.status)) {
      throw new SpeechApiError(`Create transcription failed: ${response.status} ${response.statusText}`);
    }
    const transcriptionId = response.data?.id;
    if (!transcriptionId) {
      throw new SpeechApiError(`Unexpected transcription response: ${JSON.stringify(response.data)}`);
    }
    return transcriptionId;
  }

  async waitForCompletion(transcriptionId: string, pollInterval = DEFAULT_POLL_INTERVAL): Promise<void> {
    const statusPath = `/v1/transcriptions/${transcriptionId}`;
    while (true) {
      const response = await this.client.get<StatusResponse>(statusPath);
      if (response.status !== 200) {
        throw new SpeechApiError(`Polling failed: ${response.status} ${response.statusText}`);
      }
      const status = response.data?.status;
      if (status === "completed") {
        return;
      }
      if (status === "error") {
        throw new SpeechApiError(`Transcription failed: ${response.data.error_message ?? "unknown error"}`);
      }
      await sleep(pollInterval * 1000);
    }
  }

  async fetchTranscript(transcriptionId: string): Promise<Transcript> {
    const response = await this.client.get<Transcript>(`/v1/transcriptions/${transcriptionId}/transcript`);
    if (response.status !== 200) {
      throw new SpeechApiError(`Fetching transcript failed: ${response.status} ${response.statusText}`);
    }
    return response.data;
  }

  async deleteTranscription(transcriptionId: string): Promise<void> {
    const response = await this.client.delete(`/v1/transcriptions/${transcriptionId}`);
    if (![200, 204].includes(response.status)) {
      throw new SpeechApiError(`Failed to delete transcription ${transcriptionId}: ${response.statusText}`);
    }
  }
}
