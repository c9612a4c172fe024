import fs from "node:fs";
import path from "node:path";

import {
  DEFAULT_POLL_INTERVAL,
  DEFAULT_STT_BASE_URL,
  DEFAULT_STT_MODEL,
  SpeechApi,
  SpeechApiError,
  SpeechClient,
  requireApiKey
} from "./api";
import { Transcript } from "./types";

export interface TranscribeOptions {
  model?: string;
  pollInterval?: number;
  keepRemote?: boolean;
  client?: SpeechApi;
  baseUrl?: string;
  searchEnvPaths?: string[];
}

async function cleanup(label: string, action: () => Promise<void>): Promise<void> {
  try {
    console.info(`Deleting ${label}`);
    await action();
  } catch (error) {
    const detail = error instanceof SpeechApiError ? `: ${error.message}` : "";
    console.warn(`Failed to delete ${label}${detail}`);
  }
}

/**
 * Upload an audio file, run a batch transcription and return the transcript.
 * Remote resources are deleted afterwards unless `keepRemote` is set.
 */
export async function transcribeAudioFile(
  audioPath: string,
  options: TranscribeOptions = {}
): Promise<Transcript> {
  const {
    model = DEFAULT_STT_MODEL,
    pollInterval = DEFAULT_POLL_INTERVAL,
    keepRemote = false,
    baseUrl = DEFAULT_STT_BASE_URL,
    searchEnvPaths
  } = options;

  const resolved = path.resolve(audioPath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Audio file not found: ${resolved}`);
  }

  const client =
    options.client ?? new SpeechClient(requireApiKey(undefined, { searchPaths: searchEnvPaths }), baseUrl);

  let fileId: string | undefined;
  let transcriptionId: string | undefined;
  try {
    console.info(`Uploading audio file ${resolved}`);
    fileId = await client.uploadFile(resolved);

    console.info(`Creating transcription job (model=${model}, fileId=${fileId})`);
    transcriptionId = await client.createTranscription({ model, fileId });

    console.info(`Waiting for transcription ${transcriptionId} to complete`);
    await client.waitForCompletion(transcriptionId, pollInterval);

    console.info(`Fetching transcript ${transcriptionId}`);
    return await client.fetchTranscript(transcriptionId);
  } finally {
    if (!keepRemote) {
      const remoteTranscription = transcriptionId;
      if (remoteTranscription) {
        await cleanup(`remote transcription ${remoteTranscription}`, () =>
          client.deleteTranscription(remoteTranscription)
        );
      }
      const remoteFile = fileId;
      if (remoteFile) {
        await cleanup(`uploaded file ${remoteFile}`, () => client.deleteFile(remoteFile));
      }
    }
  }
}
