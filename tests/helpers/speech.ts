import { SpeechApi, SpeechApiError } from "../../src/api";
import { Transcript } from "../../src/types";

/** In-process stand-in for the speech-to-text API. */
export class DummySpeechClient implements SpeechApi {
  uploadedPath?: string;
  transcriptionId = "tx-1";
  modelSeen?: string;
  fileIdSeen?: string;
  deletedTranscription?: string;
  deletedFile?: string;
  waitedFor?: string;
  failWait = false;
  failDeleteFile = false;

  constructor(private readonly transcript: Transcript) {}

  async uploadFile(audioPath: string): Promise<string> {
    this.uploadedPath = audioPath;
    return "file-1";
  }

  async createTranscription(options: { model: string; fileId: string }): Promise<string> {
    this.modelSeen = options.model;
    this.fileIdSeen = options.fileId;
    return this.transcriptionId;
  }

  async waitForCompletion(transcriptionId: string): Promise<void> {
    this.waitedFor = transcriptionId;
    if (this.failWait) {
      throw new SpeechApiError("Transcription failed: unsupported audio");
    }
  }

  async fetchTranscript(): Promise<Transcript> {
    return this.transcript;
  }

  async deleteTranscription(transcriptionId: string): Promise<void> {
    this.deletedTranscription = transcriptionId;
  }

  async deleteFile(fileId: string): Promise<void> {
    if (this.failDeleteFile) {
      throw new SpeechApiError(`Failed to delete file ${fileId}: Not Found`);
    }
    this.deletedFile = fileId;
  }
}
