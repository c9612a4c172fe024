import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import axios, { type InternalAxiosRequestConfig } from "axios";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { SpeechClient, requireApiKey } from "../src/api";

const ENV_VAR = "TIMING_STT_API_KEY_TEST";
let originalValue: string | undefined;

beforeEach(() => {
  originalValue = process.env[ENV_VAR];
  delete process.env[ENV_VAR];
});

afterEach(() => {
  if (originalValue !== undefined) {
    process.env[ENV_VAR] = originalValue;
  } else {
    delete process.env[ENV_VAR];
  }
});

describe("requireApiKey", () => {
  it("loads API key from .env file", () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "timing-env-"));
    const envPath = path.join(tempDir, ".env");
    fs.writeFileSync(envPath, `${ENV_VAR}=test-secret\n`, { encoding: "utf-8" });

    const apiKey = requireApiKey(ENV_VAR, { searchPaths: [envPath] });

    expect(apiKey).toBe("test-secret");
    expect(process.env[ENV_VAR]).toBe("test-secret");
  });

  it("prefers a variable already in the environment", () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "timing-env-"));
    const envPath = path.join(tempDir, ".env");
    fs.writeFileSync(envPath, `${ENV_VAR}=from-file\n`, { encoding: "utf-8" });
    process.env[ENV_VAR] = "from-shell";

    expect(requireApiKey(ENV_VAR, { searchPaths: [envPath] })).toBe("from-shell");
  });

  it("throws when key missing", () => {
    expect(() => requireApiKey("TIMING_MISSING_KEY", { searchPaths: [] })).toThrowError(
      /^TIMING_MISSING_KEY is not set\./
    );
  });
});

describe("SpeechClient", () => {
  it("creates a transcription from an uploaded file with diarization", async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const originalAdapter = axios.defaults.adapter;
    axios.defaults.adapter = async (config) => {
      requests.push(config);
      return { data: { id: "tx-9" }, status: 201, statusText: "Created", headers: {}, config };
    };

    try {
      const client = new SpeechClient("test-secret", "http://127.0.0.1:9");
      await expect(client.createTranscription({ model: "test-model", fileId: "file-1" })).resolves.toBe("tx-9");
    } finally {
      axios.defaults.adapter = originalAdapter;
    }

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe("/v1/transcriptions");
    expect(JSON.parse(String(requests[0].data))).toEqual({
      model: "test-model",
      file_id: "file-1",
      enable_speaker_diarization: true
    });
  });
});
