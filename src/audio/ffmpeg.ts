import { spawn } from "node:child_process";
import path from "node:path";

import { FFMPEG_PATH_ENV, readEnv } from "../env";
import { AudioSignal } from "../types";

export const FFMPEG_SAMPLE_RATE = 22050;

/**
 * Decode any container ffmpeg understands into 32-bit float mono PCM.
 */
export async function decodeWithFfmpeg(
  inputPath: string,
  sampleRate = FFMPEG_SAMPLE_RATE,
  ffmpegPath = readEnv(FFMPEG_PATH_ENV) ?? "ffmpeg"
): Promise<AudioSignal> {
  const resolved = path.resolve(inputPath);
  const chunks: Buffer[] = [];
  const stderr: Buffer[] = [];

  await new Promise<void>((resolve, reject) => {
    const processHandle = spawn(ffmpegPath, [
      "-v",
      "error",
      "-i",
      resolved,
      "-f",
      "f32le",
      "-acodec",
      "pcm_f32le",
      "-ac",
      "1",
      "-ar",
      String(sampleRate),
      "pipe:1"
    ]);
    processHandle.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
    processHandle.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    processHandle.on("error", (error) => {
      reject(new Error(`Could not run ${ffmpegPath} for ${resolved}: ${error.message}`));
    });
    processHandle.on("close", (code) => {
      if (code === 0) {
        resolve();
      } else {
        const detail = Buffer.concat(stderr).toString("utf-8").trim();
        reject(
          new Error(
            `ffmpeg exited with code ${code} while decoding ${resolved}${detail ? `: ${detail}` : ""}`
          )
        );
      }
    });
  });

  const pcm = Buffer.concat(chunks);
  const samples = new Float32Array(Math.floor(pcm.length / 4));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = pcm.readFloatLE(i * 4);
  }
  return { sampleRate, samples, channels: 1 };
}
