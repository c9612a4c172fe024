import { AudioSignal } from "../types";

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export class AudioDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AudioDecodeError";
  }
}

interface WavFormat {
  format: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

function readFormat(buffer: Buffer, offset: number, size: number): WavFormat {
  if (size < 16) {
    throw new AudioDecodeError(`fmt chunk too short (${size} bytes)`);
  }
  const present = Math.max(0, buffer.length - offset);
  if (present < size) {
    throw new AudioDecodeError(`Truncated fmt chunk (${size} bytes declared, ${present} present)`);
  }
  let format = buffer.readUInt16LE(offset);
  const channels = buffer.readUInt16LE(offset + 2);
  const sampleRate = buffer.readUInt32LE(offset + 4);
  const bitsPerSample = buffer.readUInt16LE(offset + 14);
  if (format === WAVE_FORMAT_EXTENSIBLE) {
    if (size < 26) {
      throw new AudioDecodeError("Extensible fmt chunk without a sub-format");
    }
    // first two bytes of the sub-format GUID carry the real format tag
    format = buffer.readUInt16LE(offset + 24);
  }
  return { format, channels, sampleRate, bitsPerSample };
}

function sampleReader(fmt: WavFormat): (buffer: Buffer, offset: number) => number {
  const { format, bitsPerSample } = fmt;
  if (format === WAVE_FORMAT_PCM) {
    switch (bitsPerSample) {
      case 8:
        return (buffer, offset) => (buffer.readUInt8(offset) - 128) / 128;
      case 16:
        return (buffer, offset) => buffer.readInt16LE(offset) / 32768;
      case 24:
        return (buffer, offset) => buffer.readIntLE(offset, 3) / 8388608;
      case 32:
        return (buffer, offset) => buffer.readInt32LE(offset) / 2147483648;
      default:
        break;
    }
  }
  if (format === WAVE_FORMAT_IEEE_FLOAT) {
    if (bitsPerSample === 32) {
      return (buffer, offset) => buffer.readFloatLE(offset);
    }
    if (bitsPerSample === 64) {
      return (buffer, offset) => buffer.readDoubleLE(offset);
    }
  }
  throw new AudioDecodeError(
    `Unsupported WAV encoding (format ${format}, ${bitsPerSample} bits per sample)`
  );
}

/**
 * Decode a RIFF/WAVE buffer into mono samples. Channels are averaged.
 */
export function decodeWav(buffer: Buffer): AudioSignal {
  if (
    buffer.length < 12 ||
    buffer.toString("ascii", 0, 4) !== "RIFF" ||
    buffer.toString("ascii", 8, 12) !== "WAVE"
  ) {
    throw new AudioDecodeError("Not a RIFF/WAVE file");
  }

  let fmt: WavFormat | undefined;
  let dataOffset: number | undefined;
  let dataSize = 0;

  let offset = 12;
  while (offset + 8 <= buffer.length) {
    const id = buffer.toString("ascii", offset, offset + 4);
    const size = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;
    if (id === "fmt ") {
      fmt = readFormat(buffer, body, size);
    } else if (id === "data") {
      dataOffset = body;
      // streamed writers leave the size unset; clamp to what is there
      dataSize = Math.min(size, buffer.length - body);
    }
    offset = body + size + (size % 2);
  }

  if (!fmt) {
    throw new AudioDecodeError("Missing fmt chunk");
  }
  if (dataOffset === undefined) {
    throw new AudioDecodeError("Missing data chunk");
  }
  if (fmt.channels < 1 || fmt.sampleRate < 1) {
    throw new AudioDecodeError(
      `Invalid format: ${fmt.channels} channels at ${fmt.sampleRate} Hz`
    );
  }

  const read = sampleReader(fmt);
  const bytesPerSample = fmt.bitsPerSample / 8;
  const frameSize = bytesPerSample * fmt.channels;
  const frameCount = Math.floor(dataSize / frameSize);
  const samples = new Float32Array(frameCount);

  for (let i = 0; i < frameCount; i++) {
    const frameOffset = dataOffset + i * frameSize;
    let sum = 0;
    for (let ch = 0; ch < fmt.channels; ch++) {
      sum += read(buffer, frameOffset + ch * bytesPerSample);
    }
    samples[i] = sum / fmt.channels;
  }

  return { sampleRate: fmt.sampleRate, samples, channels: fmt.channels };
}
