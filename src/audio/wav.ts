const WAV_HEADER_BYTES = 44;
const BITS_PER_SAMPLE = 16;

/** Wraps signed 16-bit little-endian PCM in a canonical RIFF/WAVE container. */
export function encodeWav(pcm16: Buffer, sampleRateHz: number, channels: number): Buffer {
  const blockAlign = channels * (BITS_PER_SAMPLE / 8);
  const header = Buffer.alloc(WAV_HEADER_BYTES);

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm16.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(sampleRateHz * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(BITS_PER_SAMPLE, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm16.length, 40);

  return Buffer.concat([header, pcm16]);
}

export function pcmDurationMs(byteLength: number, sampleRateHz: number, channels: number): number {
  const bytesPerSecond = sampleRateHz * channels * (BITS_PER_SAMPLE / 8);
  return Math.round((byteLength / bytesPerSecond) * 1000);
}
