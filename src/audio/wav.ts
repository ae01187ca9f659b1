/**
 * Minimal RIFF/WAVE handling for clip extraction: read the header of a
 * recording and write the header of a clip cut from it.
 */

import fs from "node:fs";

export type WavFormat = {
  /** 1 = PCM, 3 = IEEE float; anything else is passed through untouched. */
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
};

export type WavInfo = WavFormat & {
  blockAlign: number;
  byteRate: number;
  /** Byte offset of the first sample in the file. */
  dataOffset: number;
  /** Bytes of sample data actually present (the header may claim more). */
  dataLength: number;
  durationSeconds: number;
};

function readExactly(fd: number, length: number, position: number): Buffer {
  const buf = Buffer.alloc(length);
  const read = fs.readSync(fd, buf, 0, length, position);
  return read === length ? buf : buf.subarray(0, read);
}

/** Parse the `fmt ` and `data` chunks. Throws on anything that is not a WAV file. */
export function readWavInfo(filePath: string): WavInfo {
  const fileSize = fs.statSync(filePath).size;
  const fd = fs.openSync(filePath, "r");
  try {
    const riff = readExactly(fd, 12, 0);
    if (riff.length < 12 || riff.toString("ascii", 0, 4) !== "RIFF" || riff.toString("ascii", 8, 12) !== "WAVE") {
      throw new Error(`Not a RIFF/WAVE file: ${filePath}`);
    }

    let format: (WavFormat & { blockAlign: number; byteRate: number }) | null = null;
    let position = 12;

    while (position + 8 <= fileSize) {
      const header = readExactly(fd, 8, position);
      if (header.length < 8) break;
      const chunkId = header.toString("ascii", 0, 4);
      const chunkSize = header.readUInt32LE(4);
      const bodyStart = position + 8;

      if (chunkId === "fmt ") {
        const fmt = readExactly(fd, Math.min(chunkSize, 16), bodyStart);
        if (fmt.length < 16) throw new Error(`Truncated fmt chunk in ${filePath}`);
        format = {
          audioFormat: fmt.readUInt16LE(0),
          channels: fmt.readUInt16LE(2),
          sampleRate: fmt.readUInt32LE(4),
          byteRate: fmt.readUInt32LE(8),
          blockAlign: fmt.readUInt16LE(12),
          bitsPerSample: fmt.readUInt16LE(14),
        };
      } else if (chunkId === "data") {
        if (!format) throw new Error(`data chunk before fmt chunk in ${filePath}`);
        const dataLength = Math.max(0, Math.min(chunkSize, fileSize - bodyStart));
        return {
          ...format,
          dataOffset: bodyStart,
          dataLength,
          durationSeconds: format.byteRate > 0 ? dataLength / format.byteRate : 0,
        };
      }

      // chunks are word-aligned
      position = bodyStart + chunkSize + (chunkSize % 2);
    }

    throw new Error(`No data chunk found in ${filePath}`);
  } finally {
    fs.closeSync(fd);
  }
}

/** 44-byte canonical header for `dataLength` bytes of samples. */
export function buildWavHeader(dataLength: number, format: WavFormat): Buffer {
  const bytesPerSample = format.bitsPerSample / 8;
  const blockAlign = format.channels * bytesPerSample;
  const byteRate = format.sampleRate * blockAlign;

  const header = Buffer.alloc(44);
  let offset = 0;
  header.write("RIFF", offset);
  offset += 4;
  header.writeUInt32LE(36 + dataLength, offset);
  offset += 4;
  header.write("WAVE", offset);
  offset += 4;

  header.write("fmt ", offset);
  offset += 4;
  header.writeUInt32LE(16, offset); // SubChunk1Size
  offset += 4;
  header.writeUInt16LE(format.audioFormat, offset);
  offset += 2;
  header.writeUInt16LE(format.channels, offset);
  offset += 2;
  header.writeUInt32LE(format.sampleRate, offset);
  offset += 4;
  header.writeUInt32LE(byteRate, offset);
  offset += 4;
  header.writeUInt16LE(blockAlign, offset);
  offset += 2;
  header.writeUInt16LE(format.bitsPerSample, offset);
  offset += 2;

  header.write("data", offset);
  offset += 4;
  header.writeUInt32LE(dataLength, offset);
  return header;
}

/**
 * Wrap raw 16-bit little-endian PCM in a WAV container. Trailing bytes that
 * do not fill a whole frame are dropped.
 */
export function pcmToWav(pcm: Buffer, sampleRate: number, channels: number = 1): Buffer {
  const bytesPerFrame = channels * 2;
  const alignedLength = Math.max(0, pcm.length - (pcm.length % bytesPerFrame));
  const header = buildWavHeader(alignedLength, { audioFormat: 1, channels, sampleRate, bitsPerSample: 16 });
  return Buffer.concat([header, pcm.subarray(0, alignedLength)]);
}
