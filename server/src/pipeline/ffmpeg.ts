import { spawn } from 'child_process';
import { TranscodeFailedError } from '../errors.js';

/**
 * - `voice`: Ogg/Opus voice notes, a single audio stream taken as is
 * - `audio`: audio files, first audio stream only (skips embedded cover art)
 * - `video`: audio track only, the video stream is never decoded
 */
export type TranscodeProfile = 'voice' | 'audio' | 'video';

export interface Transcoder {
  transcode(inputPath: string, outputPath: string, profile: TranscodeProfile): Promise<void>;
}

// Canonical audio: mono, 22.05 kHz, VBR mp3
const CANONICAL_OUTPUT = ['-c:a', 'libmp3lame', '-q:a', '3', '-ac', '1', '-ar', '22050'];

const STREAM_SELECTION: Record<TranscodeProfile, string[]> = {
  voice: [],
  audio: ['-map', '0:a:0'],
  video: ['-vn', '-sn', '-dn'],
};

export function ffmpegArgs(inputPath: string, outputPath: string, profile: TranscodeProfile): string[] {
  return [
    '-hide_banner', '-loglevel', 'error', '-y', '-i', inputPath,
    ...STREAM_SELECTION[profile],
    ...CANONICAL_OUTPUT,
    outputPath,
  ];
}

export interface FfmpegTranscoderOptions {
  binaryPath: string;
  timeoutMs: number;
}

export class FfmpegTranscoder implements Transcoder {
  constructor(private readonly options: FfmpegTranscoderOptions) {}

  transcode(inputPath: string, outputPath: string, profile: TranscodeProfile): Promise<void> {
    const args = ffmpegArgs(inputPath, outputPath, profile);
    console.log(`[FFmpeg] ${this.options.binaryPath} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = spawn(this.options.binaryPath, args, {
        stdio: ['ignore', 'ignore', 'pipe'],
        timeout: this.options.timeoutMs,
      });

      let stderr = '';
      child.stderr.setEncoding('utf-8');
      child.stderr.on('data', (chunk: string) => {
        // keep the tail, that is where ffmpeg reports the failure
        stderr = (stderr + chunk).slice(-8192);
      });

      child.on('error', (error) => {
        reject(new TranscodeFailedError(null, error.message));
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        const reason = signal ? `terminated by ${signal}\n${stderr}` : stderr;
        reject(new TranscodeFailedError(code, reason));
      });
    });
  }
}
