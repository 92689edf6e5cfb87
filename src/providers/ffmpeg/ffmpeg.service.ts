import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { spawn } from 'child_process';
import { existsSync } from 'fs';
import { AudioTrack } from '../../common/interfaces/subtitle.interface';
import { AbortedError, DecodeError } from '../../common/errors/pipeline.errors';
import { pcm16ToFloat32 } from '../../common/utils/wav';

export const DECODE_SAMPLE_RATE = 16000;

@Injectable()
export class FfmpegService {
  private readonly logger = new Logger(FfmpegService.name);
  private readonly ffmpegPath: string;

  constructor(private configService: ConfigService) {
    this.ffmpegPath = this.configService.get<string>('ffmpeg.path') || 'ffmpeg';
  }

  /**
   * 用 ffmpeg 把任意音视频文件解码为 16kHz 单声道 PCM
   */
  async decode(filePath: string, signal?: AbortSignal): Promise<AudioTrack> {
    if (!existsSync(filePath)) {
      throw new DecodeError(`Audio file not found: ${filePath}`);
    }
    if (signal?.aborted) {
      throw new AbortedError();
    }

    const args = ['-nostdin', '-i', filePath, '-vn', '-ac', '1', '-ar', String(DECODE_SAMPLE_RATE), '-f', 's16le', '-'];
    this.logger.log(`Decoding ${filePath}`);

    const pcm = await new Promise<Buffer>((resolve, reject) => {
      const proc = spawn(this.ffmpegPath, args);
      const chunks: Buffer[] = [];
      let stderr = '';
      let aborted = false;

      const onAbort = () => {
        aborted = true;
        proc.kill('SIGTERM');
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      proc.stdout.on('data', (data: Buffer) => {
        chunks.push(data);
      });

      proc.stderr.on('data', (data: Buffer) => {
        // 只保留末尾部分，ffmpeg 的进度输出很长
        stderr = (stderr + data.toString()).slice(-2000);
      });

      proc.on('close', (code) => {
        signal?.removeEventListener('abort', onAbort);
        if (aborted) {
          reject(new AbortedError());
        } else if (code === 0) {
          resolve(Buffer.concat(chunks));
        } else {
          this.logger.error(`ffmpeg exited with code ${code}: ${stderr}`);
          reject(new DecodeError(`ffmpeg failed to decode ${filePath}: ${stderr.trim().split('\n').pop() ?? ''}`));
        }
      });

      proc.on('error', (err) => {
        signal?.removeEventListener('abort', onAbort);
        this.logger.error(`ffmpeg spawn error: ${err.message}`);
        reject(new DecodeError(`Failed to spawn ffmpeg: ${err.message}`));
      });
    });

    if (pcm.length < 2) {
      throw new DecodeError(`No audio stream decoded from ${filePath}`);
    }

    const samples = pcm16ToFloat32(pcm);
    this.logger.log(`Decoded ${(samples.length / DECODE_SAMPLE_RATE).toFixed(1)}s of audio from ${filePath}`);
    return { sampleRate: DECODE_SAMPLE_RATE, samples };
  }
}
