import { Injectable, Logger } from '@nestjs/common';
import { AudioSegment, AudioTrack } from '../../common/interfaces/subtitle.interface';
import { throwIfAborted } from '../../common/utils/retry-policy';
import { VadService } from '../segmenter/vad.service';
import { SpeechBackendRegistry } from '../transcriber/speech-backend.registry';
import { TranscriberService } from '../transcriber/transcriber.service';
import { TranslationBackendRegistry } from '../translation/translation-backend.registry';
import { TranslationBatcherService } from '../translation/translation-batcher.service';
import { SubtitleAssemblerService } from '../subtitles/subtitle-assembler.service';
import { PipelineInput, PipelineResult, RunConfig, RunOptions } from './pipeline.types';

@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private vadService: VadService,
    private speechBackends: SpeechBackendRegistry,
    private transcriberService: TranscriberService,
    private translationBackends: TranslationBackendRegistry,
    private translationBatcher: TranslationBatcherService,
    private assembler: SubtitleAssemblerService,
  ) {}

  /**
   * 切分 → 转录 → 翻译 → 组装
   * 每个阶段只读取上一阶段的结果，取消信号在阶段之间和阶段内部都会检查
   */
  async run(input: PipelineInput, config: RunConfig, options: RunOptions = {}): Promise<PipelineResult> {
    const { signal, onProgress } = options;
    throwIfAborted(signal);

    // 先解析后端，凭据缺失时不必解码和切分
    const speechBackend = this.speechBackends.get(config.speechEngine);
    const translationBackend = this.translationBackends.get(config.translationEngine);

    this.logger.log(
      `Run "${input.title}" started: speech=${speechBackend.name}, translation=${translationBackend.name}, ` +
        `target=${config.translation.targetLanguage}`,
    );

    // 1. 切分
    const segments = config.useVad
      ? this.vadService.segment(input.audioTrack, config.segmenter)
      : this.wholeTrack(input.audioTrack);
    onProgress?.({ stage: 'segmentation', completed: 1, total: 1 });
    throwIfAborted(signal);

    // 2. 转录
    const transcription = await this.transcriberService.transcribe(segments, speechBackend, config.transcriber, {
      signal,
      onProgress,
      sleep: options.sleep,
    });
    throwIfAborted(signal);

    // 3. 翻译
    const translation = await this.translationBatcher.translate(
      transcription.utterances,
      translationBackend,
      config.translation,
      { signal, onProgress, sleep: options.sleep, random: options.random },
    );
    throwIfAborted(signal);

    // 4. 组装
    const cues = this.assembler.assemble(translation.units, transcription.utterances, config.subtitles);
    onProgress?.({ stage: 'assembly', completed: 1, total: 1 });

    const degraded = transcription.failures.length > 0 || translation.fallbacks.length > 0;
    this.logger.log(
      `Run "${input.title}" finished: ${segments.length} segments, ${cues.bilingual.length} cues` +
        (degraded
          ? ` (degraded: ${transcription.failures.length} clips skipped, ` +
            `${translation.fallbacks.length} batches kept original text)`
          : ''),
    );

    return {
      title: input.title,
      cues,
      utterances: transcription.utterances,
      units: translation.units,
      diagnostics: {
        segmentCount: segments.length,
        clipCount: transcription.clipCount,
        transcriptionFailures: transcription.failures,
        translationFallbacks: translation.fallbacks,
        degraded,
      },
    };
  }

  private wholeTrack(track: AudioTrack): AudioSegment[] {
    if (track.samples.length === 0) {
      return [];
    }
    return [
      {
        start: 0,
        end: Math.round((track.samples.length * 1000) / track.sampleRate),
        sampleRate: track.sampleRate,
        samples: track.samples,
      },
    ];
  }
}
