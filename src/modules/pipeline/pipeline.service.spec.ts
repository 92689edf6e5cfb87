import { Test, TestingModule } from '@nestjs/testing';
import { AudioTrack } from '../../common/interfaces/subtitle.interface';
import { AbortedError } from '../../common/errors/pipeline.errors';
import { VadService } from '../segmenter/vad.service';
import { SPEECH_BACKENDS, RecognizeOptions, RecognizedSpeech, SpeechBackend } from '../transcriber/speech-backend.interface';
import { SpeechBackendRegistry } from '../transcriber/speech-backend.registry';
import { TranscriberService } from '../transcriber/transcriber.service';
import { NumberedLine } from '../translation/numbered-lines';
import { CompleteOptions, TRANSLATION_BACKENDS, TranslationBackend } from '../translation/translation-backend.interface';
import { TranslationBackendRegistry } from '../translation/translation-backend.registry';
import { TranslationBatcherService } from '../translation/translation-batcher.service';
import { SubtitleAssemblerService } from '../subtitles/subtitle-assembler.service';
import { PipelineService } from './pipeline.service';
import { RunConfig } from './pipeline.types';

const SAMPLE_RATE = 16000;

function buildTrack(durationMs: number, speech: Array<[number, number]>): AudioTrack {
  const samples = new Float32Array((durationMs * SAMPLE_RATE) / 1000);
  for (const [from, to] of speech) {
    samples.fill(0.5, (from * SAMPLE_RATE) / 1000, (to * SAMPLE_RATE) / 1000);
  }
  return { sampleRate: SAMPLE_RATE, samples };
}

const clipMs = (audio: Buffer) => (audio.length - 44) / 2 / (SAMPLE_RATE / 1000);

const runConfig: RunConfig = {
  speechEngine: 'fake-speech',
  translationEngine: 'fake-llm',
  useVad: true,
  segmenter: { silenceThresholdDb: -40, minSpeechDurationMs: 250, minSilenceGapMs: 1000, paddingMs: 0, frameMs: 20 },
  transcriber: { maxConcurrency: 2, maxRetries: 1, backoffBaseMs: 1, maxFailureRatio: 0.5 },
  translation: {
    batchSize: 10,
    targetLanguage: 'Simplified Chinese',
    maxRetries: 1,
    backoffBaseMs: 1,
    maxConcurrency: 2,
  },
  subtitles: { minCueDurationMs: 1000, minGapMs: 40 },
};

describe('PipelineService', () => {
  let service: PipelineService;
  let recognize: jest.Mock<Promise<RecognizedSpeech[]>, [Buffer, RecognizeOptions]>;
  let complete: jest.Mock<Promise<string>, [string, readonly NumberedLine[], CompleteOptions]>;
  const sleep = () => Promise.resolve();

  beforeEach(async () => {
    recognize = jest.fn<Promise<RecognizedSpeech[]>, [Buffer, RecognizeOptions]>(async (audio) => [
      { start: 0, end: clipMs(audio), text: clipMs(audio) === 2000 ? 'Good morning' : 'See you tomorrow' },
    ]);
    complete = jest.fn<Promise<string>, [string, readonly NumberedLine[], CompleteOptions]>(async (_prompt, lines) =>
      lines.map((line) => `Line ${line.number}: [zh] ${line.text}`).join('\n'),
    );

    const speech: SpeechBackend = { name: 'fake-speech', isAvailable: () => true, recognize };
    const llm: TranslationBackend = { name: 'fake-llm', isAvailable: () => true, complete };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PipelineService,
        VadService,
        TranscriberService,
        TranslationBatcherService,
        SubtitleAssemblerService,
        SpeechBackendRegistry,
        TranslationBackendRegistry,
        { provide: SPEECH_BACKENDS, useValue: [speech] },
        { provide: TRANSLATION_BACKENDS, useValue: [llm] },
      ],
    }).compile();

    service = module.get<PipelineService>(PipelineService);
  });

  it('should turn speech into aligned bilingual cues', async () => {
    const onProgress = jest.fn();
    const track = buildTrack(10_000, [
      [1000, 3000],
      [5000, 9000],
    ]);

    const result = await service.run({ audioTrack: track, title: 'Morning' }, runConfig, { onProgress, sleep });

    expect(result.cues.bilingual).toEqual([
      { start: 1000, end: 3000, translatedLine: '[zh] Good morning', originalLine: 'Good morning' },
      { start: 5000, end: 9000, translatedLine: '[zh] See you tomorrow', originalLine: 'See you tomorrow' },
    ]);
    expect(result.cues.translatedOnly.map((cue) => [cue.start, cue.end])).toEqual([
      [1000, 3000],
      [5000, 9000],
    ]);
    expect(result.diagnostics).toEqual({
      segmentCount: 2,
      clipCount: 2,
      transcriptionFailures: [],
      translationFallbacks: [],
      degraded: false,
    });
    expect(onProgress.mock.calls.map(([progress]) => progress.stage)).toEqual([
      'segmentation',
      'transcription',
      'transcription',
      'translation',
      'assembly',
    ]);
  });

  it('should succeed with no cues for a silent track', async () => {
    const result = await service.run({ audioTrack: buildTrack(5000, []), title: 'Silence' }, runConfig, { sleep });

    expect(result.cues.bilingual).toEqual([]);
    expect(result.cues.translatedOnly).toEqual([]);
    expect(result.diagnostics.degraded).toBe(false);
    expect(recognize).not.toHaveBeenCalled();
    expect(complete).not.toHaveBeenCalled();
  });

  it('should send the whole track when VAD is off', async () => {
    await service.run({ audioTrack: buildTrack(10_000, [[1000, 3000]]), title: 'Whole' }, { ...runConfig, useVad: false }, {
      sleep,
    });

    expect(recognize).toHaveBeenCalledTimes(1);
    expect(clipMs(recognize.mock.calls[0][0])).toBe(10_000);
  });

  it('should mark the run degraded when a batch keeps the original text', async () => {
    complete.mockResolvedValue('I cannot help with that.');
    const track = buildTrack(10_000, [[1000, 3000]]);

    const result = await service.run({ audioTrack: track, title: 'Degraded' }, runConfig, { sleep });

    expect(result.diagnostics.degraded).toBe(true);
    expect(result.diagnostics.translationFallbacks).toHaveLength(1);
    expect(result.cues.translatedOnly).toEqual([
      { start: 1000, end: 3000, translatedLine: 'Good morning', originalLine: 'Good morning' },
    ]);
    expect(result.cues.bilingual).toEqual([
      { start: 1000, end: 3000, translatedLine: 'Good morning', originalLine: 'Good morning' },
    ]);
  });

  it('should fail fast on an unknown backend', async () => {
    await expect(
      service.run({ audioTrack: buildTrack(1000, []), title: 'x' }, { ...runConfig, speechEngine: 'nope' }),
    ).rejects.toMatchObject({ kind: 'permanent', message: 'Unknown speech backend: nope' });
  });

  it('should stop when cancelled during transcription', async () => {
    const controller = new AbortController();
    recognize.mockImplementation(() => {
      controller.abort();
      return new Promise<RecognizedSpeech[]>(() => undefined);
    });
    const track = buildTrack(10_000, [
      [1000, 3000],
      [5000, 9000],
    ]);

    await expect(
      service.run({ audioTrack: track, title: 'Cancelled' }, runConfig, { signal: controller.signal, sleep }),
    ).rejects.toBeInstanceOf(AbortedError);
    expect(complete).not.toHaveBeenCalled();
  });
});
