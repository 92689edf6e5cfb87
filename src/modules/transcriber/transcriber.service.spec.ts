import { Test, TestingModule } from '@nestjs/testing';
import { AudioSegment } from '../../common/interfaces/subtitle.interface';
import {
  AbortedError,
  BackendError,
  TranscriptionFailedError,
} from '../../common/errors/pipeline.errors';
import { RecognizeOptions, RecognizedSpeech, SpeechBackend } from './speech-backend.interface';
import { TranscriberConfig, TranscriberService } from './transcriber.service';

const SAMPLE_RATE = 16000;

function segment(start: number, end: number): AudioSegment {
  return {
    start,
    end,
    sampleRate: SAMPLE_RATE,
    samples: new Float32Array(((end - start) * SAMPLE_RATE) / 1000),
  };
}

/**
 * 由 WAV 大小反推片段时长（毫秒），用来区分测试中的各个片段
 */
function clipMs(audio: Buffer): number {
  return (audio.length - 44) / 2 / (SAMPLE_RATE / 1000);
}

type Recognize = (audio: Buffer, options: RecognizeOptions) => Promise<RecognizedSpeech[]>;

function fakeBackend(recognize: Recognize, maxClipMs?: number) {
  const mock = jest.fn(recognize);
  const backend: SpeechBackend = {
    name: 'fake',
    maxClipMs,
    isAvailable: () => true,
    recognize: mock,
  };
  return { backend, recognize: mock };
}

describe('TranscriberService', () => {
  let service: TranscriberService;
  let sleep: jest.Mock<Promise<void>, [number, AbortSignal?]>;
  const config: TranscriberConfig = {
    maxConcurrency: 2,
    maxRetries: 2,
    backoffBaseMs: 10,
    maxFailureRatio: 0.5,
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [TranscriberService],
    }).compile();

    service = module.get<TranscriberService>(TranscriberService);
    sleep = jest.fn<Promise<void>, [number, AbortSignal?]>().mockResolvedValue(undefined);
  });

  it('should shift clip-relative times by the segment start', async () => {
    const { backend } = fakeBackend(async (audio) =>
      clipMs(audio) === 2000
        ? [{ start: 0, end: 1500, text: 'Hello there' }]
        : [
            { start: 200, end: 1800, text: 'First part' },
            { start: 2000, end: 3900, text: 'Second part' },
          ],
    );

    const result = await service.transcribe([segment(1000, 3000), segment(5000, 9000)], backend, config, { sleep });

    expect(result.utterances).toEqual([
      { index: 0, start: 1000, end: 2500, text: 'Hello there' },
      { index: 1, start: 5200, end: 6800, text: 'First part' },
      { index: 2, start: 7000, end: 8900, text: 'Second part' },
    ]);
    expect(result.failures).toEqual([]);
    expect(result.clipCount).toBe(2);
  });

  it('should clamp times to the clip and drop empty or low-confidence text', async () => {
    const { backend } = fakeBackend(async () => [
      { start: 0, end: 5000, text: '  Long line  ' },
      { start: 100, end: 200, text: '   ' },
      { start: 300, end: 400, text: 'noise', confidence: 0.05 },
    ]);

    const result = await service.transcribe([segment(1000, 3000)], backend, { ...config, minConfidence: 0.1 }, { sleep });

    expect(result.utterances).toEqual([{ index: 0, start: 1000, end: 3000, text: 'Long line' }]);
  });

  it('should retry a transient failure and keep the clip', async () => {
    let calls = 0;
    const { backend, recognize } = fakeBackend(async () => {
      calls++;
      if (calls === 1) {
        throw BackendError.transient('upstream 503', 503);
      }
      return [{ start: 0, end: 500, text: 'recovered' }];
    });

    const result = await service.transcribe([segment(0, 1000)], backend, config, { sleep });

    expect(recognize).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10, expect.any(AbortSignal));
    expect(result.utterances.map((u) => u.text)).toEqual(['recovered']);
    expect(result.failures).toEqual([]);
  });

  it('should skip a clip that keeps failing and record it', async () => {
    const { backend } = fakeBackend(async (audio) => {
      if (clipMs(audio) === 2000) {
        throw BackendError.transient('upstream 503', 503);
      }
      return [{ start: 0, end: 500, text: `clip of ${clipMs(audio)}ms` }];
    });

    const result = await service.transcribe(
      [segment(0, 1000), segment(2000, 4000), segment(5000, 8000)],
      backend,
      config,
      { sleep },
    );

    expect(result.utterances).toEqual([
      { index: 0, start: 0, end: 500, text: 'clip of 1000ms' },
      { index: 1, start: 5000, end: 5500, text: 'clip of 3000ms' },
    ]);
    expect(result.failures).toEqual([{ clip: 1, start: 2000, end: 4000, attempts: 3, message: 'upstream 503' }]);
  });

  it('should fail the run when too many clips fail', async () => {
    const { backend } = fakeBackend(async () => {
      throw BackendError.transient('timeout');
    });

    await expect(
      service.transcribe([segment(0, 1000), segment(2000, 3000)], backend, config, { sleep }),
    ).rejects.toBeInstanceOf(TranscriptionFailedError);
  });

  it('should tolerate a failure ratio equal to the threshold', async () => {
    const { backend } = fakeBackend(async (audio) => {
      if (clipMs(audio) === 1000) {
        throw BackendError.transient('timeout');
      }
      return [{ start: 0, end: 100, text: 'ok' }];
    });

    const result = await service.transcribe([segment(0, 1000), segment(2000, 4000)], backend, config, { sleep });

    expect(result.failures).toHaveLength(1);
    expect(result.utterances).toHaveLength(1);
  });

  it('should abort the run on a permanent error', async () => {
    const { backend, recognize } = fakeBackend(async () => {
      throw BackendError.permanent('invalid api key', 401);
    });

    await expect(
      service.transcribe([segment(0, 1000), segment(2000, 3000), segment(4000, 5000)], backend, {
        ...config,
        maxConcurrency: 1,
      }),
    ).rejects.toMatchObject({ kind: 'permanent', message: 'invalid api key' });
    expect(recognize).toHaveBeenCalledTimes(1);
  });

  it('should keep segment order regardless of completion order', async () => {
    const segments = [0, 1, 2, 3, 4].map((i) => segment(i * 2000, i * 2000 + 1000 + i * 100));
    const { backend } = fakeBackend(async (audio) => {
      const ms = clipMs(audio);
      // 越靠前的片段越晚返回
      await new Promise((resolve) => setTimeout(resolve, 60 - (ms - 1000) / 10));
      return [{ start: 0, end: 500, text: `clip ${(ms - 1000) / 100}` }];
    });

    const result = await service.transcribe(segments, backend, { ...config, maxConcurrency: 5 }, { sleep });

    expect(result.utterances.map((u) => u.text)).toEqual(['clip 0', 'clip 1', 'clip 2', 'clip 3', 'clip 4']);
    expect(result.utterances.map((u) => u.index)).toEqual([0, 1, 2, 3, 4]);
  });

  it('should split clips longer than the backend limit', async () => {
    const { backend, recognize } = fakeBackend(
      async (audio) => [{ start: 0, end: 400, text: `${clipMs(audio)}ms` }],
      1000,
    );

    const result = await service.transcribe([segment(0, 2500)], backend, config, { sleep });

    expect(recognize).toHaveBeenCalledTimes(3);
    expect(result.utterances).toEqual([
      { index: 0, start: 0, end: 400, text: '1000ms' },
      { index: 1, start: 1000, end: 1400, text: '1000ms' },
      { index: 2, start: 2000, end: 2400, text: '500ms' },
    ]);
  });

  it('should split long segments into contiguous clips', () => {
    const clips = service.splitLongSegments([segment(0, 2500)], 1000);

    expect(clips.map(({ start, end, samples }) => [start, end, samples.length])).toEqual([
      [0, 1000, 16000],
      [1000, 2000, 16000],
      [2000, 2500, 8000],
    ]);
  });

  it('should report progress per clip', async () => {
    const { backend } = fakeBackend(async () => [{ start: 0, end: 100, text: 'ok' }]);
    const onProgress = jest.fn();

    await service.transcribe([segment(0, 1000), segment(2000, 3000)], backend, config, { sleep, onProgress });

    expect(onProgress).toHaveBeenCalledTimes(2);
    expect(onProgress).toHaveBeenLastCalledWith({ stage: 'transcription', completed: 2, total: 2 });
  });

  it('should not call the backend when already cancelled', async () => {
    const { backend, recognize } = fakeBackend(async () => []);
    const controller = new AbortController();
    controller.abort();

    await expect(
      service.transcribe([segment(0, 1000)], backend, config, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(AbortedError);
    expect(recognize).not.toHaveBeenCalled();
  });

  it('should return nothing for no segments', async () => {
    const { backend, recognize } = fakeBackend(async () => []);

    await expect(service.transcribe([], backend, config)).resolves.toEqual({
      utterances: [],
      failures: [],
      clipCount: 0,
    });
    expect(recognize).not.toHaveBeenCalled();
  });
});
