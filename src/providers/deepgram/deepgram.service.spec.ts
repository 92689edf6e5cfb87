import { ConfigService } from '@nestjs/config';
import { DeepgramService } from './deepgram.service';

describe('DeepgramService', () => {
  let service: DeepgramService;
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    service = new DeepgramService(new ConfigService({ deepgram: { apiKey: 'test-secret', model: 'nova-3' } }));
    service.onModuleInit();
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should use utterances when present', async () => {
    fetchSpy.mockResolvedValue(
      new Response(
        JSON.stringify({
          metadata: { duration: 4.5 },
          results: {
            utterances: [
              { start: 0.5, end: 1.75, confidence: 0.98, transcript: 'Good morning.' },
              { start: 2.1, end: 4.2, confidence: 0.9, transcript: 'Welcome back.' },
            ],
            channels: [{ alternatives: [{ transcript: 'Good morning. Welcome back.', words: [] }] }],
          },
        }),
        { status: 200 },
      ),
    );

    const result = await service.recognize(Buffer.alloc(44), { language: 'en' });

    expect(result).toEqual([
      { start: 500, end: 1750, text: 'Good morning.', confidence: 0.98 },
      { start: 2100, end: 4200, text: 'Welcome back.', confidence: 0.9 },
    ]);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://api.deepgram.com/v1/listen?model=nova-3&punctuate=true&utterances=true&language=en');
    expect(init.headers).toMatchObject({ Authorization: 'Token test-secret', 'Content-Type': 'audio/wav' });
  });

  it('should ask for language detection when no language is given', async () => {
    fetchSpy.mockResolvedValue(new Response(JSON.stringify({ results: {} }), { status: 200 }));

    await expect(service.recognize(Buffer.alloc(44), {})).resolves.toEqual([]);
    expect(String(fetchSpy.mock.calls[0][0])).toContain('detect_language=true');
  });

  it('should build sentences from words split by long pauses', () => {
    const segments = service.extractSegments({
      duration: 5,
      utterances: [],
      words: [
        { word: 'hi', punctuated_word: 'Hi', start: 0, end: 0.4, confidence: 1 },
        { word: 'there', punctuated_word: 'there.', start: 0.5, end: 0.9, confidence: 0.8 },
        { word: 'later', start: 2.5, end: 3, confidence: 0.6 },
      ],
    });

    expect(segments).toEqual([
      { start: 0, end: 900, text: 'Hi there.', confidence: 0.9 },
      { start: 2500, end: 3000, text: 'later', confidence: 0.6 },
    ]);
  });

  it('should treat rate limiting as transient and auth failures as permanent', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('slow down', { status: 429 }));
    await expect(service.recognize(Buffer.alloc(44), {})).rejects.toMatchObject({ kind: 'transient', status: 429 });

    fetchSpy.mockResolvedValueOnce(new Response('bad key', { status: 401 }));
    await expect(service.recognize(Buffer.alloc(44), {})).rejects.toMatchObject({ kind: 'permanent', status: 401 });
  });

  it('should treat network failures as transient', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

    await expect(service.recognize(Buffer.alloc(44), {})).rejects.toMatchObject({
      kind: 'transient',
      message: 'Deepgram request failed: fetch failed',
    });
  });
});
