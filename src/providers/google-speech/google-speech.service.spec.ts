import { ConfigService } from '@nestjs/config';
import { encodeWav } from '../../common/utils/wav';
import { GoogleSpeechService, groupWords, languageCode, parseDuration } from './google-speech.service';

const word = (text: string, start: number) => ({ word: text, start, end: start + 300 });

describe('google speech helpers', () => {
  it('should parse duration strings', () => {
    expect(parseDuration('1.500s')).toBe(1500);
    expect(parseDuration('2s')).toBe(2000);
    expect(parseDuration(undefined)).toBe(0);
  });

  it('should map short language codes', () => {
    expect(languageCode('th')).toBe('th-TH');
    expect(languageCode('zh')).toBe('zh-CN');
    expect(languageCode('pt-BR')).toBe('pt-BR');
    expect(languageCode(undefined)).toBe('en-US');
  });

  it('should group words at punctuation once a sentence has five words', () => {
    const words = ['We', 'went', 'to', 'the', 'market.', 'It', 'was', 'busy.'].map((w, i) => word(w, i * 400));

    expect(groupWords(words)).toEqual([
      { start: 0, end: 1900, text: 'We went to the market.' },
      { start: 2000, end: 3100, text: 'It was busy.' },
    ]);
  });

  it('should cut long runs at twelve words', () => {
    const words = Array.from({ length: 14 }, (_, i) => word(`w${i}`, i * 100));

    const segments = groupWords(words);

    expect(segments.map((s) => s.text.split(' ').length)).toEqual([12, 2]);
  });
});

describe('GoogleSpeechService', () => {
  let service: GoogleSpeechService;
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    service = new GoogleSpeechService(new ConfigService({ google: { apiKey: 'test-secret' } }));
    service.onModuleInit();
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should send LINEAR16 audio with the sample rate from the WAV header', async () => {
    fetchSpy.mockResolvedValue(
      new Response(
        JSON.stringify({
          results: [
            {
              alternatives: [
                {
                  transcript: 'hello world',
                  words: [
                    { word: 'hello', startTime: '0.100s', endTime: '0.500s' },
                    { word: 'world', startTime: '0.600s', endTime: '1s' },
                  ],
                },
              ],
            },
          ],
        }),
        { status: 200 },
      ),
    );

    const result = await service.recognize(encodeWav(new Float32Array(8000), 8000), { language: 'en' });

    expect(result).toEqual([{ start: 100, end: 1000, text: 'hello world' }]);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://speech.googleapis.com/v1/speech:recognize?key=test-secret');
    const body = JSON.parse(String(init.body));
    expect(body.config).toMatchObject({ encoding: 'LINEAR16', sampleRateHertz: 8000, languageCode: 'en-US' });
  });

  it('should use the transcript for the whole clip without word offsets', () => {
    expect(
      service.parseResponse({ results: [{ alternatives: [{ transcript: ' just text ' }] }] }, 4000),
    ).toEqual([{ start: 0, end: 4000, text: 'just text' }]);
  });

  it('should classify HTTP failures', async () => {
    fetchSpy.mockResolvedValue(new Response('forbidden', { status: 403 }));

    await expect(service.recognize(encodeWav(new Float32Array(160), 16000), {})).rejects.toMatchObject({
      kind: 'permanent',
      status: 403,
    });
  });
});
