import { SubtitleCue } from '../../common/interfaces/subtitle.interface';
import {
  formatSrtTimestamp,
  formatVttTimestamp,
  parseSrt,
  parseSubtitles,
  parseTimestamp,
  parseVtt,
  renderSrt,
  renderVtt,
} from './subtitle-format';

const cues: SubtitleCue[] = [
  { start: 0, end: 1500, translatedLine: '你好', originalLine: 'Hello' },
  { start: 2000, end: 3000, originalLine: 'OK' },
];

describe('subtitle format', () => {
  it('should format timestamps', () => {
    expect(formatSrtTimestamp(3_723_004)).toBe('01:02:03,004');
    expect(formatVttTimestamp(3_723_004)).toBe('01:02:03.004');
    expect(formatSrtTimestamp(0)).toBe('00:00:00,000');
  });

  it('should render bilingual SRT with the translation above the original', () => {
    expect(renderSrt(cues, 'bilingual')).toBe(
      '1\n00:00:00,000 --> 00:00:01,500\n你好\nHello\n\n' + '2\n00:00:02,000 --> 00:00:03,000\nOK\n\n',
    );
  });

  it('should render translated-only SRT', () => {
    expect(renderSrt(cues, 'translated')).toBe(
      '1\n00:00:00,000 --> 00:00:01,500\n你好\n\n' + '2\n00:00:02,000 --> 00:00:03,000\nOK\n\n',
    );
  });

  it('should render WebVTT', () => {
    expect(renderVtt(cues, 'bilingual')).toBe(
      'WEBVTT\n\n00:00:00.000 --> 00:00:01.500\n你好\nHello\n\n00:00:02.000 --> 00:00:03.000\nOK\n',
    );
  });

  it('should parse SRT with a byte order mark and CRLF line endings', () => {
    const content =
      '\uFEFF1\r\n00:00:01,000 --> 00:00:02,500\r\nHello\r\nworld\r\n\r\n2\r\n00:00:03,000 --> 00:00:04,000\r\nBye\r\n';

    expect(parseSrt(content)).toEqual([
      { start: 1000, end: 2500, text: 'Hello\nworld' },
      { start: 3000, end: 4000, text: 'Bye' },
    ]);
  });

  it('should parse WebVTT and skip header and notes', () => {
    const content = 'WEBVTT\n\nNOTE generated\n\n00:01.000 --> 00:02.000 align:start\nHi\n';

    expect(parseVtt(content)).toEqual([{ start: 1000, end: 2000, text: 'Hi' }]);
    expect(parseSubtitles(content)).toEqual([{ start: 1000, end: 2000, text: 'Hi' }]);
  });

  it('should read what it renders', () => {
    expect(parseSubtitles(renderSrt(cues, 'bilingual'))).toEqual([
      { start: 0, end: 1500, text: '你好\nHello' },
      { start: 2000, end: 3000, text: 'OK' },
    ]);
  });

  it('should reject malformed timestamps', () => {
    expect(() => parseTimestamp('not a time')).toThrow('Invalid timestamp: not a time');
  });
});
