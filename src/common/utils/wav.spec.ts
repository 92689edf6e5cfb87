import { encodeWav, pcm16ToFloat32 } from './wav';

describe('wav', () => {
  it('should write a 16-bit mono PCM header', () => {
    const wav = encodeWav(new Float32Array(100), 16000);

    expect(wav.length).toBe(44 + 200);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(40)).toBe(200);
  });

  it('should clamp samples and convert back', () => {
    const wav = encodeWav(Float32Array.from([0, 0.5, -1, 2]), 8000);

    expect(wav.readInt16LE(44)).toBe(0);
    expect(wav.readInt16LE(46)).toBe(16384);
    expect(wav.readInt16LE(48)).toBe(-32768);
    expect(wav.readInt16LE(50)).toBe(32767);

    const samples = pcm16ToFloat32(wav.subarray(44));
    expect(samples[1]).toBe(0.5);
    expect(samples[2]).toBe(-1);
  });
});
