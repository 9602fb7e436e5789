import {
  buildSrt,
  charLength,
  formatTranscriptLine,
  parseSrt,
  secondsToSrtTime,
  srtTimeToSeconds,
  stripExtension,
} from '../../packages/shared/helpers';

const SAMPLE =
  '7\n00:00:01,000 --> 00:00:02,500\n大家好\n\n' +
  '9\n00:01:02,345 --> 00:01:04,010\nfirst line\nsecond line\n';

describe('SRT helpers', () => {
  it('parses blocks keeping their ids and every text line', () => {
    expect(parseSrt(SAMPLE)).toEqual([
      { id: 7, start: 1, end: 2.5, text: '大家好' },
      {
        id: 9,
        start: srtTimeToSeconds('00:01:02,345'),
        end: srtTimeToSeconds('00:01:04,010'),
        text: 'first line\nsecond line',
      },
    ]);
  });

  it('round-trips untouched timestamps exactly', () => {
    expect(buildSrt(parseSrt(SAMPLE))).toBe(SAMPLE);
  });

  it('accepts CRLF line endings and a byte order mark', () => {
    const lines = parseSrt('\uFEFF1\r\n00:00:00,000 --> 00:00:01,234\r\nHi\r\n');
    expect(lines).toHaveLength(1);
    expect(lines[0].id).toBe(1);
    expect(lines[0].text).toBe('Hi');
    expect(lines[0].end).toBeCloseTo(1.234, 6);
  });

  it('returns nothing for blank input', () => {
    expect(parseSrt('  \n')).toEqual([]);
    expect(buildSrt([])).toBe('');
  });

  it('formats seconds as SRT timestamps', () => {
    expect(secondsToSrtTime(3661.5)).toBe('01:01:01,500');
    expect(secondsToSrtTime(0.0004)).toBe('00:00:00,000');
    expect(secondsToSrtTime(-1)).toBe('00:00:00,000');
  });

  it('formats a transcript line with its time range', () => {
    expect(
      formatTranscriptLine({ id: 1, start: 1.5, end: 3, text: '今天考試' })
    ).toBe('[00:00:01,500 --> 00:00:03,000] 今天考試');
  });

  it('counts code points rather than UTF-16 units', () => {
    expect(charLength('數學')).toBe(2);
    expect(charLength('𝑥²')).toBe(2);
    expect('𝑥²'.length).toBe(3);
  });

  it('strips only the final extension', () => {
    expect(stripExtension('/videos/a.b/lecture.mp4')).toBe('/videos/a.b/lecture');
    expect(stripExtension('/videos/a.b/lecture')).toBe('/videos/a.b/lecture');
  });
});
