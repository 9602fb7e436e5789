import fs from 'fs';
import os from 'os';
import path from 'path';
import { processSubtitles } from '../../packages/main/services/subtitle-processing';
import { FileManager } from '../../packages/main/services/file-manager';
import { loadConfig } from '../../packages/main/config';
import { NoSpeechDetectedError } from '../../packages/main/errors';
import { buildSrt } from '../../packages/shared/helpers';
import type { TextRequest } from '../../packages/shared/types/app';
import { FakeTextService, Handler } from '../helpers/fakes';

const SOURCE_LINES = [
  { id: 1, start: 0, end: 1, text: '那我們今天' },
  { id: 2, start: 1, end: 2, text: '來講極限' },
  { id: 3, start: 2, end: 3, text: '下禮拜要考試' },
  { id: 4, start: 3, end: 4, text: 'x趨近於無限大' },
];

const REWRITES: Record<string, { output: string; shouldMergeNext: boolean }> = {
  那我們今天: { output: '我們今天', shouldMergeNext: true },
  來講極限: { output: '講極限', shouldMergeNext: false },
  x趨近於無限大: { output: 'x → ∞', shouldMergeNext: false },
};

function currentLine(request: TextRequest): string {
  const match = request.prompt.match(/^CURRENT LINE: (.*)$/m);
  return match ? match[1] : '';
}

const rewrite: Handler = request => {
  const reply = REWRITES[currentLine(request)];
  if (!reply) throw new Error('upstream timeout');
  return JSON.stringify(reply);
};

describe('processSubtitles', () => {
  let dir: string;
  let srtPath: string;
  const config = loadConfig(
    { openAiApiKey: 'test-secret', reviewWindowSize: 2, refineConcurrency: 3 },
    {}
  );

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'subs-test-'));
    srtPath = path.join(dir, 'lecture.srt');
    fs.writeFileSync(srtPath, buildSrt(SOURCE_LINES));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('refines, merges, reviews and reports a transcript', async () => {
    fs.writeFileSync(path.join(dir, 'lecture.pdf'), '%PDF-1.4');
    fs.writeFileSync(path.join(dir, 'lecture.txt'), 'Chapter 2: limits');
    fs.writeFileSync(path.join(dir, 'lecture.pptx'), '');

    const textService = new FakeTextService({
      global_summary: () =>
        JSON.stringify({ summary: 'Limits', styleGuide: 'Use ∞' }),
      line_rewrite: rewrite,
      window_review: request =>
        JSON.stringify({
          corrections: request.prompt.includes('1: 我們今天講極限')
            ? [{ id: 1, text: '我們今天來講極限' }]
            : [],
        }),
      off_topic_report: () =>
        JSON.stringify({
          segments: [
            {
              startTime: '00:00:02,000',
              endTime: '00:00:03,000',
              description: 'Exam logistics',
            },
          ],
        }),
    });

    const result = await processSubtitles({
      srtPath,
      config,
      services: { textService, fileManager: new FileManager(dir) },
      mathSymbols: 'pi -> π',
      operationId: 'test-op',
    });

    expect(textService.uploads).toEqual([path.join(dir, 'lecture.pdf')]);
    const refineRequest = textService.requests.find(
      r => r.schema.name === 'line_rewrite'
    );
    expect(refineRequest?.references).toEqual([
      { kind: 'file', name: 'lecture.pdf', fileId: 'file-1' },
      { kind: 'text', name: 'lecture.txt', text: 'Chapter 2: limits' },
    ]);
    expect(refineRequest?.system).toContain(
      'Summary: Limits\nKey Terms/Style: Use ∞'
    );
    const offTopicRequest = textService.requests.find(
      r => r.schema.name === 'off_topic_report'
    );
    expect(offTopicRequest?.references).toEqual(refineRequest?.references);

    expect(result.lineage).toEqual([
      { id: 1, sourceIds: [1, 2] },
      { id: 2, sourceIds: [3] },
      { id: 3, sourceIds: [4] },
    ]);
    expect(fs.readFileSync(result.draftPath, 'utf8')).toBe(
      '1\n00:00:00,000 --> 00:00:02,000\n我們今天講極限\n\n' +
        '2\n00:00:02,000 --> 00:00:03,000\n下禮拜要考試\n\n' +
        '3\n00:00:03,000 --> 00:00:04,000\nx → ∞\n'
    );
    expect(fs.readFileSync(result.refinedPath, 'utf8')).toBe(
      '1\n00:00:00,000 --> 00:00:02,000\n我們今天來講極限\n\n' +
        '2\n00:00:02,000 --> 00:00:03,000\n下禮拜要考試\n\n' +
        '3\n00:00:03,000 --> 00:00:04,000\nx → ∞\n'
    );
    expect(result.draftPath).toBe(path.join(dir, 'lecture_draft.srt'));
    expect(result.refinedPath).toBe(path.join(dir, 'lecture_refined.srt'));
    expect(result.reconcile).toEqual({
      windows: 2,
      failedWindows: 0,
      applied: 1,
      unchanged: 0,
      ignored: 0,
    });
    expect(result.tally.count()).toBe(1);
    expect(result.tally.count('refine')).toBe(1);

    expect(result.offTopicPath).toBe(path.join(dir, 'lecture_off_topic.txt'));
    expect(fs.readFileSync(path.join(dir, 'lecture_off_topic.txt'), 'utf8')).toBe(
      'Off-Topic Segments Report\nVideo: lecture\n' +
        '='.repeat(50) +
        '\n\n' +
        'Time: 00:00:02,000 - 00:00:03,000\nContent: Exam logistics\n' +
        '-'.repeat(30) +
        '\n'
    );
  });

  it('falls back to the default topic and skips the report when calls fail', async () => {
    const textService = new FakeTextService({
      global_summary: () => 'not json',
      line_rewrite: rewrite,
      window_review: () => JSON.stringify({ corrections: [] }),
      off_topic_report: () => {
        throw new Error('service unavailable');
      },
    });

    const result = await processSubtitles({
      srtPath,
      config,
      services: { textService, fileManager: new FileManager(dir) },
      mathSymbols: '',
      operationId: 'test-op',
    });

    const refineRequest = textService.requests.find(
      r => r.schema.name === 'line_rewrite'
    );
    expect(refineRequest?.system).toContain('Topic: Mathematics.');
    expect(result.offTopicPath).toBeUndefined();
    expect(fs.existsSync(path.join(dir, 'lecture_off_topic.txt'))).toBe(false);
    expect(result.tally.summarize()).toBe('summary: 1, refine: 1, off-topic: 1');
    expect(result.lines.map(l => l.text)).toEqual([
      '我們今天講極限',
      '下禮拜要考試',
      'x → ∞',
    ]);
  });

  it('refuses an empty subtitle file', async () => {
    fs.writeFileSync(srtPath, '');
    await expect(
      processSubtitles({
        srtPath,
        config,
        services: {
          textService: new FakeTextService(),
          fileManager: new FileManager(dir),
        },
        mathSymbols: '',
        operationId: 'test-op',
      })
    ).rejects.toBeInstanceOf(NoSpeechDetectedError);
  });
});
