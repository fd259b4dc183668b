import sharp from 'sharp';
import { describe, it, expect, vi } from 'vitest';
import { NoTextInImageError } from '../common/errors.js';
import {
  ImageSolverService,
  buildOverlaySvg,
  lineCharsForWidth,
  parseSolution,
  solutionLines,
  wrapText,
} from './image-solver.service.js';

const whiteImage = (): Promise<Buffer> =>
  sharp({ create: { width: 200, height: 100, channels: 3, background: '#ffffff' } }).png().toBuffer();

describe('wrapText', () => {
  it('wraps on word boundaries', () => {
    expect(wrapText('Step 1: x plus y equals ten', 10)).toEqual(['Step 1: x', 'plus y', 'equals ten']);
  });

  it('splits words longer than a line', () => {
    expect(wrapText('abcdefghijkl mn', 5)).toEqual(['abcde', 'fghij', 'kl mn']);
  });

  it('derives the line length from the image width', () => {
    expect(lineCharsForWidth(200)).toBe(20);
    expect(lineCharsForWidth(1000)).toBe(59);
  });
});

describe('parseSolution', () => {
  it('reads fenced json', () => {
    const raw = '```json\n{"steps":["x + 2 = 4","x = 2"],"finalAnswer":"x = 2"}\n```';

    expect(parseSolution(raw)).toEqual({ steps: ['x + 2 = 4', 'x = 2'], finalAnswer: 'x = 2' });
  });

  it('keeps plain replies as steps', () => {
    expect(parseSolution('Pehle dono side se 2 ghatao.\n\nx = 2')).toEqual({
      steps: ['Pehle dono side se 2 ghatao.', 'x = 2'],
      finalAnswer: '',
    });
  });

  it('numbers steps and appends the answer', () => {
    expect(solutionLines({ steps: ['a', 'b'], finalAnswer: '42' })).toEqual([
      'Solution:',
      'Step 1: a',
      'Step 2: b',
      'Answer: 42',
    ]);
  });
});

describe('buildOverlaySvg', () => {
  it('escapes text and sizes the panel', () => {
    const svg = buildOverlaySvg(['a < b & c'], 300, { font: 'Segoe Print', colour: '#1565c0' });

    expect(svg).toContain('<svg xmlns="http://www.w3.org/2000/svg" width="300" height="120">');
    expect(svg).toContain('<text x="40" y="80">a &lt; b &amp; c</text>');
    expect(svg).toContain(`font-family="'Segoe Print', 'Comic Sans MS',`);
    expect(svg).toContain('fill="#1565c0"');
  });
});

describe('ImageSolverService', () => {
  it('renders the solution below the image', async () => {
    const ai = {
      solveProblem: vi.fn().mockResolvedValue('{"steps":["2 se divide karo"],"finalAnswer":"x = 2"}'),
    };
    const ocr = { extractText: vi.fn<(jpeg: Buffer) => Promise<string>>().mockResolvedValue('2x = 4') };
    const service = new ImageSolverService(ai, ocr, () => 0);

    const result = await service.solve(await whiteImage());
    const metadata = await sharp(result.image).metadata();

    const ocrInput = await sharp(ocr.extractText.mock.calls[0]?.[0]).metadata();
    expect(ocrInput.format).toBe('jpeg');
    expect(ai.solveProblem).toHaveBeenCalledWith('2x = 4');
    expect(result.extractedText).toBe('2x = 4');
    expect(result.solution).toEqual({ steps: ['2 se divide karo'], finalAnswer: 'x = 2' });
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(200);
    // four wrapped lines: 80px padding + 4 * 40px
    expect(metadata.height).toBe(340);
  });

  it('fails when no text is found', async () => {
    const ai = { solveProblem: vi.fn() };
    const ocr = { extractText: vi.fn().mockResolvedValue('  ') };
    const service = new ImageSolverService(ai, ocr, () => 0);

    await expect(service.solve(await whiteImage())).rejects.toBeInstanceOf(NoTextInImageError);
    expect(ai.solveProblem).not.toHaveBeenCalled();
  });
});
