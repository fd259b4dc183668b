import sharp from 'sharp';
import { z } from 'zod';
import { NoTextInImageError } from '../common/errors.js';
import logger from '../common/logger.js';
import { parseJsonLoose } from '../utils/json.js';
import { AiService } from './ai.service.js';
import { OcrService } from './ocr.service.js';

export interface Solution {
  steps: string[];
  finalAnswer: string;
}

export interface SolvedImage {
  image: Buffer;
  extractedText: string;
  solution: Solution;
}

const MAX_WIDTH = 1920;
const MAX_HEIGHT = 1080;
const FONT_SIZE = 28;
const LINE_HEIGHT = 40;
const PADDING = 40;
const MIN_LINE_CHARS = 20;
// average glyph width relative to font size for the handwriting fonts
const CHAR_WIDTH_RATIO = 0.55;
const PAPER_COLOUR = '#fffdf5';
const RULE_COLOUR = '#c5d5ea';
const MARGIN_COLOUR = '#f2a0a0';

const HANDWRITING_FONTS = [
  'Comic Sans MS',
  'Brush Script MT',
  'Lucida Handwriting',
  'Segoe Print',
  'Bradley Hand ITC',
  'Kristen ITC',
  'Tempus Sans ITC',
];

const PEN_COLOURS = ['#d32f2f', '#e64a19', '#1565c0', '#2e7d32', '#6a1b9a', '#c2185b', '#0d47a1'];

const solutionSchema = z.object({
  steps: z.array(z.coerce.string()).default([]),
  finalAnswer: z.coerce.string().default(''),
});

/**
 * Greedy word wrap. Words longer than `maxChars` are split.
 */
export const wrapText = (text: string, maxChars: number): string[] => {
  const lines: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    const pieces: string[] = [];
    for (let i = 0; i < word.length; i += maxChars) {
      pieces.push(word.slice(i, i + maxChars));
    }

    for (const piece of pieces) {
      const candidate = current ? `${current} ${piece}` : piece;
      if (candidate.length > maxChars) {
        lines.push(current);
        current = piece;
      } else {
        current = candidate;
      }
    }
  }

  if (current) lines.push(current);
  return lines;
};

export const escapeXml = (input: string): string =>
  input
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&apos;');

/**
 * Reads the solver reply. A reply that is not the expected JSON is kept as
 * plain steps, one per non-empty line.
 */
export const parseSolution = (raw: string): Solution => {
  const parsed = solutionSchema.safeParse(parseJsonLoose(raw));
  if (parsed.success && (parsed.data.steps.length > 0 || parsed.data.finalAnswer)) {
    return {
      steps: parsed.data.steps.map((s) => s.trim()).filter((s) => s.length > 0),
      finalAnswer: parsed.data.finalAnswer.trim(),
    };
  }

  return {
    steps: raw
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0),
    finalAnswer: '',
  };
};

export const solutionLines = (solution: Solution): string[] => [
  'Solution:',
  ...solution.steps.map((step, i) => `Step ${i + 1}: ${step}`),
  ...(solution.finalAnswer ? [`Answer: ${solution.finalAnswer}`] : []),
];

export const lineCharsForWidth = (width: number): number =>
  Math.max(MIN_LINE_CHARS, Math.floor((width - PADDING * 2) / (FONT_SIZE * CHAR_WIDTH_RATIO)));

export const panelHeightFor = (lineCount: number): number => PADDING * 2 + lineCount * LINE_HEIGHT;

export interface OverlayStyle {
  font: string;
  colour: string;
}

export const buildOverlaySvg = (lines: string[], width: number, style: OverlayStyle): string => {
  const height = panelHeightFor(lines.length);
  const fontFamily = [style.font, ...HANDWRITING_FONTS.filter((f) => f !== style.font)]
    .map((f) => `'${f}'`)
    .concat('cursive')
    .join(', ');

  const rules = Array.from({ length: lines.length + 1 }, (_, i) => {
    const y = PADDING + i * LINE_HEIGHT + 8;
    return `<line x1="0" y1="${y}" x2="${width}" y2="${y}" stroke="${RULE_COLOUR}" stroke-width="1"/>`;
  });

  const text = lines.map((line, i) => {
    const y = PADDING + (i + 1) * LINE_HEIGHT;
    return `<text x="${PADDING}" y="${y}">${escapeXml(line)}</text>`;
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`,
    `<rect width="${width}" height="${height}" fill="${PAPER_COLOUR}"/>`,
    ...rules,
    `<line x1="${PADDING - 12}" y1="0" x2="${PADDING - 12}" y2="${height}" stroke="${MARGIN_COLOUR}" stroke-width="2"/>`,
    `<g font-family="${fontFamily}" font-size="${FONT_SIZE}" fill="${style.colour}">`,
    ...text,
    '</g>',
    '</svg>',
  ].join('\n');
};

export class ImageSolverService {
  constructor(
    private readonly ai: Pick<AiService, 'solveProblem'>,
    private readonly ocr: Pick<OcrService, 'extractText'>,
    private readonly rng: () => number = Math.random,
  ) {}

  async solve(input: Buffer): Promise<SolvedImage> {
    const { data, info } = await sharp(input)
      .rotate()
      .resize({ width: MAX_WIDTH, height: MAX_HEIGHT, fit: 'inside', withoutEnlargement: true })
      .jpeg({ quality: 90 })
      .toBuffer({ resolveWithObject: true });

    logger.info({ width: info.width, height: info.height, size: info.size }, 'Image preprocessed');

    const extractedText = await this.ocr.extractText(data);
    if (!extractedText.trim()) {
      throw new NoTextInImageError();
    }

    const solution = parseSolution(await this.ai.solveProblem(extractedText));
    const image = await this.render(data, info.width, info.height, solution);

    logger.info(
      { textLength: extractedText.length, steps: solution.steps.length },
      'Problem solved and rendered',
    );
    return { image, extractedText, solution };
  }

  private async render(image: Buffer, width: number, height: number, solution: Solution): Promise<Buffer> {
    const lines = solutionLines(solution).flatMap((line) => wrapText(line, lineCharsForWidth(width)));
    const style: OverlayStyle = { font: this.pick(HANDWRITING_FONTS), colour: this.pick(PEN_COLOURS) };
    const svg = buildOverlaySvg(lines, width, style);

    const extended = await sharp(image)
      .extend({ bottom: panelHeightFor(lines.length), background: PAPER_COLOUR })
      .toBuffer();

    return sharp(extended)
      .composite([{ input: Buffer.from(svg), top: height, left: 0 }])
      .jpeg({ quality: 90 })
      .toBuffer();
  }

  private pick(options: string[]): string {
    return options[Math.floor(this.rng() * options.length)] ?? options[0] ?? '';
  }
}
