import { createRequire } from 'node:module';
import path from 'node:path';
import { createWorker, OEM } from 'tesseract.js';
import logger from '../common/logger.js';
import { AiService } from './ai.service.js';

const OCR_LANGUAGE = 'eng';
// layout of @tesseract.js-data/eng matching the LSTM engine
const LANG_DATA_DIR = '4.0.0_best_int';

/**
 * Language data ships as an npm package so the worker never hits the CDN.
 */
export const resolveLangPath = (): string => {
  const require = createRequire(import.meta.url);
  return path.join(path.dirname(require.resolve('@tesseract.js-data/eng/package.json')), LANG_DATA_DIR);
};

export class OcrService {
  constructor(
    private readonly ai: Pick<AiService, 'extractTextFromImage'>,
    private readonly langPath: () => string = resolveLangPath,
  ) {}

  /**
   * Tesseract first, the vision model when it reads nothing.
   */
  async extractText(jpeg: Buffer): Promise<string> {
    const text = await this.recognize(jpeg);
    if (text) {
      logger.info({ textLength: text.length, engine: 'tesseract' }, 'Image text extracted');
      return text;
    }

    return this.ai.extractTextFromImage(`data:image/jpeg;base64,${jpeg.toString('base64')}`);
  }

  private async recognize(image: Buffer): Promise<string> {
    try {
      const worker = await createWorker(OCR_LANGUAGE, OEM.LSTM_ONLY, {
        langPath: this.langPath(),
        cacheMethod: 'none',
      });
      try {
        const { data } = await worker.recognize(image);
        return data.text.trim();
      } finally {
        await worker.terminate();
      }
    } catch (error) {
      logger.warn({ error }, 'Tesseract OCR failed, falling back to the vision model');
      return '';
    }
  }
}
