/**
 * Failures the user can act on. `userMessage` is sent back to the chat as-is,
 * `message` is what ends up in the logs.
 */
export class BotError extends Error {
  constructor(
    message: string,
    readonly userMessage: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class FileTooLargeError extends BotError {
  constructor(size: number, limit: number) {
    super(
      `File size ${size} exceeds maximum ${limit}`,
      `❌ File bahut badi hai! Max ${Math.floor(limit / (1024 * 1024))} MB tak bhejo.`,
    );
  }
}

export class UnsupportedFileError extends BotError {
  constructor(mimeType: string) {
    super(
      `Unsupported file type: ${mimeType}`,
      '❌ Ye file type abhi support nahi hai. PDF ya image bhejo!',
    );
  }
}

export class InsufficientTextError extends BotError {
  constructor(length: number) {
    super(
      `PDF contains insufficient readable text (${length} chars)`,
      '❌ PDF me readable text nahi mila! Scanned PDF ho toh photo bhejo.',
    );
  }
}

export class QuizGenerationError extends BotError {
  constructor(reason: string) {
    super(
      `Quiz generation failed: ${reason}`,
      '❌ PDF se quiz generate nahi kar paya. Koi aur file try karo!',
    );
  }
}

export class NoTextInImageError extends BotError {
  constructor() {
    super(
      'No text extracted from image',
      '❌ Image me kuch padh nahi paya. Clear image bhejo!',
    );
  }
}

export class QuizAlreadyActiveError extends BotError {
  constructor(chatId: number) {
    super(
      `Group quiz already active in chat ${chatId}`,
      '🧠 <b>Quiz already active!</b>\n\nPehle current quiz complete karo.',
    );
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
