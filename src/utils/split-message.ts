export const TELEGRAM_MESSAGE_LIMIT = 4096;

const SEPARATORS = ['\n\n', '\n', ' '];

/**
 * Splits text into pieces whose rendered form fits one Telegram message.
 * Breaks at paragraphs first, then lines, then words. A word that alone is
 * too long gets cut.
 */
export const splitMessage = (
  text: string,
  render: (piece: string) => string = (piece) => piece,
  limit: number = TELEGRAM_MESSAGE_LIMIT,
): string[] => {
  const fits = (piece: string): boolean => render(piece).length <= limit;

  const cut = (piece: string): string[] => {
    const parts: string[] = [];
    let rest = piece;
    while (rest) {
      let size = Math.min(rest.length, limit);
      while (size > 1 && !fits(rest.slice(0, size))) {
        size = Math.min(size - 1, Math.floor((size * limit) / render(rest.slice(0, size)).length));
      }
      parts.push(rest.slice(0, size));
      rest = rest.slice(size);
    }
    return parts;
  };

  const pack = (piece: string, level: number): string[] => {
    if (fits(piece)) return [piece];
    const separator = SEPARATORS[level];
    if (separator === undefined) return cut(piece);

    const parts: string[] = [];
    let current = '';
    for (const part of piece.split(separator)) {
      const candidate = current ? `${current}${separator}${part}` : part;
      if (fits(candidate)) {
        current = candidate;
        continue;
      }
      if (current) parts.push(current);
      if (fits(part)) {
        current = part;
      } else {
        parts.push(...pack(part, level + 1));
        current = '';
      }
    }
    if (current) parts.push(current);
    return parts;
  };

  return pack(text, 0).filter((piece) => piece.trim().length > 0);
};
