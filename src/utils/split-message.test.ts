import { describe, it, expect } from 'vitest';
import { splitMessage } from './split-message.js';

describe('splitMessage', () => {
  it('keeps short text whole', () => {
    expect(splitMessage('hello')).toEqual(['hello']);
  });

  it('breaks at paragraphs before lines and words', () => {
    expect(splitMessage('aaa\n\nbbb', undefined, 5)).toEqual(['aaa', 'bbb']);
    expect(splitMessage('aaaa bbbb cccc', undefined, 9)).toEqual(['aaaa bbbb', 'cccc']);
  });

  it('cuts words longer than a message', () => {
    expect(splitMessage('abcdefghij', undefined, 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('measures the rendered length', () => {
    const render = (piece: string) => piece.replaceAll('&', '&amp;');

    expect(splitMessage('&&&&', render, 10)).toEqual(['&&', '&&']);
  });

  it('fits a long reply into Telegram messages', () => {
    const pieces = splitMessage(`${'a'.repeat(3000)}\n\n${'b'.repeat(3000)}`);

    expect(pieces).toEqual(['a'.repeat(3000), 'b'.repeat(3000)]);
  });
});
