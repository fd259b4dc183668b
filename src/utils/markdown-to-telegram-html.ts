import { escapeHtml, escapeHtmlAttribute } from './html.js';

type Rule = [RegExp, (...groups: string[]) => string];

// Applied in order to already-escaped text; code spans are stashed beforehand.
const INLINE_RULES: Rule[] = [
  [/^([ \t]*)[-*+][ \t]+/gm, (_m, indent) => `${indent}• `],
  [
    /\[([^\]\n]+)\]\(([^)\s]+)\)/g,
    (_m, label, url) => `<a href="${url.replaceAll('"', '&quot;')}">${label.trim()}</a>`,
  ],
  [/\*\*([^*\n][\s\S]*?)\*\*/g, (_m, inner) => `<b>${inner}</b>`],
  [/__([^_\n][\s\S]*?)__/g, (_m, inner) => `<u>${inner}</u>`],
  [
    /(^|[\s([])\*([^*\n][^*]*?)\*(?=$|[\s).!?,;:\]])/gm,
    (_m, lead, inner) => `${lead}<i>${inner}</i>`,
  ],
  [
    /(^|[\s([])_([^_\n][^_]*?)_(?=$|[\s).!?,;:\]])/gm,
    (_m, lead, inner) => `${lead}<i>${inner}</i>`,
  ],
  [/~~([^~\n][\s\S]*?)~~/g, (_m, inner) => `<s>${inner}</s>`],
  [/^#{1,6}\s+(.+)$/gm, (_m, title) => `<b>${title}</b>`],
];

/**
 * Converts the markdown subset models usually answer with into the HTML
 * flavour Telegram accepts. Telegram has no list tags so bullets become "•".
 */
export const markdownToTelegramHtml = (markdown: string): string => {
  if (!markdown) return '';

  const stash: string[] = [];
  const keep = (html: string): string => {
    stash.push(html);
    return `\u0000${stash.length - 1}\u0000`;
  };

  let text = markdown
    .replace(/```([a-zA-Z0-9_+-]*)\n([\s\S]*?)```/g, (_m, lang: string, code: string) => {
      const attr = lang ? ` language="${escapeHtmlAttribute(lang.toLowerCase())}"` : '';
      return keep(`<pre${attr}>${escapeHtml(code)}</pre>`);
    })
    .replace(/`([^`\n]+)`/g, (_m, code: string) => keep(`<code>${escapeHtml(code)}</code>`));

  text = escapeHtml(text);
  for (const [pattern, replace] of INLINE_RULES) {
    text = text.replace(pattern, replace);
  }

  return text.replace(/\u0000(\d+)\u0000/g, (_m, index: string) => stash[Number(index)] ?? '');
};
