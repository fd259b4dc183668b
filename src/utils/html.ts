export const escapeHtml = (input: string): string =>
  input
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;');

export const escapeHtmlAttribute = (input: string): string =>
  escapeHtml(input).replaceAll('"', '&quot;');

export const truncate = (text: string, max: number): string =>
  text.length > max ? `${text.slice(0, max)}...` : text;
