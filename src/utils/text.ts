export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

const URL_PATTERN = /https?:\/\/[^\s)\]]+/g;

/**
 * Removes Reddit markdown and references that read badly in a dialog line.
 * Line structure is kept so quoted lines can still be dropped one by one.
 */
export function stripRedditMarkup(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .replace(/\*\*(.+?)\*\*/g, '$1')
    .replace(/\*(.+?)\*/g, '$1')
    .replace(/~~(.+?)~~/g, '$1')
    .replace(/\^\((.+?)\)/g, '$1')
    .replace(/\^(\S+)/g, '$1')
    .replace(/`(.+?)`/g, '$1')
    .replace(/^\s*(?:&gt;|>).*$/gm, '')
    .replace(URL_PATTERN, '')
    .replace(/(?:^|(?<=\s))\/?u\/[A-Za-z0-9_-]+/g, '')
    .replace(/(?:^|(?<=\s))\/?r\/[A-Za-z0-9_]+/g, '')
    .replace(/\s*\bedit\s*(?:\d+)?\s*:.*$/gim, '');
}
