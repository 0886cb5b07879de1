import type { Exchange } from '../types/index.js';
import { collapseWhitespace, stripRedditMarkup } from '../utils/text.js';
import { CHAR_ROLE } from './labeler.js';

export const UNAVAILABLE_CONTENT = '[content unavailable]';

export interface FormatOptions {
  /** Strip Reddit markdown, quotes, links and u/ r/ references before rendering. */
  stripMarkup?: boolean;
}

export function roleToken(label: string): string {
  return `{{${label}}}`;
}

export function formatExchange(exchange: Exchange, options: FormatOptions = {}): string {
  const parent = cleanBody(exchange.parentBody, options) || UNAVAILABLE_CONTENT;
  const reply = cleanBody(exchange.replyBody, options) || UNAVAILABLE_CONTENT;
  return `${roleToken(exchange.parentLabel)}: ${parent}\n${roleToken(CHAR_ROLE)}: ${reply}\n\n`;
}

export function cleanBody(text: string, options: FormatOptions = {}): string {
  const source = options.stripMarkup ? stripRedditMarkup(text) : text;
  return collapseWhitespace(source);
}
