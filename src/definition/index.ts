import type { AssembledDefinition, DefinitionWarning, ExchangeOrder, ParentLookup, RawItem } from '../types/index.js';
import { DEFAULT_MAX_CHARS, assembleDefinition, definitionHeader } from './assembler.js';
import { buildExchanges } from './exchangeBuilder.js';
import { formatExchange } from './formatter.js';
import { ParticipantLabeler } from './labeler.js';

export interface BuildDefinitionOptions {
  resolveParent: ParentLookup;
  maxChars?: number;
  minCommentLength?: number;
  maxCommentLength?: number;
  minParentLength?: number;
  maxParentLength?: number;
  maxBlockLength?: number;
  order?: ExchangeOrder;
  stripMarkup?: boolean;
  /** Overrides the default introduction placed before the dialog examples. */
  header?: string;
}

export function buildDefinition(
  username: string,
  comments: readonly RawItem[],
  options: BuildDefinitionOptions,
): AssembledDefinition {
  const maxChars = options.maxChars ?? DEFAULT_MAX_CHARS;
  const labeler = new ParticipantLabeler(username);
  const { exchanges, warnings } = buildExchanges(comments, options.resolveParent, labeler, {
    ...(options.minCommentLength !== undefined ? { minCommentLength: options.minCommentLength } : {}),
    ...(options.maxCommentLength !== undefined ? { maxCommentLength: options.maxCommentLength } : {}),
    ...(options.minParentLength !== undefined ? { minParentLength: options.minParentLength } : {}),
    ...(options.maxParentLength !== undefined ? { maxParentLength: options.maxParentLength } : {}),
    ...(options.maxBlockLength !== undefined ? { maxBlockLength: options.maxBlockLength } : {}),
    ...(options.order ? { order: options.order } : {}),
    stripMarkup: options.stripMarkup ?? false,
  });

  const blocks = exchanges.map((exchange) => formatExchange(exchange, { stripMarkup: options.stripMarkup ?? false }));
  const header = options.header ?? definitionHeader(username);
  const assembly = assembleDefinition(header, blocks, maxChars);

  const allWarnings: DefinitionWarning[] = [...warnings];
  if (assembly.truncated) {
    allWarnings.push({ kind: 'truncated', included: assembly.included, excluded: blocks.length - assembly.included });
  }
  if (assembly.included === 0) {
    allWarnings.push({ kind: 'no-exchanges' });
  }

  return {
    text: assembly.text,
    length: assembly.text.length,
    maxChars,
    includedExchanges: assembly.included,
    totalExchanges: exchanges.length,
    truncated: assembly.truncated,
    labels: labeler.entries(),
    warnings: allWarnings,
  };
}

export { DEFAULT_MAX_CHARS, DefinitionAssembler, DefinitionCeilingError, definitionHeader } from './assembler.js';
export { ParticipantLabeler } from './labeler.js';
export { formatExchange } from './formatter.js';
export { buildExchanges } from './exchangeBuilder.js';
