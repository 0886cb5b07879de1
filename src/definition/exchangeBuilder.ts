import type {
  DefinitionWarning,
  Exchange,
  ExchangeOrder,
  FilterReason,
  ParentKind,
  ParentLookup,
  RawItem,
} from '../types/index.js';
import { UNAVAILABLE_CONTENT, formatExchange } from './formatter.js';
import type { ParticipantLabeler } from './labeler.js';

const REMOVED_BODIES = new Set(['[deleted]', '[removed]']);

export interface ExchangeBuilderOptions {
  minCommentLength?: number;
  maxCommentLength?: number;
  /** Bounds on the text of a found parent. Unavailable parents are never filtered by length. */
  minParentLength?: number;
  maxParentLength?: number;
  /** Longest formatted block (both dialog lines) an exchange may produce. */
  maxBlockLength?: number;
  stripMarkup?: boolean;
  order?: ExchangeOrder;
}

export interface ExchangeBuildResult {
  exchanges: Exchange[];
  warnings: DefinitionWarning[];
}

type Pairing =
  | { accepted: false; warning: DefinitionWarning }
  | {
      accepted: true;
      parentBody: string;
      parentKind: ParentKind;
      parentAuthor: string | null;
      unavailable: DefinitionWarning | null;
    };

/**
 * Pairs each of the target's comments with the thing it replied to.
 *
 * Replies to the target's own comments are skipped rather than walked up,
 * since there is no second speaker. Parents that are gone produce an
 * exchange with placeholder text; parents that could not be looked up at all
 * drop the comment. A participant is only labeled once their exchange passes
 * every filter.
 */
export function buildExchanges(
  comments: readonly RawItem[],
  resolveParent: ParentLookup,
  labeler: ParticipantLabeler,
  options: ExchangeBuilderOptions = {},
): ExchangeBuildResult {
  const exchanges: Exchange[] = [];
  const warnings: DefinitionWarning[] = [];

  comments.forEach((comment, order) => {
    const rejection = rejectComment(comment, labeler, options);
    if (rejection) {
      warnings.push({ kind: 'filtered', commentId: comment.id, reason: rejection });
      return;
    }

    const pairing = pairWithParent(comment, resolveParent, labeler, options);
    if (!pairing.accepted) {
      warnings.push(pairing.warning);
      return;
    }

    const exchange: Exchange = {
      commentId: comment.id,
      replyBody: comment.body,
      parentBody: pairing.parentBody,
      parentKind: pairing.parentKind,
      parentLabel: labeler.peek(pairing.parentAuthor),
      score: comment.score,
      createdUtc: comment.createdUtc,
      order,
    };

    if (
      options.maxBlockLength !== undefined &&
      formatExchange(exchange, { stripMarkup: options.stripMarkup ?? false }).length > options.maxBlockLength
    ) {
      warnings.push({ kind: 'filtered', commentId: comment.id, reason: 'block-too-long' });
      return;
    }

    if (pairing.unavailable) {
      warnings.push(pairing.unavailable);
    }
    labeler.labelFor(pairing.parentAuthor);
    exchanges.push(exchange);
  });

  return { exchanges: sortExchanges(exchanges, options.order ?? 'recent'), warnings };
}

function pairWithParent(
  comment: RawItem,
  resolveParent: ParentLookup,
  labeler: ParticipantLabeler,
  options: ExchangeBuilderOptions,
): Pairing {
  if (!comment.parentId) {
    return unavailablePairing({ kind: 'parent-unavailable', commentId: comment.id, parentId: null });
  }

  const resolution = resolveParent(comment.parentId);
  if (resolution.status === 'failed') {
    return {
      accepted: false,
      warning: {
        kind: 'parent-unresolved',
        commentId: comment.id,
        parentId: comment.parentId,
        reason: resolution.reason,
      },
    };
  }
  if (resolution.status === 'missing') {
    return unavailablePairing({ kind: 'parent-unavailable', commentId: comment.id, parentId: comment.parentId });
  }

  const parent = resolution.item;
  if (labeler.isTarget(parent.author)) {
    return { accepted: false, warning: { kind: 'self-reply', commentId: comment.id, parentId: parent.id } };
  }

  const parentBody = parentText(parent, options.maxParentLength);
  if (!parentBody) {
    return {
      accepted: true,
      parentBody: UNAVAILABLE_CONTENT,
      parentKind: parent.kind,
      parentAuthor: parent.author,
      unavailable: { kind: 'parent-unavailable', commentId: comment.id, parentId: parent.id },
    };
  }

  if (options.minParentLength !== undefined && parentBody.length < options.minParentLength) {
    return { accepted: false, warning: { kind: 'filtered', commentId: comment.id, reason: 'parent-too-short' } };
  }
  if (options.maxParentLength !== undefined && parentBody.length > options.maxParentLength) {
    return { accepted: false, warning: { kind: 'filtered', commentId: comment.id, reason: 'parent-too-long' } };
  }

  return { accepted: true, parentBody, parentKind: parent.kind, parentAuthor: parent.author, unavailable: null };
}

function unavailablePairing(warning: DefinitionWarning): Pairing {
  return { accepted: true, parentBody: UNAVAILABLE_CONTENT, parentKind: 'unavailable', parentAuthor: null, unavailable: warning };
}

/**
 * Text spoken by a parent. For a post this is the title, followed by the self
 * text when there is some and it is shorter than `maxSelfTextLength`.
 */
export function parentText(parent: RawItem, maxSelfTextLength?: number): string {
  const body = isRemoved(parent.body) ? '' : parent.body.trim();
  if (parent.kind === 'comment') {
    return body;
  }

  const title = parent.title?.trim() ?? '';
  const selfText = maxSelfTextLength === undefined || body.length < maxSelfTextLength ? body : '';
  return [title, selfText].filter(Boolean).join('\n');
}

function rejectComment(
  comment: RawItem,
  labeler: ParticipantLabeler,
  options: ExchangeBuilderOptions,
): FilterReason | null {
  if (!labeler.isTarget(comment.author)) {
    return 'not-target';
  }

  const body = comment.body.trim();
  if (!body) {
    return 'empty';
  }
  if (isRemoved(body)) {
    return 'deleted';
  }
  if (options.minCommentLength !== undefined && body.length < options.minCommentLength) {
    return 'too-short';
  }
  if (options.maxCommentLength !== undefined && body.length > options.maxCommentLength) {
    return 'too-long';
  }
  return null;
}

function isRemoved(body: string): boolean {
  return REMOVED_BODIES.has(body.trim());
}

function sortExchanges(exchanges: Exchange[], order: ExchangeOrder): Exchange[] {
  if (order === 'recent') {
    return exchanges;
  }

  return [...exchanges].sort(
    (a, b) =>
      Math.max(b.score, 0) - Math.max(a.score, 0) ||
      a.parentBody.length + a.replyBody.length - (b.parentBody.length + b.replyBody.length) ||
      a.order - b.order,
  );
}
