import type { ParticipantLabel } from '../types/index.js';

export const CHAR_ROLE = 'char';
export const DELETED_IDENTITY = '[deleted]';

const DELETED_AUTHORS = new Set(['', '[deleted]', '[removed]']);

/**
 * Hands out `random_user_N` labels to everyone the target user talks to.
 *
 * Identities are compared case-insensitively. Every deleted, removed or
 * missing author shares a single identity, so they collapse to one label
 * within a run.
 */
export class ParticipantLabeler {
  private readonly target: string;
  private readonly labels = new Map<string, string>();
  private readonly order: ParticipantLabel[] = [];

  constructor(targetUsername: string) {
    this.target = normalizeIdentity(targetUsername);
  }

  labelFor(author: string | null | undefined): string {
    const label = this.peek(author);
    const identity = normalizeIdentity(author);
    if (label === CHAR_ROLE || this.labels.has(identity)) {
      return label;
    }

    this.labels.set(identity, label);
    this.order.push({ identity, label });
    return label;
  }

  /** The label `labelFor` would return, without recording a new participant. */
  peek(author: string | null | undefined): string {
    if (this.isTarget(author)) {
      return CHAR_ROLE;
    }
    return this.labels.get(normalizeIdentity(author)) ?? `random_user_${this.labels.size + 1}`;
  }

  isTarget(author: string | null | undefined): boolean {
    const identity = normalizeIdentity(author);
    return identity !== DELETED_IDENTITY && identity === this.target;
  }

  entries(): ParticipantLabel[] {
    return this.order.map((entry) => ({ ...entry }));
  }
}

export function normalizeIdentity(author: string | null | undefined): string {
  const trimmed = author?.trim() ?? '';
  if (DELETED_AUTHORS.has(trimmed.toLowerCase())) {
    return DELETED_IDENTITY;
  }
  return trimmed.toLowerCase();
}
