import { describe, expect, it } from 'vitest';
import { CHAR_ROLE, DELETED_IDENTITY, ParticipantLabeler, normalizeIdentity } from './labeler.js';

describe('ParticipantLabeler', () => {
  it('assigns labels in first-seen order starting at 1', () => {
    const labeler = new ParticipantLabeler('target');
    expect(labeler.labelFor('alice')).toBe('random_user_1');
    expect(labeler.labelFor('bob')).toBe('random_user_2');
    expect(labeler.labelFor('carol')).toBe('random_user_3');
  });

  it('previews the next label without recording the author', () => {
    const labeler = new ParticipantLabeler('target');
    expect(labeler.peek('alice')).toBe('random_user_1');
    expect(labeler.peek('bob')).toBe('random_user_1');
    expect(labeler.peek('Target')).toBe(CHAR_ROLE);
    expect(labeler.entries()).toEqual([]);

    labeler.labelFor('bob');
    expect(labeler.peek('BOB')).toBe('random_user_1');
    expect(labeler.peek('alice')).toBe('random_user_2');
  });

  it('returns the same label for repeated authors', () => {
    const labeler = new ParticipantLabeler('target');
    const first = labeler.labelFor('alice');
    labeler.labelFor('bob');
    expect(labeler.labelFor('alice')).toBe(first);
    expect(labeler.labelFor('ALICE')).toBe(first);
  });

  it('never labels the target user as a random user', () => {
    const labeler = new ParticipantLabeler('Target');
    expect(labeler.labelFor('target')).toBe(CHAR_ROLE);
    expect(labeler.labelFor('TARGET')).toBe(CHAR_ROLE);
    expect(labeler.entries()).toEqual([]);
    expect(labeler.labelFor('alice')).toBe('random_user_1');
  });

  it('collapses deleted, removed and missing authors into one label', () => {
    const labeler = new ParticipantLabeler('target');
    const deleted = labeler.labelFor('[deleted]');
    expect(labeler.labelFor('[removed]')).toBe(deleted);
    expect(labeler.labelFor(null)).toBe(deleted);
    expect(labeler.labelFor(undefined)).toBe(deleted);
    expect(labeler.labelFor('')).toBe(deleted);
    expect(labeler.entries()).toEqual([{ identity: DELETED_IDENTITY, label: 'random_user_1' }]);
  });

  it('does not treat a deleted author as the target', () => {
    const labeler = new ParticipantLabeler('[deleted]');
    expect(labeler.isTarget('[deleted]')).toBe(false);
    expect(labeler.labelFor('[deleted]')).toBe('random_user_1');
  });

  it('yields the same label sequence when replayed with fresh state', () => {
    const authors = ['bob', 'alice', '[deleted]', 'bob', 'dave', 'alice'];
    const run = () => {
      const labeler = new ParticipantLabeler('target');
      return authors.map((author) => labeler.labelFor(author));
    };

    expect(run()).toEqual(run());
    expect(run()).toEqual([
      'random_user_1',
      'random_user_2',
      'random_user_3',
      'random_user_1',
      'random_user_4',
      'random_user_2',
    ]);
  });
});

describe('normalizeIdentity', () => {
  it('lowercases and trims names', () => {
    expect(normalizeIdentity('  Alice ')).toBe('alice');
  });

  it('maps deleted markers to the shared identity', () => {
    expect(normalizeIdentity('[Removed]')).toBe(DELETED_IDENTITY);
  });
});
