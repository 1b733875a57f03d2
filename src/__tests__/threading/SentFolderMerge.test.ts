/**
 * Unit Tests for the sent-folder merge
 */

import { ContainerArena } from '../../threading/ContainerArena';
import { mergeSentFolder, removeMergedCopies } from '../../threading/SentFolderMerge';
import { ThreadBuilder } from '../../threading/ThreadBuilder';
import { checkForestInvariants } from '../../threading/invariants';
import { Envelope } from '../../threading/types';
import { createTestEnvelope } from '../fixtures/envelopes';

describe('mergeSentFolder', () => {
  describe('through ThreadBuilder', () => {
    let inbox: Envelope[];
    let sent: Envelope[];

    beforeEach(() => {
      inbox = [createTestEnvelope({ message_id: 'A', date: 100, subject: 'Lunch' })];
      sent = [
        createTestEnvelope({ message_id: 'S1', in_reply_to: 'A', date: 200, subject: 'Re: Lunch' }),
        createTestEnvelope({ message_id: 'S2', in_reply_to: 'Z', date: 250, subject: 'Elsewhere' }),
        createTestEnvelope({ message_id: 'A', date: 100, subject: 'Lunch' }),
      ];
    });

    it('should attach a sent reply under the message it answers', () => {
      const builder = new ThreadBuilder();
      const forest = builder.build(inbox, sent);

      expect(inbox).toHaveLength(2);
      expect(inbox[1].message_id).toBe('S1');
      expect(inbox[1].thread).toBe(1);
      expect(forest.container(1).parent).toBe(0);
      expect(forest.container(0).date).toBe(200);
      expect(forest.roots).toEqual([0]);
      expect(forest.order).toEqual([0, 1]);
      expect(builder.getLastStats()?.sent_merged).toBe(1);
    });

    it('should copy sent messages instead of modifying them', () => {
      new ThreadBuilder().build(inbox, sent);

      expect(inbox[1]).not.toBe(sent[0]);
      expect(sent[0].thread).toBeNull();
    });

    it('should ignore unrelated sent messages and copies already in the mailbox', () => {
      const forest = new ThreadBuilder().build(inbox, sent);

      expect(inbox.map((e) => e.message_id)).toEqual(['A', 'S1']);
      expect(forest.lookup('S2')).toBeUndefined();
      expect(forest.lookup('Z')).toBeUndefined();
    });

    it('should fill a placeholder with the sent original', () => {
      const replies = [createTestEnvelope({ message_id: 'R', references: ['S'], date: 300 })];
      const sentOriginal = [createTestEnvelope({ message_id: 'S', date: 100 })];

      const forest = new ThreadBuilder().build(replies, sentOriginal);

      expect(forest.container(1).message).toBe(1);
      expect(forest.container(1).date).toBe(300);
      expect(forest.roots).toEqual([1]);
      expect(forest.order).toEqual([1, 0]);
      expect(forest.order.map((i) => forest.container(i).indentation)).toEqual([0, 1]);
      expect(checkForestInvariants(forest)).toEqual([]);
    });

    it('should hang a sent original under the message it replies to', () => {
      const mailbox = [
        createTestEnvelope({ message_id: 'R', references: ['S'], date: 200 }),
        createTestEnvelope({ message_id: 'X', date: 100 }),
      ];
      const sentOriginal = [createTestEnvelope({ message_id: 'S', in_reply_to: 'X', date: 150 })];

      const forest = new ThreadBuilder().build(mailbox, sentOriginal);

      expect(forest.container(1).message).toBe(2);
      expect(forest.container(1).parent).toBe(2);
      expect(forest.container(2).date).toBe(200);
      expect(forest.roots).toEqual([2]);
      expect(forest.order).toEqual([2, 1, 0]);
      expect(checkForestInvariants(forest)).toEqual([]);
    });

    it('should give the same forest when built again from the same inputs', () => {
      const mailbox = [
        createTestEnvelope({ message_id: 'R', references: ['S'], date: 200 }),
        createTestEnvelope({ message_id: 'X', date: 100 }),
      ];
      const sentOriginal = [createTestEnvelope({ message_id: 'S', in_reply_to: 'X', date: 150 })];
      const builder = new ThreadBuilder();

      const first = builder.build(mailbox, sentOriginal);
      const firstRoots = [...first.roots];
      const firstOrder = [...first.order];
      const second = builder.build(mailbox, sentOriginal);

      expect(mailbox.map((e) => e.message_id)).toEqual(['R', 'X', 'S']);
      expect(second.roots).toEqual(firstRoots);
      expect(second.order).toEqual(firstOrder);
      expect(second.container(1).parent).toBe(2);
      expect(builder.getLastStats()?.sent_merged).toBe(1);
    });

    it('should leave a sent original in place when its parent sits below it', () => {
      const mailbox = [createTestEnvelope({ message_id: 'X', references: ['S'], date: 100 })];
      const sentOriginal = [createTestEnvelope({ message_id: 'S', in_reply_to: 'X', date: 150 })];
      const builder = new ThreadBuilder();

      const forest = builder.build(mailbox, sentOriginal);

      expect(forest.container(1).message).toBe(1);
      expect(forest.container(1).parent).toBeNull();
      expect(forest.container(1).date).toBe(150);
      expect(forest.roots).toEqual([1]);
      expect(builder.getLastStats()?.refused_links).toBe(1);
      expect(checkForestInvariants(forest)).toEqual([]);
    });

    it('should skip the merge when it is switched off', () => {
      const forest = new ThreadBuilder({ merge_sent_folder: false }).build(inbox, sent);

      expect(inbox).toHaveLength(1);
      expect(forest.size).toBe(1);
    });

    it('should treat a missing sent folder as nothing to merge', () => {
      const forest = new ThreadBuilder().build(inbox, null);

      expect(inbox).toHaveLength(1);
      expect(forest.roots).toEqual([0]);
    });
  });

  describe('removeMergedCopies', () => {
    it('should take out only the copies a merge appended', () => {
      const inbox = [createTestEnvelope({ message_id: 'A', date: 100 })];
      new ThreadBuilder().build(inbox, [
        createTestEnvelope({ message_id: 'S1', in_reply_to: 'A', date: 200 }),
      ]);
      inbox.push(createTestEnvelope({ message_id: 'later', date: 300 }));

      expect(removeMergedCopies(inbox)).toBe(1);
      expect(inbox.map((e) => e.message_id)).toEqual(['A', 'later']);
    });

    it('should drop stale copies when rebuilding without the sent folder', () => {
      const inbox = [createTestEnvelope({ message_id: 'A', date: 100 })];
      const builder = new ThreadBuilder();
      builder.build(inbox, [createTestEnvelope({ message_id: 'S1', in_reply_to: 'A', date: 200 })]);

      const forest = builder.build(inbox);

      expect(inbox).toHaveLength(1);
      expect(forest.size).toBe(1);
    });
  });

  describe('statistics', () => {
    it('should count merged, duplicate and ignored messages', () => {
      const arena = new ContainerArena();
      const collection = [createTestEnvelope({ message_id: 'A', date: 100 })];
      arena.bindMessage(arena.getOrCreate('A'), 0, 100);
      collection[0].thread = 0;

      const stats = mergeSentFolder(arena, collection, [
        createTestEnvelope({ message_id: 'S1', in_reply_to: 'A', date: 200 }),
        createTestEnvelope({ message_id: 'S2', in_reply_to: 'A', date: 210 }),
        createTestEnvelope({ message_id: 'A', date: 100 }),
        createTestEnvelope({ message_id: 'S3', date: 220 }),
      ]);

      expect(stats).toEqual({ merged: 2, duplicates: 1, ignored: 1, refused_links: 0 });
      expect(arena.children(0)).toEqual([1, 2]);
      expect(arena.get(0).date).toBe(210);
    });

    it('should give a sent reply without Message-ID a container of its own', () => {
      const arena = new ContainerArena();
      const collection = [createTestEnvelope({ message_id: 'A', date: 100 })];
      arena.bindMessage(arena.getOrCreate('A'), 0, 100);
      collection[0].thread = 0;

      const stats = mergeSentFolder(arena, collection, [
        createTestEnvelope({ message_id: '', in_reply_to: 'A', date: 200 }),
      ]);

      expect(stats.merged).toBe(1);
      expect(arena.size).toBe(2);
      expect(arena.get(1).parent).toBe(0);
      expect(Array.from(arena.entries())).toEqual([['A', 0]]);
      expect(collection[1].thread).toBe(1);
    });
  });
});
