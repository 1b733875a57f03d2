/**
 * Sent-Folder Merge
 * Folds the user's own outgoing messages into the conversations they belong
 * to. Only sent messages that touch a thread already in the arena are taken;
 * they are copied into the primary collection, the sent collection itself
 * is left as it was.
 */

import logger from '../utils/logger';
import { ContainerArena } from './ContainerArena';
import { Envelope, SentMergeStats } from './types';

// copies appended by a merge; the next build takes them out again
const mergedCopies = new WeakSet<Envelope>();

function copyEnvelope(envelope: Envelope): Envelope {
  const copy: Envelope = {
    ...envelope,
    references: [...envelope.references],
    thread: null,
  };
  mergedCopies.add(copy);
  return copy;
}

/**
 * Take the copies an earlier merge appended out of `collection`, in place.
 * Returns how many were removed.
 */
export function removeMergedCopies(collection: Envelope[]): number {
  let kept = 0;
  for (const envelope of collection) {
    if (!mergedCopies.has(envelope)) {
      collection[kept++] = envelope;
    }
  }

  const removed = collection.length - kept;
  collection.length = kept;
  return removed;
}

export function mergeSentFolder(
  arena: ContainerArena,
  collection: Envelope[],
  sentFolder: readonly Envelope[]
): SentMergeStats {
  const stats: SentMergeStats = {
    merged: 0,
    duplicates: 0,
    ignored: 0,
    refused_links: 0,
  };

  for (const sent of sentFolder) {
    const own = sent.message_id ? arena.lookup(sent.message_id) : undefined;
    const repliedTo = sent.in_reply_to ? arena.lookup(sent.in_reply_to) : undefined;

    if (own === undefined && repliedTo === undefined) {
      stats.ignored++;
      continue;
    }

    if (own !== undefined) {
      // A placeholder is waiting for this message
      if (arena.get(own).hasMessage()) {
        stats.duplicates++;
        logger.debug('Skipping sent message already present in mailbox', {
          messageId: sent.message_id,
        });
        continue;
      }

      const copy = copyEnvelope(sent);
      const envelopeIndex = collection.push(copy) - 1;
      arena.bindMessage(own, envelopeIndex, copy.date);
      copy.thread = own;
      stats.merged++;

      const date = arena.get(own).date;
      if (repliedTo === undefined) {
        arena.propagateDate(own, date);
      } else if (arena.link(own, repliedTo)) {
        arena.propagateDate(repliedTo, date);
      } else {
        stats.refused_links++;
        logger.debug('Refused sent-folder link that would close a cycle', {
          messageId: copy.message_id,
          inReplyTo: copy.in_reply_to,
        });
        arena.propagateDate(own, date);
      }
      continue;
    }

    if (repliedTo === undefined) continue;

    // A reply to something in this mailbox
    const copy = copyEnvelope(sent);
    const envelopeIndex = collection.push(copy) - 1;
    const container = copy.message_id ? arena.getOrCreate(copy.message_id) : arena.append();
    arena.bindMessage(container, envelopeIndex, copy.date);
    copy.thread = container;
    stats.merged++;

    // the container is new, so this link is never refused
    arena.link(container, repliedTo);
    arena.propagateDate(repliedTo, copy.date);
  }

  return stats;
}
