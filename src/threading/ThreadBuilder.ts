/**
 * Thread Builder
 * Reconstructs conversation trees from Message-ID, References and
 * In-Reply-To, JWZ style: one container per Message-ID, placeholders for
 * referenced messages that are not in the mailbox, and a cycle check
 * before every link.
 */

import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger';
import { runWithBuildContext } from '../utils/buildContext';
import { ContainerArena } from './ContainerArena';
import { flattenThreads } from './FlattenWalk';
import { checkForestInvariants } from './invariants';
import { selectParentReference } from './references';
import { harvestRoots } from './RootHarvest';
import { mergeSentFolder, removeMergedCopies } from './SentFolderMerge';
import { ThreadForest } from './ThreadForest';
import { BuildStats, Envelope, ThreadBuilderOptions } from './types';

const DEFAULT_OPTIONS: Required<Omit<ThreadBuilderOptions, 'mailbox'>> = {
  suppress_repeated_subjects: true,
  merge_sent_folder: true,
  verify_invariants: false,
};

interface CollectionStats {
  duplicates: number;
  refused_links: number;
}

export class ThreadBuilder {
  private options: Required<Omit<ThreadBuilderOptions, 'mailbox'>> & Pick<ThreadBuilderOptions, 'mailbox'>;
  private lastStats: BuildStats | null = null;

  constructor(options: ThreadBuilderOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Build the thread forest for `collection`.
   *
   * The collection is modified in place: every envelope's `thread` is
   * rewritten, and matching sent messages are appended to it. Copies
   * appended by an earlier build are removed first, so building the same
   * inputs again gives the same forest.
   */
  build(collection: Envelope[], sentFolder?: readonly Envelope[] | null): ThreadForest {
    return runWithBuildContext({ buildId: uuidv4(), mailbox: this.options.mailbox }, () =>
      this.buildInContext(collection, sentFolder)
    );
  }

  /**
   * Statistics of the most recent build
   */
  getLastStats(): BuildStats | null {
    return this.lastStats;
  }

  private buildInContext(collection: Envelope[], sentFolder?: readonly Envelope[] | null): ThreadForest {
    const removedCopies = removeMergedCopies(collection);
    if (removedCopies > 0) {
      logger.debug('Removed sent copies from previous build', { removedCopies });
    }

    logger.info('Building conversation threads', {
      messageCount: collection.length,
      sentCount: sentFolder?.length ?? 0,
    });

    const arena = new ContainerArena();
    for (const envelope of collection) {
      envelope.thread = null;
    }

    const collectionStats = this.buildCollection(arena, collection);

    let sentMerged = 0;
    let refusedLinks = collectionStats.refused_links;
    if (sentFolder && this.options.merge_sent_folder) {
      const mergeStats = mergeSentFolder(arena, collection, sentFolder);
      sentMerged = mergeStats.merged;
      refusedLinks += mergeStats.refused_links;
      logger.debug('Merged sent folder', { ...mergeStats });
    }

    const roots = harvestRoots(arena);
    const order = flattenThreads(arena, collection, roots, {
      suppress_repeated_subjects: this.options.suppress_repeated_subjects,
    });
    const forest = new ThreadForest(arena, collection, roots, order);

    let placeholders = 0;
    for (const container of arena) {
      if (container.isPlaceholder()) placeholders++;
    }

    this.lastStats = {
      envelopes: collection.length,
      containers: arena.size,
      placeholders,
      duplicates: collectionStats.duplicates,
      refused_links: refusedLinks,
      sent_merged: sentMerged,
      roots: roots.length,
    };

    if (this.options.verify_invariants) {
      const issues = checkForestInvariants(forest);
      if (issues.length > 0) {
        logger.warn('Thread forest violates invariants', {
          issueCount: issues.length,
          issues: issues.slice(0, 10),
        });
      }
    }

    logger.info('Built conversation threads', { ...this.lastStats });

    return forest;
  }

  /**
   * Add every envelope to the arena and link it under its parent reference.
   */
  private buildCollection(arena: ContainerArena, collection: Envelope[]): CollectionStats {
    const stats: CollectionStats = { duplicates: 0, refused_links: 0 };

    collection.forEach((envelope, envelopeIndex) => {
      let current: number;

      if (envelope.message_id) {
        const existing = arena.lookup(envelope.message_id);
        if (existing !== undefined && arena.get(existing).hasMessage()) {
          // first occurrence keeps the slot
          stats.duplicates++;
          logger.debug('Skipping duplicate Message-ID', {
            messageId: envelope.message_id,
            envelopeIndex,
          });
          return;
        }
        current = arena.getOrCreate(envelope.message_id);
      } else {
        current = arena.append();
      }

      arena.bindMessage(current, envelopeIndex, envelope.date);
      envelope.thread = current;

      // a former placeholder may already hold newer replies
      const date = arena.get(current).date;
      let propagateFrom = current;
      const parentId = selectParentReference(envelope);

      if (parentId !== null) {
        const isNew = !arena.has(parentId);
        const parent = arena.getOrCreate(parentId);
        if (isNew) {
          arena.get(parent).date = date;
        }

        if (arena.link(current, parent)) {
          propagateFrom = parent;
        } else {
          stats.refused_links++;
          logger.debug('Refused link that would close a cycle', {
            messageId: envelope.message_id,
            parentId,
          });
        }
      }

      arena.propagateDate(propagateFrom, date);
    });

    return stats;
  }
}

/**
 * Build threads with a one-off builder.
 */
export function buildThreads(
  collection: Envelope[],
  sentFolder?: readonly Envelope[] | null,
  options: ThreadBuilderOptions = {}
): ThreadForest {
  return new ThreadBuilder(options).build(collection, sentFolder);
}
