import { Container, ContainerView } from './Container';
import { ContainerArena } from './ContainerArena';
import { flattenThreads } from './FlattenWalk';
import { Envelope, FlattenOptions } from './types';

/**
 * Result of a build: the arena, its roots and the flattened row order.
 * Owned by the caller until the next rebuild; indices stay valid for the
 * lifetime of this object.
 */
export class ThreadForest {
  private rowOrder: number[];

  constructor(
    private readonly arena: ContainerArena,
    readonly envelopes: readonly Envelope[],
    readonly roots: readonly number[],
    order: number[]
  ) {
    this.rowOrder = order;
  }

  /** Container indices of message rows, in display order. */
  get order(): readonly number[] {
    return this.rowOrder;
  }

  get size(): number {
    return this.arena.size;
  }

  container(index: number): ContainerView {
    return this.arena.get(index);
  }

  containers(): ContainerView[] {
    return Array.from(this.arena);
  }

  envelope(index: number): Envelope | undefined {
    const message = this.arena.get(index).message;
    return message === null ? undefined : this.envelopes[message];
  }

  lookup(messageId: string): number | undefined {
    return this.arena.lookup(messageId);
  }

  children(index: number): number[] {
    return this.arena.children(index);
  }

  findRoot(index: number): number {
    return this.arena.findRoot(index);
  }

  /**
   * Container of an envelope, following its `thread` back-reference and
   * checking that the container still points at that envelope.
   */
  threadOf(envelopeIndex: number): number | null {
    const thread = this.envelopes[envelopeIndex]?.thread;
    if (thread === null || thread === undefined || thread < 0 || thread >= this.arena.size) {
      return null;
    }
    return this.arena.get(thread).message === envelopeIndex ? thread : null;
  }

  /**
   * Envelope indices of every message below (and including) `index`,
   * depth-first.
   */
  threadMessages(index: number): number[] {
    const messages: number[] = [];
    const stack = [index];

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      const container: Container = this.arena.get(current);
      if (container.message !== null) {
        messages.push(container.message);
      }
      const children = this.arena.children(current);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }

    return messages;
  }

  threadLength(index: number): number {
    return this.threadMessages(index).length;
  }

  /**
   * Run the flatten walk again, e.g. with different display options.
   */
  reflow(options: FlattenOptions = {}): readonly number[] {
    this.rowOrder = flattenThreads(this.arena, this.envelopes, this.roots, options);
    return this.rowOrder;
  }

  /** Message-ID index entries: `[messageId, containerIndex]`. */
  messageIds(): Array<[string, number]> {
    return Array.from(this.arena.entries());
  }
}
