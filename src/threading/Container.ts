import { UnixTimestamp } from './types';

/**
 * A node of the thread forest. It holds either a message (an index into the
 * envelope collection) or nothing, in which case it is a placeholder for a
 * message that was referenced but never seen.
 *
 * All links are arena indices. Children are kept as a leftmost-child /
 * right-sibling list.
 */
export class Container {
  message: number | null = null;
  /** Structural parent. Survives every walk. */
  parent: number | null = null;
  /** Parent as rendered; recomputed by every flatten walk. */
  displayParent: number | null = null;
  firstChild: number | null = null;
  nextSibling: number | null = null;
  /** @internal tail of the child list, for constant-time append */
  lastChild: number | null = null;
  date: UnixTimestamp;
  indentation = 0;
  showSubject = true;

  constructor(
    readonly id: number,
    date: UnixTimestamp = 0
  ) {
    this.date = date;
  }

  hasMessage(): boolean {
    return this.message !== null;
  }

  hasParent(): boolean {
    return this.parent !== null;
  }

  hasChildren(): boolean {
    return this.firstChild !== null;
  }

  hasSibling(): boolean {
    return this.nextSibling !== null;
  }

  isPlaceholder(): boolean {
    return this.message === null;
  }
}

/** What a renderer gets to see of a container. */
export type ContainerView = Readonly<
  Pick<
    Container,
    | 'id'
    | 'message'
    | 'parent'
    | 'displayParent'
    | 'firstChild'
    | 'nextSibling'
    | 'date'
    | 'indentation'
    | 'showSubject'
    | 'hasMessage'
    | 'hasParent'
    | 'hasChildren'
    | 'hasSibling'
    | 'isPlaceholder'
  >
>;
