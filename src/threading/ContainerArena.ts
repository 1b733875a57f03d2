/**
 * Container Arena
 * Growable, index-addressed store of thread containers plus the Message-ID
 * index used to find them. Containers are never removed during a build.
 */

import { Container } from './Container';
import { UnixTimestamp } from './types';

export class ContainerArena {
  private readonly containers: Container[] = [];
  private readonly idIndex = new Map<string, number>();

  get size(): number {
    return this.containers.length;
  }

  get(index: number): Container {
    const container = this.containers[index];
    if (container === undefined) {
      throw new RangeError(`No container at index ${index} (arena size ${this.size})`);
    }
    return container;
  }

  lookup(messageId: string): number | undefined {
    return this.idIndex.get(messageId);
  }

  has(messageId: string): boolean {
    return this.idIndex.has(messageId);
  }

  /**
   * Index of the container for `messageId`, creating and indexing a
   * placeholder when the ID has not been seen yet.
   */
  getOrCreate(messageId: string): number {
    const existing = this.idIndex.get(messageId);
    if (existing !== undefined) {
      return existing;
    }

    const index = this.append();
    this.idIndex.set(messageId, index);
    return index;
  }

  /**
   * Add a placeholder that no Message-ID points at.
   */
  append(): number {
    const index = this.containers.length;
    this.containers.push(new Container(index));
    return index;
  }

  /**
   * Put an envelope into a container's message slot. A container that
   * already carries children keeps the later of the two dates.
   */
  bindMessage(index: number, envelopeIndex: number, date: UnixTimestamp): void {
    const container = this.get(index);
    container.message = envelopeIndex;
    container.date = container.hasChildren() ? Math.max(container.date, date) : date;
  }

  /**
   * True when `node` is `ancestor` itself or sits anywhere in its subtree.
   */
  isDescendant(node: number, ancestor: number): boolean {
    const stack = [ancestor];
    const seen = new Set<number>();

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || seen.has(current)) continue;
      if (current === node) return true;
      seen.add(current);

      for (let child = this.get(current).firstChild; child !== null; child = this.get(child).nextSibling) {
        if (child === node) return true;
        stack.push(child);
      }
    }

    return false;
  }

  /**
   * Make `child` the last child of `parent`. Refused when either node can
   * already reach the other, which also covers `child === parent` and an
   * existing identical link. Returns whether the link was made.
   */
  link(child: number, parent: number): boolean {
    if (this.isDescendant(parent, child) || this.isDescendant(child, parent)) {
      return false;
    }

    const childContainer = this.get(child);
    if (childContainer.parent !== null) {
      this.detach(child);
    }

    const parentContainer = this.get(parent);
    if (parentContainer.lastChild === null) {
      parentContainer.firstChild = child;
    } else {
      this.get(parentContainer.lastChild).nextSibling = child;
    }
    parentContainer.lastChild = child;

    childContainer.parent = parent;
    childContainer.displayParent = parent;
    childContainer.nextSibling = null;
    return true;
  }

  /**
   * Raise `date` on `from` and on every ancestor up to the root.
   */
  propagateDate(from: number, date: UnixTimestamp): void {
    let current: number | null = from;
    let steps = 0;

    while (current !== null && steps <= this.size) {
      const container: Container = this.get(current);
      if (container.date < date) {
        container.date = date;
      }
      current = container.parent;
      steps++;
    }
  }

  children(index: number): number[] {
    const result: number[] = [];
    for (let child = this.get(index).firstChild; child !== null; child = this.get(child).nextSibling) {
      result.push(child);
    }
    return result;
  }

  /**
   * Topmost structural ancestor of `index`.
   */
  findRoot(index: number): number {
    let current = index;
    let steps = 0;
    let parent = this.get(current).parent;

    while (parent !== null && steps < this.size) {
      current = parent;
      parent = this.get(current).parent;
      steps++;
    }

    return current;
  }

  entries(): IterableIterator<[string, number]> {
    return this.idIndex.entries();
  }

  [Symbol.iterator](): IterableIterator<Container> {
    return this.containers.values();
  }

  private detach(child: number): void {
    const childContainer = this.get(child);
    const parentIndex = childContainer.parent;
    if (parentIndex === null) return;

    const parent = this.get(parentIndex);
    let previous: number | null = null;
    for (let current = parent.firstChild; current !== null; current = this.get(current).nextSibling) {
      if (current === child) {
        const next = childContainer.nextSibling;
        if (previous === null) {
          parent.firstChild = next;
        } else {
          this.get(previous).nextSibling = next;
        }
        if (parent.lastChild === child) {
          parent.lastChild = previous;
        }
        break;
      }
      previous = current;
    }

    childContainer.parent = null;
    childContainer.displayParent = null;
    childContainer.nextSibling = null;
  }
}
