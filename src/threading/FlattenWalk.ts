import { ContainerArena } from './ContainerArena';
import { isRepeatedSubject } from './subjects';
import { Envelope, FlattenOptions } from './types';

interface WalkFrame {
  index: number;
  indentation: number;
}

/**
 * Lay the forest out as display rows.
 *
 * Walks every root depth-first in the given order and returns the indices
 * of message-bearing containers in row order. Along the way it recomputes
 * `indentation`, `showSubject` and `displayParent` on every container;
 * the structural links are left alone, so the walk can be repeated.
 */
export function flattenThreads(
  arena: ContainerArena,
  envelopes: readonly Envelope[],
  roots: readonly number[],
  options: FlattenOptions = {}
): number[] {
  const suppressRepeated = options.suppress_repeated_subjects ?? true;

  for (const container of arena) {
    container.indentation = 0;
    container.showSubject = true;
    container.displayParent = container.parent;
  }

  const order: number[] = [];
  const emitted = new Set<number>();

  for (const root of roots) {
    let subjectRoot: number | null = null;
    let rootSubject = '';
    const stack: WalkFrame[] = [{ index: root, indentation: 0 }];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (frame === undefined) break;

      const container = arena.get(frame.index);
      container.indentation = frame.indentation;

      if (container.parent !== null && arena.get(container.parent).isPlaceholder()) {
        container.displayParent = null;
      }

      // placeholders do not take up an indentation level
      let childIndentation = frame.indentation;

      if (container.message !== null) {
        const subject = envelopes[container.message]?.subject ?? '';

        if (subjectRoot === null) {
          subjectRoot = container.id;
          rootSubject = subject;
        } else if (suppressRepeated && isRepeatedSubject(subject, rootSubject)) {
          container.showSubject = false;
        }

        if (!emitted.has(container.id)) {
          emitted.add(container.id);
          order.push(container.id);
        }
        childIndentation = frame.indentation + 1;
      }

      const children = arena.children(container.id);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ index: children[i], indentation: childIndentation });
      }
    }
  }

  return order;
}
