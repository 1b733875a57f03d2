import { ContainerArena } from './ContainerArena';

/**
 * Collect the top-level containers of the forest, most recently active
 * conversation first.
 *
 * A parentless placeholder with a single child is replaced by that child.
 * With several children it stays, so the siblings remain grouped under it.
 * Ties keep arena (discovery) order.
 */
export function harvestRoots(arena: ContainerArena): number[] {
  const roots: number[] = [];

  for (const container of arena) {
    if (container.parent !== null) continue;

    if (
      container.isPlaceholder() &&
      container.firstChild !== null &&
      !arena.get(container.firstChild).hasSibling()
    ) {
      roots.push(container.firstChild);
      continue;
    }

    roots.push(container.id);
  }

  return roots.sort((a, b) => arena.get(b).date - arena.get(a).date);
}
