/**
 * Forest invariant checks. Each violation comes back as a ValidationIssue;
 * an empty list means the forest is sound.
 */

import { ValidationIssue } from '../errors';
import { ContainerView } from './Container';
import { ThreadForest } from './ThreadForest';

function checkIndex(forest: ThreadForest, issues: ValidationIssue[]): void {
  const owners = new Map<number, string>();

  for (const [messageId, index] of forest.messageIds()) {
    if (index < 0 || index >= forest.size) {
      issues.push({ field: 'index', message: `Message-ID ${messageId} points outside the arena`, value: index });
      continue;
    }
    const owner = owners.get(index);
    if (owner !== undefined) {
      issues.push({
        field: 'index',
        message: `Container ${index} is indexed under both ${owner} and ${messageId}`,
        value: index,
      });
    }
    owners.set(index, messageId);
  }
}

function checkLinks(containers: ContainerView[], issues: ValidationIssue[]): void {
  const listedUnder = new Map<number, number>();

  for (const container of containers) {
    const seen = new Set<number>();
    for (let child = container.firstChild; child !== null; child = containers[child]?.nextSibling ?? null) {
      if (seen.has(child)) {
        issues.push({ field: 'firstChild', message: `Child list of ${container.id} loops`, value: container.id });
        break;
      }
      seen.add(child);

      const previous = listedUnder.get(child);
      if (previous !== undefined) {
        issues.push({
          field: 'parent',
          message: `Container ${child} is listed under both ${previous} and ${container.id}`,
          value: child,
        });
      }
      listedUnder.set(child, container.id);

      if (containers[child]?.parent !== container.id) {
        issues.push({
          field: 'parent',
          message: `Container ${child} is listed under ${container.id} but points at another parent`,
          value: child,
        });
      }
    }
  }

  for (const container of containers) {
    if (container.parent !== null && listedUnder.get(container.id) !== container.parent) {
      issues.push({
        field: 'parent',
        message: `Container ${container.id} is missing from the child list of ${container.parent}`,
        value: container.id,
      });
    }

    // walking up must reach a root within `containers.length` hops
    let current: number | null = container.parent;
    let hops = 0;
    while (current !== null && hops <= containers.length) {
      if (current === container.id) break;
      current = containers[current]?.parent ?? null;
      hops++;
    }
    if (current !== null) {
      issues.push({ field: 'parent', message: `Container ${container.id} is part of a cycle`, value: container.id });
    }
  }
}

function checkPlaceholdersAndDates(containers: ContainerView[], issues: ValidationIssue[]): void {
  for (const container of containers) {
    if (container.isPlaceholder() && !container.hasChildren()) {
      issues.push({ field: 'message', message: `Placeholder ${container.id} has no children`, value: container.id });
    }

    const parent = container.parent === null ? undefined : containers[container.parent];
    if (parent !== undefined && parent.date < container.date) {
      issues.push({
        field: 'date',
        message: `Container ${container.id} is newer than its parent ${parent.id}`,
        value: container.date,
      });
    }
  }
}

function checkBindings(forest: ThreadForest, containers: ContainerView[], issues: ValidationIssue[]): void {
  const boundBy = new Map<number, number>();

  for (const container of containers) {
    if (container.message === null) continue;

    const other = boundBy.get(container.message);
    if (other !== undefined) {
      issues.push({
        field: 'message',
        message: `Envelope ${container.message} is bound to both ${other} and ${container.id}`,
        value: container.message,
      });
    }
    boundBy.set(container.message, container.id);

    if (forest.envelopes[container.message]?.thread !== container.id) {
      issues.push({
        field: 'thread',
        message: `Envelope ${container.message} does not point back at container ${container.id}`,
        value: container.message,
      });
    }
  }

  forest.envelopes.forEach((envelope, index) => {
    if (envelope.thread !== null && forest.threadOf(index) === null) {
      issues.push({
        field: 'thread',
        message: `Envelope ${index} points at container ${envelope.thread} which holds another message`,
        value: envelope.thread,
      });
    }
  });
}

export function checkForestInvariants(forest: ThreadForest): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const containers = forest.containers();

  checkIndex(forest, issues);
  checkLinks(containers, issues);
  checkPlaceholdersAndDates(containers, issues);
  checkBindings(forest, containers, issues);

  return issues;
}
