/**
 * Conversation Listing
 * Row models a mail listing draws from a thread forest: one row per
 * conversation, or one row per message in threaded order.
 */

import { DEFAULT_THREADING_CONFIG } from '../config/threading';
import { ValidationError } from '../errors';
import { matchesSubjectFilter, truncateSubject } from './subjects';
import { ThreadForest } from './ThreadForest';
import { UnixTimestamp } from './types';

export type SortField = 'date' | 'subject';
export type SortOrder = 'asc' | 'desc';

export interface ListingSort {
  field: SortField;
  order: SortOrder;
}

export interface ListingOptions {
  /** Reference time for relative dates; defaults to the current time */
  now?: UnixTimestamp;
  subject_max_length?: number;
  relative_date_window_days?: number;
  /** Conversation order; without it conversations keep the forest's root order */
  sort?: ListingSort;
  /** Order of replies that share a parent */
  subsort?: ListingSort;
  /** Keep only conversations with a message whose subject matches */
  filter?: string;
}

interface ResolvedListingOptions {
  now: UnixTimestamp;
  subject_max_length: number;
  relative_date_window_days: number;
  sort: ListingSort | null;
  subsort: ListingSort | null;
  filter: string;
}

interface SortKey {
  date: UnixTimestamp;
  subject: string;
}

export interface ConversationRow {
  root: number;
  /** Envelope shown for the conversation: the first message under the root */
  envelope: number;
  subject: string;
  message_count: number;
  date: UnixTimestamp;
  date_label: string;
}

export interface ThreadRow {
  container: number;
  envelope: number;
  indentation: number;
  /** Empty when the subject only repeats the thread's */
  subject: string;
  date: UnixTimestamp;
  date_label: string;
}

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'} ago`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Absolute timestamp as `YYYY-MM-DD HH:mm:ss` (UTC).
 */
export function formatTimestamp(date: UnixTimestamp): string {
  const d = new Date(date * 1000);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

/**
 * "5 minutes ago", "3 hours ago", "2 days ago" inside the window, the
 * absolute timestamp outside it or for dates in the future.
 */
export function formatThreadDate(
  date: UnixTimestamp,
  now: UnixTimestamp,
  windowDays = DEFAULT_THREADING_CONFIG.listing.relative_date_window_days
): string {
  const elapsed = now - date;

  if (elapsed < 0 || elapsed >= windowDays * DAY) {
    return formatTimestamp(date);
  }
  if (elapsed < HOUR) {
    return plural(Math.floor(elapsed / MINUTE), 'minute');
  }
  if (elapsed < DAY) {
    return plural(Math.floor(elapsed / HOUR), 'hour');
  }
  return plural(Math.floor(elapsed / DAY), 'day');
}

const SORT_FIELDS: readonly SortField[] = ['date', 'subject'];
const SORT_ORDERS: readonly SortOrder[] = ['asc', 'desc'];

function isSortField(value: string): value is SortField {
  return SORT_FIELDS.some((field) => field === value);
}

function isSortOrder(value: string): value is SortOrder {
  return SORT_ORDERS.some((order) => order === value);
}

/**
 * Parse `date`, `subject:asc`, `date:desc` and the like. The order
 * defaults to descending.
 */
export function parseListingSort(value: string, field = 'sort'): ListingSort {
  const [sortField, sortOrder = 'desc', ...rest] = value.trim().toLowerCase().split(':');
  if (rest.length > 0 || !isSortField(sortField) || !isSortOrder(sortOrder)) {
    throw ValidationError.invalidFormat(field, 'date|subject[:asc|desc]', value);
  }
  return { field: sortField, order: sortOrder };
}

function compareText(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

function compareBy(sort: ListingSort, a: SortKey, b: SortKey): number {
  const result = sort.field === 'date' ? a.date - b.date : compareText(a.subject, b.subject);
  return sort.order === 'asc' ? result : -result;
}

function resolveOptions(options: ListingOptions): ResolvedListingOptions {
  return {
    now: options.now ?? Math.floor(Date.now() / 1000),
    subject_max_length:
      options.subject_max_length ?? DEFAULT_THREADING_CONFIG.listing.subject_max_length,
    relative_date_window_days:
      options.relative_date_window_days ??
      DEFAULT_THREADING_CONFIG.listing.relative_date_window_days,
    sort: options.sort ?? null,
    subsort: options.subsort ?? null,
    filter: options.filter ?? '',
  };
}

interface Conversation {
  root: number;
  messages: number[];
  key: SortKey;
}

/**
 * Conversations that pass the filter, in listing order. Ties keep the
 * forest's root order.
 */
function selectConversations(
  forest: ThreadForest,
  resolved: ResolvedListingOptions
): Conversation[] {
  const conversations: Conversation[] = [];

  for (const root of forest.roots) {
    const messages = forest.threadMessages(root);
    if (messages.length === 0) continue;

    const subjects = messages.map((index) => forest.envelopes[index]?.subject ?? '');
    if (!subjects.some((subject) => matchesSubjectFilter(subject, resolved.filter))) continue;

    conversations.push({
      root,
      messages,
      key: { date: forest.container(root).date, subject: subjects[0] },
    });
  }

  const { sort } = resolved;
  if (sort) {
    conversations.sort((a, b) => compareBy(sort, a.key, b.key));
  }
  return conversations;
}

export function listConversations(
  forest: ThreadForest,
  options: ListingOptions = {}
): ConversationRow[] {
  const resolved = resolveOptions(options);

  return selectConversations(forest, resolved).map(({ root, messages, key }) => {
    const subject = truncateSubject(key.subject, resolved.subject_max_length);
    return {
      root,
      envelope: messages[0],
      subject: messages.length > 1 ? `${subject} (${messages.length})` : subject,
      message_count: messages.length,
      date: key.date,
      date_label: formatThreadDate(key.date, resolved.now, resolved.relative_date_window_days),
    };
  });
}

function orderedChildren(
  forest: ThreadForest,
  index: number,
  order: ListingSort | null
): number[] {
  const children = forest.children(index);
  const subsort = order;
  if (!subsort) {
    return children;
  }

  const keyOf = (child: number): SortKey => ({
    date: forest.container(child).date,
    subject: forest.envelope(child)?.subject ?? '',
  });
  return children.sort((a, b) => compareBy(subsort, keyOf(a), keyOf(b)));
}

/**
 * One row per message, conversation by conversation. Indentation and
 * subject visibility come from the forest's last flatten walk.
 */
export function listThreadRows(
  forest: ThreadForest,
  options: ListingOptions = {}
): ThreadRow[] {
  const resolved = resolveOptions(options);
  const rows: ThreadRow[] = [];

  for (const { root } of selectConversations(forest, resolved)) {
    const stack = [root];

    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined) break;

      const container = forest.container(index);
      if (container.message !== null) {
        const envelope = forest.envelopes[container.message];
        const subject = container.showSubject
          ? truncateSubject(envelope?.subject ?? '', resolved.subject_max_length)
          : '';
        const date = envelope?.date ?? container.date;

        rows.push({
          container: index,
          envelope: container.message,
          indentation: container.indentation,
          subject,
          date,
          date_label: formatThreadDate(date, resolved.now, resolved.relative_date_window_days),
        });
      }

      const children = orderedChildren(forest, index, resolved.subsort);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }
  }

  return rows;
}

/**
 * Plain-text rendering of thread rows, two spaces per level.
 */
export function formatThreadRows(rows: readonly ThreadRow[]): string[] {
  return rows.map(
    (row) => `${'  '.repeat(row.indentation)}${row.subject || '↳'}  [${row.date_label}]`
  );
}
