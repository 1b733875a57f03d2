/**
 * Threading Types
 * Type definitions for conversation thread assembly
 */

/** Unix timestamp in seconds. */
export type UnixTimestamp = number;

/**
 * Message metadata handed over by a mailbox backend. Header values are
 * already decoded; `references` is oldest-first as in the header.
 */
export interface Envelope {
  message_id: string;
  references: string[];
  in_reply_to: string;
  date: UnixTimestamp;
  subject: string;
  /**
   * Arena index of the container holding this envelope, written by the
   * builder. A weak back-reference: resolve it through `ThreadForest.threadOf`.
   */
  thread: number | null;
}

export interface FlattenOptions {
  suppress_repeated_subjects?: boolean;
}

export interface ThreadBuilderOptions extends FlattenOptions {
  merge_sent_folder?: boolean;
  verify_invariants?: boolean;
  /** Mailbox name carried in log metadata. */
  mailbox?: string;
}

export interface BuildStats {
  envelopes: number;
  containers: number;
  placeholders: number;
  duplicates: number;
  refused_links: number;
  sent_merged: number;
  roots: number;
}

export interface SentMergeStats {
  merged: number;
  duplicates: number;
  ignored: number;
  refused_links: number;
}
