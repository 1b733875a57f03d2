import { Envelope } from './types';

/**
 * Candidate parents of a message, oldest first: the References list with
 * In-Reply-To appended when the list does not already carry it. Empty IDs
 * and the message's own ID are dropped.
 */
export function referenceChain(
  envelope: Pick<Envelope, 'message_id' | 'references' | 'in_reply_to'>
): string[] {
  const chain = envelope.references.filter(
    (ref) => ref.length > 0 && ref !== envelope.message_id
  );

  const inReplyTo = envelope.in_reply_to;
  if (inReplyTo && inReplyTo !== envelope.message_id && !chain.includes(inReplyTo)) {
    chain.push(inReplyTo);
  }

  return chain;
}

/**
 * The one reference a message is linked under: the most recent entry of
 * its reference chain, or null when it has none.
 */
export function selectParentReference(
  envelope: Pick<Envelope, 'message_id' | 'references' | 'in_reply_to'>
): string | null {
  const chain = referenceChain(envelope);
  return chain.length > 0 ? chain[chain.length - 1] : null;
}
