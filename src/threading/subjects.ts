const REPLY_PREFIX = 'Re: ';

/**
 * Whether a reply's subject only repeats the subject of its thread root.
 */
export function isRepeatedSubject(subject: string, rootSubject: string): boolean {
  return subject === rootSubject || subject === `${REPLY_PREFIX}${rootSubject}`;
}

/**
 * Cut a subject to at most `maxLength` code points.
 */
export function truncateSubject(subject: string, maxLength: number): string {
  const codePoints = Array.from(subject);
  if (codePoints.length <= maxLength) {
    return subject;
  }
  return codePoints.slice(0, maxLength).join('');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive subject filter. A term with `*` is a glob over the whole
 * subject; any other term matches as a substring. An empty term matches
 * everything.
 */
export function matchesSubjectFilter(subject: string, term: string): boolean {
  if (!term) {
    return true;
  }
  if (!term.includes('*')) {
    return subject.toLowerCase().includes(term.toLowerCase());
  }
  const pattern = term.split('*').map(escapeRegExp).join('.*');
  return new RegExp(`^${pattern}$`, 'i').test(subject);
}
