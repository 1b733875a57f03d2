/**
 * Threading Module - Export Index
 */

export { ThreadBuilder, buildThreads } from './ThreadBuilder';
export { ThreadForest } from './ThreadForest';
export { ContainerArena } from './ContainerArena';
export { Container, ContainerView } from './Container';
export { mergeSentFolder } from './SentFolderMerge';
export { harvestRoots } from './RootHarvest';
export { flattenThreads } from './FlattenWalk';
export { referenceChain, selectParentReference } from './references';
export { isRepeatedSubject, matchesSubjectFilter, truncateSubject } from './subjects';
export { checkForestInvariants } from './invariants';
export {
  envelopeSchema,
  envelopeCollectionSchema,
  EnvelopeRecord,
  parseEnvelope,
  parseEnvelopes,
} from './envelopeSchema';
export {
  ListingOptions,
  ListingSort,
  SortField,
  SortOrder,
  ConversationRow,
  ThreadRow,
  parseListingSort,
  listConversations,
  listThreadRows,
  formatThreadRows,
  formatThreadDate,
  formatTimestamp,
} from './ConversationListing';

export {
  UnixTimestamp,
  Envelope,
  FlattenOptions,
  ThreadBuilderOptions,
  BuildStats,
  SentMergeStats,
} from './types';
