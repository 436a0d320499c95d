import type {
  DigestEntryPayload,
  DigestSource,
  DigestWindow,
  DropReason,
  EnrichmentErrorKind,
  ItemErrorPayload,
  ItemStatus,
  MessageEntity,
  MessageMedia,
} from "@digest/shared";

export type Clock = () => Date;

/** A raw message owned by one worker until it is marked processed or released. */
export interface Claim {
  rawMessageId: string;
  channelId: string;
  channelPeerId: number;
  channelUsername: string | null;
  channelTitle: string | null;
  channelDescription: string | null;
  importanceWeight: number;
  sourceMessageId: number;
  sourceDate: Date;
  text: string;
  entities: MessageEntity[] | null;
  media: MessageMedia | null;
  canonicalHash: string;
  isForward: boolean;
  /** Status of the item from an earlier attempt, if any. */
  itemStatus: ItemStatus | null;
  retryCount: number;
}

export interface UpsertChannelInput {
  peerId: number;
  username?: string | null;
  title?: string | null;
  description?: string | null;
  importanceWeight?: number;
  importanceThreshold?: number | null;
}

export interface UpsertRawMessageInput {
  channelId: string;
  sourceMessageId: number;
  sourceDate: Date;
  text: string;
  entities?: MessageEntity[] | null;
  media?: MessageMedia | null;
  isForward?: boolean;
}

export interface SaveItemInput {
  rawMessageId: string;
  relevanceScore: number;
  importanceScore: number;
  topic: string | null;
  summary: string | null;
  language: string | null;
  firstSeenAt: Date;
}

export interface SaveItemErrorInput {
  rawMessageId: string;
  firstSeenAt: Date;
  kind: EnrichmentErrorKind;
  message: string;
}

export interface ItemErrorResult {
  itemId: string;
  retryCount: number;
  nextRetryAt: Date;
}

export interface ItemRef {
  itemId: string;
  firstSeenAt: Date;
}

export interface SimilarMatch extends ItemRef {
  similarity: number;
}

export interface SimilarityQuery {
  vector: number[];
  threshold: number;
  since: Date;
  excludeItemId?: string;
}

export interface ClusterCandidate {
  itemId: string;
  topic: string | null;
  importanceScore: number;
  firstSeenAt: Date;
  embedding: number[];
}

export interface DigestCandidate {
  itemId: string;
  topic: string | null;
  summary: string | null;
  importanceScore: number;
  relevanceScore: number;
  firstSeenAt: Date;
  hasEmbedding: boolean;
  source: DigestSource;
  /** Duplicate-linked items that ride along with this one. */
  duplicates: Array<{ itemId: string; source: DigestSource }>;
}

export interface WindowCluster {
  clusterId: string;
  topic: string | null;
  itemIds: string[];
}

export interface ClusterDraft {
  topic: string | null;
  itemIds: string[];
}

export interface PublishedDigest {
  window: DigestWindow;
  chatId: string;
  messageId: string;
  entries: DigestEntryPayload[];
  itemIds: string[];
}

export interface RecentItemError {
  itemId: string;
  rawMessageId: string;
  source: DigestSource;
  status: ItemStatus;
  retryCount: number;
  nextRetryAt: Date | null;
  error: ItemErrorPayload | null;
  updatedAt: Date;
}

export interface DropRecord {
  rawMessageId: string;
  reason: DropReason;
  detail?: string;
}
