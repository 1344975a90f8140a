/**
 * Fetcher types and interfaces
 */
import type { HarvestError } from '../services/errors.js';

/**
 * Opaque identifier, unique within its API namespace
 */
export type EntityId = string;

/**
 * One round-trip worth of items from a cursor-paginated query.
 * A null cursor always means there is nothing after this page.
 */
export interface Page<T> {
    items: T[];
    cursor: string | null;
    hasMore: boolean;
}

export type PageFetcher<T> = (cursor: string | null) => Promise<Page<T>>;

/**
 * Comment as returned by an API adapter, before flattening
 */
export interface CommentData {
    id: EntityId;
    author: string;
    text: string;
    publishedAt: string;
    url?: string;
}

/**
 * A top-level comment and the replies it owns
 */
export interface CommentThread {
    comment: CommentData;
    replies?: CommentThread[];
}

/**
 * Flat comment record. Top-level comments carry no parentId.
 */
export interface CommentNode extends CommentData {
    parentId?: EntityId;
}

/**
 * GitHub comment as written to the issues and discussions files
 */
export interface GithubCommentRecord {
    id: EntityId;
    parentId?: EntityId;
    author: string;
    content: string;
    createdAt: string;
    url: string;
}

export interface VideoRecord {
    id: EntityId;
    title: string;
    url: string;
    uploadDate: string;
    comments: readonly CommentNode[];
}

export interface IssueRecord {
    id: EntityId;
    title: string;
    url: string;
    body: string;
    createdAt: string;
    lastUpdated: string;
    upvotes: number;
    labels: readonly string[];
    comments: readonly GithubCommentRecord[];
}

export interface DiscussionRecord {
    id: EntityId;
    title: string;
    url: string;
    answerId: EntityId | null;
    comments: readonly GithubCommentRecord[];
}

export type AggregatedEntity = VideoRecord | IssueRecord | DiscussionRecord;

/**
 * Settled result of a single entity fetch
 */
export type FetchOutcome<T> =
    | { ok: true; value: T; warnings: string[] }
    | { ok: false; error: HarvestError };

/**
 * Per-entity line of the failure signal surface
 */
export interface EntityOutcome {
    id: EntityId;
    ok: boolean;
    reason?: string;
}

/**
 * Per-container line of the failure signal surface
 */
export interface ContainerOutcome {
    id: string;
    ok: boolean;
    discovered: number;
    complete: boolean;
    reason?: string;
}

export interface HarvestReport<T> {
    entities: T[];
    outcomes: EntityOutcome[];
    containers: ContainerOutcome[];
    durationMs: number;
}
