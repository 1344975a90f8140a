/**
 * Flattens reply trees into one ordered list with explicit parent IDs
 */
import { createLogger } from '../observability/logger.js';
import type { CommentData, CommentNode, CommentThread, EntityId } from '../fetchers/types.js';

const log = createLogger({ component: 'flattener' });

function toNode(comment: CommentData, parentId?: EntityId): CommentNode {
    const node: CommentNode = {
        id: comment.id,
        author: comment.author,
        text: comment.text,
        publishedAt: comment.publishedAt,
    };
    if (comment.url !== undefined) node.url = comment.url;
    if (parentId !== undefined) node.parentId = parentId;
    return Object.freeze(node);
}

/**
 * Emit each top-level comment followed by its replies, in original order.
 *
 * Both source APIs nest one level. Anything deeper is flattened into the
 * same group, right after the reply that owns it, with `parentId` set to
 * the top-level comment: the reply it actually answers is lost.
 */
export function flattenThreads(threads: readonly CommentThread[]): CommentNode[] {
    const flat: CommentNode[] = [];
    let nestedSeen = false;

    const emitReplies = (rootId: EntityId, replies: readonly CommentThread[]): void => {
        for (const reply of replies) {
            flat.push(toNode(reply.comment, rootId));
            if (reply.replies && reply.replies.length > 0) {
                if (!nestedSeen) {
                    nestedSeen = true;
                    log.debug('Replies nested below the first level attributed to the top-level comment', {
                        parentId: rootId,
                        replyId: reply.comment.id,
                    });
                }
                emitReplies(rootId, reply.replies);
            }
        }
    };

    for (const thread of threads) {
        flat.push(toNode(thread.comment));
        emitReplies(thread.comment.id, thread.replies ?? []);
    }

    return flat;
}
