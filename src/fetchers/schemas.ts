/**
 * Response schemas for the YouTube Data API and GitHub GraphQL API.
 * Only the fields the harvester reads are declared.
 */
import { z } from 'zod';
import { MalformedResponseError } from '../services/errors.js';

// ============================================================================
// YOUTUBE
// ============================================================================

const youtubeCommentSchema = z.object({
    id: z.string(),
    snippet: z.object({
        authorDisplayName: z.string().default(''),
        textDisplay: z.string().default(''),
        publishedAt: z.string(),
    }),
});

export const commentThreadListSchema = z.object({
    nextPageToken: z.string().optional(),
    items: z.array(z.object({
        id: z.string(),
        snippet: z.object({
            topLevelComment: youtubeCommentSchema,
        }),
        replies: z.object({
            comments: z.array(youtubeCommentSchema).default([]),
        }).optional(),
    })).default([]),
});

export const playlistItemListSchema = z.object({
    nextPageToken: z.string().optional(),
    items: z.array(z.object({
        snippet: z.object({
            resourceId: z.object({
                videoId: z.string().optional(),
            }).optional(),
        }).optional(),
    })).default([]),
});

export const videoListSchema = z.object({
    items: z.array(z.object({
        id: z.string(),
        snippet: z.object({
            title: z.string(),
            publishedAt: z.string(),
        }),
    })).default([]),
});

export type YouTubeComment = z.infer<typeof youtubeCommentSchema>;
export type CommentThreadList = z.infer<typeof commentThreadListSchema>;

// ============================================================================
// GITHUB
// ============================================================================

const timestampSchema = z.string().datetime({ offset: true });

export const pageInfoSchema = z.object({
    hasNextPage: z.boolean(),
    endCursor: z.string().nullable(),
});

function connectionSchema<T extends z.ZodTypeAny>(node: T) {
    return z.object({
        nodes: z.array(node),
        pageInfo: pageInfoSchema,
    });
}

export const githubCommentSchema = z.object({
    id: z.string(),
    body: z.string(),
    createdAt: timestampSchema,
    url: z.string(),
    author: z.object({ login: z.string() }).nullable().optional(),
});

export const discussionCommentSchema = githubCommentSchema.extend({
    replies: connectionSchema(githubCommentSchema),
});

export const issueNodeSchema = z.object({
    id: z.string(),
    title: z.string(),
    body: z.string(),
    url: z.string(),
    createdAt: timestampSchema,
    updatedAt: timestampSchema,
    reactions: z.object({ totalCount: z.number().int() }).nullable().optional(),
    labels: z.object({
        nodes: z.array(z.object({ name: z.string() })),
    }).nullable().optional(),
    comments: connectionSchema(githubCommentSchema),
});

export const discussionNodeSchema = z.object({
    id: z.string(),
    title: z.string(),
    url: z.string(),
    answer: z.object({ id: z.string() }).nullable().optional(),
    comments: connectionSchema(discussionCommentSchema),
});

export const issuesPageSchema = z.object({
    repository: z.object({
        issues: connectionSchema(issueNodeSchema),
    }).nullable(),
});

export const discussionsPageSchema = z.object({
    repository: z.object({
        discussions: connectionSchema(discussionNodeSchema),
    }).nullable(),
});

export const typedNodeSchema = z.object({
    node: z.object({ __typename: z.string() }).passthrough().nullable(),
});

export const issueCommentsPageSchema = z.object({
    node: z.object({
        comments: connectionSchema(githubCommentSchema),
    }).nullable(),
});

export const discussionCommentsPageSchema = z.object({
    node: z.object({
        comments: connectionSchema(discussionCommentSchema),
    }).nullable(),
});

export const repliesPageSchema = z.object({
    node: z.object({
        replies: connectionSchema(githubCommentSchema),
    }).nullable(),
});

export const graphqlEnvelopeSchema = z.object({
    data: z.unknown().optional(),
    errors: z.array(z.object({
        type: z.string().optional(),
        message: z.string(),
    })).optional(),
});

export type GithubComment = z.infer<typeof githubCommentSchema>;
export type DiscussionComment = z.infer<typeof discussionCommentSchema>;
export type IssueNode = z.infer<typeof issueNodeSchema>;
export type DiscussionNode = z.infer<typeof discussionNodeSchema>;
export type PageInfo = z.infer<typeof pageInfoSchema>;

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Validate a payload, turning schema mismatches into MalformedResponseError
 */
export function parseResponse<T extends z.ZodTypeAny>(schema: T, payload: unknown, what: string): z.output<T> {
    const result = schema.safeParse(payload);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new MalformedResponseError(`Unexpected ${what} response${where}: ${issue?.message ?? 'invalid'}`, {
            cause: result.error,
        });
    }
    return result.data;
}
