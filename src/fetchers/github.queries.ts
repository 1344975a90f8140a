// =============================================================================
// GITHUB GRAPHQL QUERIES
// =============================================================================

export const PAGE_SIZE = 100;
export const REPLY_PAGE_SIZE = 20;

const PAGE_INFO = `pageInfo { hasNextPage endCursor }`;

const COMMENT_FIELDS = `
    id
    body
    createdAt
    url
    author { login }`;

const DISCUSSION_COMMENT_FIELDS = `
    ${COMMENT_FIELDS}
    replies(first: ${REPLY_PAGE_SIZE}) {
        nodes { ${COMMENT_FIELDS} }
        ${PAGE_INFO}
    }`;

const ISSUE_FIELDS = `
    id
    title
    body
    url
    createdAt
    updatedAt
    reactions(content: THUMBS_UP) { totalCount }
    labels(first: 100) { nodes { name } }
    comments(first: ${PAGE_SIZE}) {
        nodes { ${COMMENT_FIELDS} }
        ${PAGE_INFO}
    }`;

const DISCUSSION_FIELDS = `
    id
    title
    url
    answer { id }
    comments(first: ${PAGE_SIZE}) {
        nodes { ${DISCUSSION_COMMENT_FIELDS} }
        ${PAGE_INFO}
    }`;

export const GITHUB_QUERIES = {
    issues: `
        query($owner: String!, $name: String!, $after: String, $labels: [String!]) {
            repository(owner: $owner, name: $name) {
                issues(first: ${PAGE_SIZE}, after: $after, states: OPEN, labels: $labels) {
                    nodes { ${ISSUE_FIELDS} }
                    ${PAGE_INFO}
                }
            }
        }`,

    discussions: `
        query($owner: String!, $name: String!, $after: String) {
            repository(owner: $owner, name: $name) {
                discussions(first: ${PAGE_SIZE}, after: $after) {
                    nodes { ${DISCUSSION_FIELDS} }
                    ${PAGE_INFO}
                }
            }
        }`,

    issue: `
        query($id: ID!) {
            node(id: $id) {
                __typename
                ... on Issue { ${ISSUE_FIELDS} }
            }
        }`,

    discussion: `
        query($id: ID!) {
            node(id: $id) {
                __typename
                ... on Discussion { ${DISCUSSION_FIELDS} }
            }
        }`,

    issueComments: `
        query($id: ID!, $after: String) {
            node(id: $id) {
                ... on Issue {
                    comments(first: ${PAGE_SIZE}, after: $after) {
                        nodes { ${COMMENT_FIELDS} }
                        ${PAGE_INFO}
                    }
                }
            }
        }`,

    discussionComments: `
        query($id: ID!, $after: String) {
            node(id: $id) {
                ... on Discussion {
                    comments(first: ${PAGE_SIZE}, after: $after) {
                        nodes { ${DISCUSSION_COMMENT_FIELDS} }
                        ${PAGE_INFO}
                    }
                }
            }
        }`,

    commentReplies: `
        query($id: ID!, $after: String) {
            node(id: $id) {
                ... on DiscussionComment {
                    replies(first: ${PAGE_SIZE}, after: $after) {
                        nodes { ${COMMENT_FIELDS} }
                        ${PAGE_INFO}
                    }
                }
            }
        }`,
} as const;

export type GithubQueryName = keyof typeof GITHUB_QUERIES;
