/**
 * Input validation run before any fetch starts
 */
import { InvalidInputError } from './errors.js';

export interface RepositoryRef {
    owner: string;
    name: string;
}

const WHITESPACE = /\s/;

/**
 * Reject empty or whitespace-containing IDs; keep the first of each duplicate
 */
export function assertEntityIds(ids: readonly string[], label: string): string[] {
    const invalid = ids.filter(id => id.length === 0 || WHITESPACE.test(id));
    if (invalid.length > 0) {
        const shown = invalid.map(id => JSON.stringify(id)).join(', ');
        throw new InvalidInputError(`Invalid ${label} ID(s): ${shown}`);
    }
    return [...new Set(ids)];
}

/**
 * Parse `owner/repo`
 */
export function parseRepository(repository: string): RepositoryRef {
    const parts = repository.trim().split('/');
    const [owner, name] = parts;
    if (parts.length !== 2 || !owner || !name || WHITESPACE.test(owner) || WHITESPACE.test(name)) {
        throw new InvalidInputError(
            `Invalid repository format '${repository}', expected owner/repository`
        );
    }
    return { owner, name };
}
