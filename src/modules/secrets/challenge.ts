import { createHash, timingSafeEqual } from 'node:crypto';

export interface ChallengeOptions {
    caseSensitive: boolean;
}

const digest = (value: string) => createHash('sha256').update(value, 'utf8').digest();

/**
 * Compares a supplied answer with the stored one. Exact match unless
 * `caseSensitive` is off; never trims or otherwise normalizes.
 *
 * Digests are compared in constant time so the comparison doesn't leak
 * how long a matching prefix is.
 */
export function matchesChallenge(
    stored: string,
    supplied: string,
    options: ChallengeOptions = { caseSensitive: true },
): boolean {
    const expected = options.caseSensitive ? stored : stored.toLowerCase();
    const actual = options.caseSensitive ? supplied : supplied.toLowerCase();
    return timingSafeEqual(digest(expected), digest(actual));
}
