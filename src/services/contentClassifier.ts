/**
 * Heuristic text scanning: denylist containment for the NSFW gate and URL
 * detection for the link policy.
 *
 * Matching is plain substring containment on case-folded text. There is no
 * tokenization, so a term inside a longer word matches too ("XXXmovie").
 * Media is never inspected; the NSFW gate runs the same check over the
 * remote file path of an attachment instead.
 *
 * @module services/contentClassifier
 */

import denylist from "../../data/denylist.json";

export const DEFAULT_DENYLIST: readonly string[] = Object.values(denylist).flat();

/** Scheme-prefixed or www. URLs, and bare t.me links */
const URL_PATTERN = /(https?:\/\/|www\.)\S+|t\.me\/\S+/i;

export class ContentClassifier {
	private readonly terms: string[];

	constructor(terms: readonly string[] = DEFAULT_DENYLIST) {
		this.terms = terms
			.map((term) => term.trim().toLowerCase())
			.filter((term) => term.length > 0);
	}

	isFlagged(text: string | undefined): boolean {
		if (!text) return false;
		const folded = text.toLowerCase();
		return this.terms.some((term) => folded.includes(term));
	}

	get size(): number {
		return this.terms.length;
	}
}

/** Regex fallback used when the platform did not annotate a URL entity */
export const containsUrl = (text: string | undefined): boolean =>
	text ? URL_PATTERN.test(text) : false;
