/**
 * HTML helpers for the welcome message, which is rendered from an
 * admin-supplied HTML template.
 *
 * Prefer Telegraf's Format module (fmt, bold, code, mention) from
 * 'telegraf/format' for bot-authored text. It uses entity-based formatting
 * and needs no escaping.
 *
 * @module utils/format
 */

import type { MemberProfile } from "../types";

const HTML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
};

/**
 * Escapes text for Telegram's HTML parse mode.
 *
 * @example
 * ```typescript
 * escapeHtml('Tom & <Jerry>'); // 'Tom &amp; &lt;Jerry&gt;'
 * ```
 */
export function escapeHtml(text: string): string {
	return text.replace(/[&<>"]/g, (char) => HTML_ESCAPES[char] ?? char);
}

/** `<a href="tg://user?id=...">First name</a>` */
export function htmlMention(user: Pick<MemberProfile, "id" | "firstName">): string {
	return `<a href="tg://user?id=${user.id}">${escapeHtml(user.firstName)}</a>`;
}
