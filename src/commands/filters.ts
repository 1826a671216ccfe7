/** Keyword filter commands: bind a keyword to replied-to media, list, remove */

import { bold, code, fmt, italic, join } from "telegraf/format";
import type { CommandDefinition } from "../services/commandRouter";
import { normalizeKeyword } from "../services/filterTable";
import { type MediaAttachment, type MediaKind, MEDIA_KINDS } from "../types";
import { InvalidInputError } from "../utils/errors";

const FILTER_NEEDS_REPLY = `❌ Please reply to a message containing media (photo/sticker/GIF/video).

Usage: Reply to media with /filter keyword

Example: /filter hello while replying to an image`;

const FILTER_NEEDS_KEYWORD = `❌ Please provide a keyword.

Usage: /filter keyword

Example: /filter hello`;

const STOPFILTER_USAGE = `❌ Please provide a keyword to remove.

Usage: /stopfilter keyword

Example: /stopfilter hello`;

const MEDIA_LABELS: Record<MediaKind, string> = {
	photo: "Photo",
	sticker: "Sticker",
	animation: "Animation",
	video: "Video",
};

const isFilterMedia = (
	attachment: MediaAttachment,
): attachment is { kind: MediaKind; fileId: string } =>
	(MEDIA_KINDS as readonly string[]).includes(attachment.kind);

export const filterCommands: CommandDefinition[] = [
	{
		name: "filter",
		description: "Set filter for keyword (reply to media)",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			if (!request.replyTo) throw new InvalidInputError(FILTER_NEEDS_REPLY);

			const keyword = normalizeKeyword(request.args.join(" "));
			if (!keyword) throw new InvalidInputError(FILTER_NEEDS_KEYWORD);

			const media = request.replyTo.media.find(isFilterMedia);
			if (!media) {
				throw new InvalidInputError(
					"❌ The replied message must contain a photo, sticker, GIF, or video.",
				);
			}

			const entry = services.filters.set(
				request.chatId,
				keyword,
				media.kind,
				media.fileId,
				request.replyTo.caption ?? "",
			);

			return {
				content: fmt`✅ Filter set successfully!

Keyword: ${code(entry.keyword)}
Media Type: ${MEDIA_LABELS[entry.mediaKind]}

When users send '${entry.keyword}', the bot will respond with this ${entry.mediaKind}.`,
			};
		},
	},
	{
		name: "filters",
		description: "List all filters",
		access: "public",
		scope: "group",
		async run({ request, services }) {
			const entries = services.filters.list(request.chatId);
			if (entries.length === 0) {
				return {
					content: "📝 No filters set in this group.\n\nUse /filter keyword while replying to media to create one.",
				};
			}

			const lines = entries.map(
				(entry) => fmt`• ${code(entry.keyword)} → ${MEDIA_LABELS[entry.mediaKind]}`,
			);
			return {
				content: fmt`📝 ${bold("Active Filters:")}

${join(lines, "\n")}

${italic(`Total: ${entries.length} filter(s)`)}`,
			};
		},
	},
	{
		name: "stopfilter",
		description: "Remove a filter",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const keyword = normalizeKeyword(request.args.join(" "));
			if (!keyword) throw new InvalidInputError(STOPFILTER_USAGE);

			if (!services.filters.remove(request.chatId, keyword)) {
				return { content: fmt`❌ No filter found for keyword: ${code(keyword)}` };
			}
			return {
				content: fmt`✅ Filter removed successfully!

Keyword: ${code(keyword)}`,
			};
		},
	},
];
