import { regex } from "arkregex";

const PAIRED_MARKERS = ["*", "_", "`"] as const;
const ESCAPED_CHARS_RE = regex("[<>&]", "g");
const OPEN_BRACKET_RE = regex("\\[", "g");
const CLOSE_BRACKET_RE = regex("\\]", "g");

function countOf(text: string, char: string) {
	return text.split(char).length - 1;
}

/**
 * Makes LLM output acceptable to Telegram's legacy Markdown parser: the last
 * unmatched emphasis marker is escaped, unbalanced brackets are escaped, and
 * `<`, `>` and `&` always are.
 */
export function sanitizeMarkdown(text: string): string {
	if (!text) return text;
	let result = text;
	for (const marker of PAIRED_MARKERS) {
		if (countOf(result, marker) % 2 === 0) continue;
		const lastPos = result.lastIndexOf(marker);
		result = `${result.slice(0, lastPos)}\\${marker}${result.slice(lastPos + 1)}`;
	}
	if (countOf(result, "[") !== countOf(result, "]")) {
		result = result
			.replace(OPEN_BRACKET_RE, "\\[")
			.replace(CLOSE_BRACKET_RE, "\\]");
	}
	return result.replace(ESCAPED_CHARS_RE, (char) => `\\${char}`);
}

export function buildMessageLink(chatId: number, messageId: number): string {
	const raw = String(chatId);
	if (raw.startsWith("-100")) {
		return `https://t.me/c/${raw.slice(4)}/${messageId}`;
	}
	return `https://t.me/c/${raw}/${messageId}`;
}

export function truncate(text: string, max: number): string {
	if (text.length <= max) return text;
	return `${text.slice(0, max)}...`;
}
