import { describe, expect, it } from "vitest";
import {
	buildMessageLink,
	sanitizeMarkdown,
	truncate,
} from "../src/lib/telegram/markdown.js";

describe("sanitizeMarkdown", () => {
	it("escapes the last unmatched emphasis marker", () => {
		expect(sanitizeMarkdown("*bold* and *oops")).toBe("*bold* and \\*oops");
		expect(sanitizeMarkdown("snake_case")).toBe("snake\\_case");
	});

	it("leaves balanced markers alone", () => {
		expect(sanitizeMarkdown("_a_ `b` *c*")).toBe("_a_ `b` *c*");
	});

	it("escapes every bracket when they are unbalanced", () => {
		expect(sanitizeMarkdown("see [link] and [more")).toBe(
			"see \\[link\\] and \\[more",
		);
		expect(sanitizeMarkdown("[ok](https://example.com)")).toBe(
			"[ok](https://example.com)",
		);
	});

	it("always escapes angle brackets and ampersands", () => {
		expect(sanitizeMarkdown("a < b & c > d")).toBe("a \\< b \\& c \\> d");
	});

	it("returns empty input unchanged", () => {
		expect(sanitizeMarkdown("")).toBe("");
	});
});

describe("buildMessageLink", () => {
	it("strips the supergroup prefix", () => {
		expect(buildMessageLink(-1001234567890, 5)).toBe(
			"https://t.me/c/1234567890/5",
		);
	});

	it("uses other chat ids as they are", () => {
		expect(buildMessageLink(12345, 9)).toBe("https://t.me/c/12345/9");
	});
});

describe("truncate", () => {
	it("cuts long text with an ellipsis", () => {
		expect(truncate("abcdef", 3)).toBe("abc...");
		expect(truncate("abc", 3)).toBe("abc");
	});
});
