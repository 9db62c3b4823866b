import type { Update } from "grammy/types";
import { describe, expect, it } from "vitest";
import { getUpdateType } from "../src/lib/bot/log-context.js";

describe("getUpdateType", () => {
	it("names the update payload", () => {
		const update = {
			update_id: 7,
			message_reaction: {
				chat: { id: -1001234, type: "supergroup", title: "Course Group" },
				message_id: 42,
				date: 0,
				old_reaction: [],
				new_reaction: [],
			},
		} satisfies Update;

		expect(getUpdateType(update)).toBe("message_reaction");
	});

	it("falls back to unknown", () => {
		expect(getUpdateType()).toBe("unknown");
		expect(getUpdateType({ update_id: 1 })).toBe("unknown");
	});
});
