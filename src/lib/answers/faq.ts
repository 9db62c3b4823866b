import fs from "node:fs/promises";
import path from "node:path";
import { formatError } from "../errors.js";
import type { Logger } from "../logger.js";

export type FaqDocument = {
	path: string;
	content: string;
};

export async function loadFaq(
	faqPath: string,
	logger?: Logger,
): Promise<FaqDocument> {
	const fullPath = path.resolve(faqPath);
	try {
		const content = await fs.readFile(fullPath, "utf8");
		logger?.info({ event: "faq_loaded", path: fullPath, length: content.length });
		return { path: fullPath, content };
	} catch (error) {
		logger?.warn({
			event: "faq_unavailable",
			path: fullPath,
			error: formatError(error),
		});
		return { path: fullPath, content: "" };
	}
}
