import { parseIdList } from "../config/env.js";

export type AdvisorPolicy = {
	isAdvisor: (principal: number | undefined) => boolean;
	readonly size: number;
	readonly ids: ReadonlySet<number>;
};

export function parseAdvisorIds(raw: string | undefined): ReadonlySet<number> {
	return parseIdList("ADVISOR_USER_IDS", raw, "user");
}

export function createAdvisorPolicy(ids: Iterable<number>): AdvisorPolicy {
	const allowed: ReadonlySet<number> = new Set(ids);
	return {
		isAdvisor: (principal) =>
			principal !== undefined && allowed.has(principal),
		size: allowed.size,
		ids: allowed,
	};
}
