import { AuthorizationError } from "../errors.js";
import type { AdvisorPolicy } from "./advisors.js";

export type ActivationChange = {
	previous: boolean;
	active: boolean;
};

export type ActivationGate = {
	activate: (requester: number | undefined) => ActivationChange;
	deactivate: (requester: number | undefined) => ActivationChange;
	status: (requester: number | undefined) => boolean;
	shouldRespond: () => boolean;
};

type ActivationGateOptions = {
	policy: AdvisorPolicy;
	initialActive: boolean;
};

/**
 * Owns the process-wide answer/no-answer flag. The flag lives in this closure
 * only; every write passes the advisor check first.
 */
export function createActivationGate(
	options: ActivationGateOptions,
): ActivationGate {
	const { policy } = options;
	let active = options.initialActive;

	function authorize(requester: number | undefined, action: string) {
		if (!policy.isAdvisor(requester)) {
			throw new AuthorizationError(action, requester);
		}
	}

	function setActive(requester: number | undefined, next: boolean) {
		authorize(requester, next ? "activate" : "deactivate");
		const previous = active;
		active = next;
		return { previous, active };
	}

	return {
		activate: (requester) => setActive(requester, true),
		deactivate: (requester) => setActive(requester, false),
		status: (requester) => {
			authorize(requester, "read status");
			return active;
		},
		shouldRespond: () => active,
	};
}
