import { describe, expect, it } from "vitest";
import { approveAll, denyAll, type ConfirmationRequest } from "../../src/tools/confirmation.js";

const request: ConfirmationRequest = { tool: "shell", description: "Execute shell", args: { command: "ls" } };

describe("confirmation handlers", () => {
	it("approveAll approves every request", async () => {
		await expect(approveAll(request, new AbortController().signal)).resolves.toBe(true);
	});

	it("denyAll declines every request", async () => {
		await expect(denyAll(request, new AbortController().signal)).resolves.toBe(false);
	});
});
