export async function waitUntil(
	condition: () => boolean,
	timeoutMs = 1_000,
): Promise<void> {
	const startedAt = Date.now();
	while (!condition()) {
		if (Date.now() - startedAt > timeoutMs) {
			throw new Error("Timed out waiting for condition");
		}
		await new Promise((resolve) => setTimeout(resolve, 0));
	}
}
