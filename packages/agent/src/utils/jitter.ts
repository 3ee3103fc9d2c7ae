/**
 * Offset a base interval by a uniform random amount in [-spreadMs, spreadMs].
 * Never returns less than 1ms.
 */
export function jitter(baseMs: number, spreadMs: number, random: () => number = Math.random): number {
	const spread = Math.max(0, Math.floor(spreadMs));
	const offset = Math.floor(random() * (spread * 2 + 1)) - spread;
	return Math.max(1, baseMs + offset);
}
