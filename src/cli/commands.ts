export const COMMANDS = ["stream", "rebalance", "serve"] as const;
export type Command = (typeof COMMANDS)[number];

export const USAGE = `usage: spot-rebalancer <${COMMANDS.join("|")}>`;

/** First argument as a known command, or null. */
export function parseCommand(argv: readonly string[]): Command | null {
	const [name] = argv;
	return COMMANDS.find((c) => c === name) ?? null;
}
