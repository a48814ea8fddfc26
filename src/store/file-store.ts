/**
 * FileStateStore: a MemoryStateStore whose permanent partition survives a
 * restart.
 *
 * Every permanent mutation is appended to a JSONL journal as `{op, key, value}`
 * before the call resolves. Opening the store replays the journal; corrupt
 * lines are reported, not dropped silently. When the journal holds more
 * lines than live keys it is rewritten through a temp file and a rename.
 * Ephemeral entries (mirrors, leases) stay in memory only.
 */

import { appendFile, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import { StoreError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";
import { partitionOf as defaultPartitionOf } from "./keys.js";
import { MemoryStateStore } from "./memory-store.js";
import type { Partition, StateStore } from "./types.js";

export interface FileStateStoreConfig {
	readonly filePath: string;
	readonly clock?: Clock;
	readonly logger?: Logger;
	readonly maxCachedEntries?: number;
	readonly partitionOf?: (key: string) => Partition;
}

/** A journal line that could not be read back. */
export interface CorruptLine {
	readonly lineNumber: number;
	readonly raw: string;
}

const journalLineSchema = z.discriminatedUnion("op", [
	z.object({ op: z.literal("set"), key: z.string(), value: z.string() }),
	z.object({ op: z.literal("del"), key: z.string() }),
]);
type JournalLine = z.infer<typeof journalLineSchema>;

export class FileStateStore implements StateStore {
	private readonly memory: MemoryStateStore;
	private readonly filePath: string;
	private readonly logger: Logger;
	private readonly partition: (key: string) => Partition;
	private readonly _corruptLines: readonly CorruptLine[];
	private writeQueue: Promise<void> = Promise.resolve();
	private closed = false;

	private constructor(
		config: FileStateStoreConfig,
		memory: MemoryStateStore,
		corruptLines: readonly CorruptLine[],
		logger: Logger,
	) {
		this.memory = memory;
		this.filePath = config.filePath;
		this.logger = logger;
		this.partition = config.partitionOf ?? defaultPartitionOf;
		this._corruptLines = corruptLines;
	}

	/**
	 * Replays the journal at `filePath`; a missing file is an empty store.
	 * @throws StoreError when the file exists but cannot be read or compacted
	 */
	static async open(config: FileStateStoreConfig): Promise<FileStateStore> {
		const logger = (config.logger ?? silentLogger).child({ component: "file-store" });
		const memory = new MemoryStateStore({
			...(config.clock !== undefined && { clock: config.clock }),
			...(config.maxCachedEntries !== undefined && { maxCachedEntries: config.maxCachedEntries }),
			...(config.partitionOf !== undefined && { partitionOf: config.partitionOf }),
		});

		const content = await readJournal(config.filePath);
		const corruptLines: CorruptLine[] = [];
		const live = new Map<string, string>();
		let lines = 0;
		content.split("\n").forEach((raw, index) => {
			const trimmed = raw.trim();
			if (trimmed.length === 0) return;
			lines++;
			const entry = parseLine(trimmed);
			if (entry === null) {
				corruptLines.push({ lineNumber: index + 1, raw: trimmed.slice(0, 200) });
				return;
			}
			if (entry.op === "set") live.set(entry.key, entry.value);
			else live.delete(entry.key);
		});

		for (const [key, value] of live) {
			await memory.setPermanent(key, value);
		}
		if (corruptLines.length > 0) {
			logger.warn(
				{ filePath: config.filePath, corrupt: corruptLines.map((l) => l.lineNumber) },
				"corrupt journal lines skipped",
			);
		}

		const store = new FileStateStore(config, memory, corruptLines, logger);
		if (corruptLines.length === 0 && lines > live.size) {
			await store.compact(live);
		}
		logger.info({ filePath: config.filePath, keys: live.size }, "state restored");
		return store;
	}

	/** Lines skipped while opening. */
	get corruptLines(): readonly CorruptLine[] {
		return this._corruptLines;
	}

	get(key: string): Promise<string | null> {
		return this.memory.get(key);
	}

	async setPermanent(key: string, value: string): Promise<void> {
		this.expectOpen();
		await this.memory.setPermanent(key, value);
		await this.append({ op: "set", key, value });
	}

	setCached(key: string, value: string, ttlMs: number): Promise<void> {
		return this.memory.setCached(key, value, ttlMs);
	}

	setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
		return this.memory.setIfAbsent(key, value, ttlMs);
	}

	async deleteIfEquals(key: string, expected: string): Promise<boolean> {
		const deleted = await this.memory.deleteIfEquals(key, expected);
		if (deleted && this.partition(key) === "permanent") {
			await this.append({ op: "del", key });
		}
		return deleted;
	}

	async delete(key: string): Promise<void> {
		const permanent = this.partition(key) === "permanent" && (await this.memory.get(key)) !== null;
		await this.memory.delete(key);
		if (permanent) await this.append({ op: "del", key });
	}

	ttl(key: string): Promise<number | null> {
		return this.memory.ttl(key);
	}

	keys(prefix: string): Promise<string[]> {
		return this.memory.keys(prefix);
	}

	/** Drains pending journal writes. */
	async close(): Promise<void> {
		this.closed = true;
		await this.writeQueue.catch(() => undefined);
	}

	private append(line: JournalLine): Promise<void> {
		const text = `${JSON.stringify(line)}\n`;
		const next = this.writeQueue
			.catch(() => undefined)
			.then(() => appendFile(this.filePath, text, "utf-8"))
			.catch((cause: unknown) => {
				this.logger.error({ filePath: this.filePath, key: line.key, cause: String(cause) }, "journal write failed");
				throw new StoreError("Journal write failed", { filePath: this.filePath, key: line.key, cause });
			});
		this.writeQueue = next;
		return next;
	}

	private async compact(live: ReadonlyMap<string, string>): Promise<void> {
		const body = [...live].map(([key, value]) => `${JSON.stringify({ op: "set", key, value })}\n`).join("");
		const tmp = `${this.filePath}.tmp`;
		try {
			await writeFile(tmp, body, "utf-8");
			await rename(tmp, this.filePath);
		} catch (cause) {
			throw new StoreError("Journal compaction failed", { filePath: this.filePath, cause });
		}
		this.logger.debug({ filePath: this.filePath, keys: live.size }, "journal compacted");
	}

	private expectOpen(): void {
		if (this.closed) throw new StoreError("Store is closed", { filePath: this.filePath });
	}
}

async function readJournal(filePath: string): Promise<string> {
	try {
		return await readFile(filePath, "utf-8");
	} catch (cause: unknown) {
		if (isNodeError(cause) && cause.code === "ENOENT") {
			try {
				await mkdir(dirname(filePath), { recursive: true });
			} catch (mkdirCause) {
				throw new StoreError("State directory cannot be created", { filePath, cause: mkdirCause });
			}
			return "";
		}
		throw new StoreError("Journal cannot be read", { filePath, cause });
	}
}

function parseLine(raw: string): JournalLine | null {
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch {
		return null;
	}
	const parsed = journalLineSchema.safeParse(json);
	return parsed.success ? parsed.data : null;
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
