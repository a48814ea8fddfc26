#!/usr/bin/env node
/**
 * Process entry.
 *
 *   spot-rebalancer stream      run the market/account stream until SIGINT/SIGTERM
 *   spot-rebalancer rebalance   run one rebalance and print the outcome as JSON
 *   spot-rebalancer serve       stream plus the HTTP trigger endpoint
 */

import { createLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { loadConfig } from "../shared/config.js";
import type { AppConfig } from "../shared/config.js";
import { ConfigError } from "../shared/errors.js";
import { USAGE, parseCommand } from "./commands.js";
import {
	type Runtime,
	createRebalanceTask,
	createRuntime,
	createStreamStack,
	openStateStore,
	triggerAuth,
} from "./runtime.js";
import { buildTriggerServer } from "./server.js";

/** Resolves on the first of SIGINT or SIGTERM. */
function shutdownSignal(logger: Logger): Promise<void> {
	return new Promise((resolve) => {
		const onSignal = (signal: NodeJS.Signals) => {
			logger.info({ signal }, "shutting down");
			process.off("SIGINT", onSignal);
			process.off("SIGTERM", onSignal);
			resolve();
		};
		process.on("SIGINT", onSignal);
		process.on("SIGTERM", onSignal);
	});
}

/** Builds the runtime on the configured store and closes the store afterwards. */
async function withRuntime(
	config: AppConfig,
	logger: Logger,
	fn: (runtime: Runtime) => Promise<number>,
): Promise<number> {
	const store = await openStateStore(config, logger);
	try {
		return await fn(createRuntime(config, logger, { store }));
	} finally {
		await store.close();
	}
}

async function runStream(runtime: Runtime): Promise<number> {
	const { config, logger } = runtime;
	const stack = createStreamStack(runtime);
	stack.start();
	logger.info({ symbol: config.symbol, private: stack.session !== null }, "stream started");
	await shutdownSignal(logger);
	await stack.shutdown();
	return 0;
}

async function runRebalance(runtime: Runtime): Promise<number> {
	const outcome = await createRebalanceTask(runtime).run();
	process.stdout.write(
		`${JSON.stringify({
			status: outcome.status,
			action: outcome.action,
			quantity: outcome.quantity,
			reason: outcome.reason,
			orderId: outcome.orderId,
		})}\n`,
	);
	return outcome.status === "error" ? 1 : 0;
}

async function runServe(runtime: Runtime): Promise<number> {
	const { config, logger } = runtime;
	if (config.triggerSecret === null && config.triggerBearerToken === null) {
		logger.warn("no trigger secret or bearer token configured; every trigger will be refused");
	}
	const stack = createStreamStack(runtime);
	const app = buildTriggerServer({
		task: createRebalanceTask(runtime),
		auth: triggerAuth(config),
		logger,
		streamStatus: () => ({ ...stack.supervisor.status() }),
	});
	stack.start();
	const address = await app.listen({ host: config.httpHost, port: config.httpPort });
	logger.info({ address }, "trigger endpoint listening");

	await shutdownSignal(logger);
	await app.close();
	await stack.shutdown();
	return 0;
}

async function main(argv: readonly string[]): Promise<number> {
	const command = parseCommand(argv);
	if (command === null) {
		process.stderr.write(`${USAGE}\n`);
		return 2;
	}

	let config: AppConfig;
	try {
		config = loadConfig();
	} catch (error) {
		if (!(error instanceof ConfigError)) throw error;
		process.stderr.write(`${error.message}\n`);
		return 2;
	}
	// stdout stays free for the rebalance result
	const logger = createLogger({ level: config.logLevel, destination: process.stderr });

	switch (command) {
		case "stream":
			return withRuntime(config, logger, runStream);
		case "rebalance":
			return withRuntime(config, logger, runRebalance);
		case "serve":
			return withRuntime(config, logger, runServe);
	}
}

main(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		process.stderr.write(`fatal: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
		process.exitCode = 1;
	},
);
