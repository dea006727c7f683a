import pino, { type Logger } from "pino";

/** stdout carries Tailwind's output, so diagnostics go to stderr */
const STDERR_FD = 2;

/**
 * Create the package's root logger.
 *
 * `LOG_LEVEL` sets the level (default "warn"). `NODE_ENV=development`
 * switches to pino-pretty, which writes to stderr as well.
 */
export function createRootLogger(env: NodeJS.ProcessEnv = process.env): Logger {
	const options = {
		name: "tailwind-cli-runner",
		level: env.LOG_LEVEL || "warn",
	};

	if (env.NODE_ENV === "development") {
		return pino({
			...options,
			transport: {
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "HH:MM:ss",
					ignore: "pid,hostname",
					destination: STDERR_FD,
				},
			},
		});
	}

	return pino(options, pino.destination({ dest: STDERR_FD, sync: true }));
}

export const logger = createRootLogger();

export const createLogger = (component: string) => logger.child({ component });

export const loggers = {
	platform: createLogger("platform"),
	materializer: createLogger("materializer"),
	invoker: createLogger("invoker"),
	runner: createLogger("runner"),
	cli: createLogger("cli"),
};
