const DEFAULT_PORT = 3000;
const DEFAULT_ROTATION_INTERVAL_SECONDS = 60;
const DEFAULT_KV_COMMAND_TIMEOUT_MS = 2000;
const DEFAULT_VERIFY_WINDOW_MS = 60_000;
const DEFAULT_VERIFY_MAX = 10;

export type AppConfig = {
	port: number;
	kvUrl: string;
	nodeEnv: string | undefined;
	rotationIntervalSeconds: number;
	kvCommandTimeoutMs: number;
	eagerRotation: boolean;
	verifyRateLimitWindowMs: number;
	verifyRateLimitMax: number;
	attendanceLogWhitelist: string[];
};

function positiveNumber(raw: string | undefined, fallback: number): number {
	const value = Number(raw ?? fallback);
	return Number.isFinite(value) && value > 0 ? value : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const port = positiveNumber(env.PORT, DEFAULT_PORT);
	const kvUrl = env.KV_URL?.trim() ?? "";
	const nodeEnv = env.NODE_ENV;
	const rotationIntervalSeconds = positiveNumber(
		env.ROTATION_INTERVAL_SECONDS,
		DEFAULT_ROTATION_INTERVAL_SECONDS
	);
	const kvCommandTimeoutMs = positiveNumber(
		env.KV_COMMAND_TIMEOUT_MS,
		DEFAULT_KV_COMMAND_TIMEOUT_MS
	);
	const eagerRotation = String(env.EAGER_ROTATION ?? "false") === "true";
	const verifyRateLimitWindowMs = positiveNumber(
		env.VERIFY_WINDOW_MS,
		DEFAULT_VERIFY_WINDOW_MS
	);
	const verifyRateLimitMax = positiveNumber(
		env.VERIFY_MAX,
		DEFAULT_VERIFY_MAX
	);
	const attendanceLogWhitelist = (env.ATTENDANCE_LOG_WHITELIST ?? "")
		.split(",")
		.map((s) => s.trim())
		.filter(Boolean);

	return {
		port,
		kvUrl,
		nodeEnv,
		rotationIntervalSeconds,
		kvCommandTimeoutMs,
		eagerRotation,
		verifyRateLimitWindowMs,
		verifyRateLimitMax,
		attendanceLogWhitelist,
	};
}

export function requireKvUrl(cfg: AppConfig): string {
	if (!cfg.kvUrl) {
		// eslint-disable-next-line no-console
		console.error(
			JSON.stringify(
				{
					error: {
						code: "CONFIG_KV_URL",
						message: "KV_URL must be set to a Redis connection string",
					},
				},
				null,
				2
			)
		);
		process.exit(1);
	}
	return cfg.kvUrl;
}
