import { loadConfig } from "@sheet-intake/core-config";
import { pino } from "pino";
import { beforeEach, describe, expect, it } from "vitest";
import type { JobConfig } from "../../config/config.module.js";
import { LoggerService, redactObject } from "../logger.service.js";

const createConfig = (env: Record<string, string> = {}): JobConfig =>
	loadConfig({ env: { LOG_LEVEL: "debug", ...env } });

/**
 * Logger writing JSON lines into an array instead of stdout
 */
function createCapturingLogger(config: JobConfig): {
	logger: LoggerService;
	lines: Array<Record<string, unknown>>;
} {
	const lines: Array<Record<string, unknown>> = [];
	const instance = pino(
		{ level: "trace" },
		{
			write(chunk: string) {
				lines.push(JSON.parse(chunk));
			},
		},
	);
	return { logger: new LoggerService(config, instance), lines };
}

describe("LoggerService", () => {
	let logger: LoggerService;
	let lines: Array<Record<string, unknown>>;

	beforeEach(() => {
		({ logger, lines } = createCapturingLogger(createConfig()));
	});

	it("should add the service tags to every line", () => {
		logger.info("Run started", { run_id: "run-1" });

		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({
			msg: "Run started",
			run_id: "run-1",
			team: "records",
			domain: "intake",
			pipeline: "sheet-intake",
		});
	});

	it("should redact sensitive keys", () => {
		logger.warn("Login failed", { password: "test-secret", user: "intake" });

		expect(lines[0]?.["password"]).toBe("[REDACTED]");
		expect(lines[0]?.["user"]).toBe("intake");
	});

	it("should keep e-mail addresses unless redaction is enabled", () => {
		logger.info("Unknown sender", { sender: "z@unknown.com" });
		expect(lines[0]?.["sender"]).toBe("z@unknown.com");

		const redacting = createCapturingLogger(
			createConfig({ LOG_REDACT_EMAILS: "true" }),
		);
		redacting.logger.info("Unknown sender", { sender: "z@unknown.com" });
		expect(redacting.lines[0]?.["sender"]).toBe("[PII_REDACTED]");
	});

	it("should serialize errors passed in the context", () => {
		logger.error("File failed", { error: new Error("boom") });

		expect(lines[0]?.["level"]).toBe(50);
		expect(lines[0]?.["error"]).toMatchObject({
			name: "Error",
			message: "boom",
		});
	});

	it("should accept the Nest error signature", () => {
		logger.error("Bootstrap failed", "stack trace", "NestFactory");

		expect(lines[0]).toMatchObject({
			msg: "Bootstrap failed",
			stack: "stack trace",
			nestContext: "NestFactory",
		});
	});

	it("should mark critical lines", () => {
		logger.critical("Registry write failed", { file: "senders.json" });

		expect(lines[0]).toMatchObject({ level: 50, critical: true });
	});

	it("should bind context on child loggers", () => {
		const child = logger.child({ run_id: "run-7", token: "test-token" });
		child.debug("Scanning staging", { stage: "pipeline" });

		expect(lines[0]).toMatchObject({
			run_id: "run-7",
			token: "[REDACTED]",
			stage: "pipeline",
		});
	});
});

describe("redactObject", () => {
	it("should redact nested values and arrays", () => {
		const result = redactObject(
			{
				smtp: { host: "smtp.example.org", auth_user: "intake" },
				recipients: ["a@x.org", "b@x.org"],
				sent_at: new Date(0),
			},
			{ emails: true },
		);

		expect(result).toEqual({
			smtp: { host: "smtp.example.org", auth_user: "[REDACTED]" },
			recipients: ["[PII_REDACTED]", "[PII_REDACTED]"],
			sent_at: new Date(0),
		});
	});
});
