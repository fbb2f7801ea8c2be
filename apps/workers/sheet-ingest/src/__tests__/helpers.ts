import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig } from "@sheet-intake/core-config";
import type {
	EventLogger,
	JobConfig,
	LoggerService,
} from "@sheet-intake/job-base";
import { vi } from "vitest";

export const createMockLogger = (): LoggerService => {
	const logger = {
		log: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
		critical: vi.fn(),
		child: vi.fn(),
	};
	logger.child.mockReturnValue(logger);
	return logger as unknown as LoggerService;
};

export const createMockEventLogger = (): EventLogger =>
	({
		runStarted: vi.fn(),
		runCompleted: vi.fn(),
		runAborted: vi.fn(),
		attachmentStaged: vi.fn(),
		attachmentRejected: vi.fn(),
		fileRouted: vi.fn(),
	}) as unknown as EventLogger;

export async function writeRegistry(
	path: string,
	senders: Record<string, { code: string; language?: string; sequence?: number }>,
): Promise<void> {
	await writeFile(path, JSON.stringify({ senders }, null, 2));
}

export interface TempWorkspace {
	root: string;
	staging: string;
	success: string;
	error: string;
	output: string;
	registryPath: string;
	templateDir: string;
	cleanup(): Promise<void>;
}

export async function createTempWorkspace(): Promise<TempWorkspace> {
	const root = await mkdtemp(join(tmpdir(), "sheet-ingest-"));
	return {
		root,
		staging: join(root, "sandbox"),
		success: join(root, "success"),
		error: join(root, "error"),
		output: join(root, "output"),
		registryPath: join(root, "senders.json"),
		templateDir: join(root, "reports"),
		cleanup: () => rm(root, { recursive: true, force: true }),
	};
}

export function createTestConfig(
	workspace: TempWorkspace,
	env: Record<string, string> = {},
): JobConfig {
	return loadConfig({
		env: {
			STAGING_DIR: workspace.staging,
			SUCCESS_DIR: workspace.success,
			ERROR_DIR: workspace.error,
			OUTPUT_DIR: workspace.output,
			SENDER_REGISTRY_PATH: workspace.registryPath,
			REPORT_TEMPLATE_DIR: workspace.templateDir,
			REPORT_EMAIL: "archive@example.org",
			...env,
		},
	});
}
