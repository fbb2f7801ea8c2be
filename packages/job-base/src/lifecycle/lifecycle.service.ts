import { Injectable, type OnApplicationShutdown } from "@nestjs/common";
import type { LoggerService } from "../telemetry/logger.service.js";
import type { TelemetryService } from "../telemetry/telemetry.service.js";

export type ShutdownSignal = "SIGTERM" | "SIGINT";

type ShutdownCallback = () => Promise<void>;

@Injectable()
export class LifecycleService implements OnApplicationShutdown {
	private shutdownCallbacks: ShutdownCallback[] = [];
	private isShuttingDown = false;
	private signal?: ShutdownSignal;

	constructor(
		private readonly logger: LoggerService,
		private readonly telemetry: TelemetryService,
	) {
		process.on("SIGTERM", () => this.handleSignal("SIGTERM"));
		process.on("SIGINT", () => this.handleSignal("SIGINT"));
		process.on("uncaughtException", (error) =>
			this.handleUncaughtException(error),
		);
		process.on("unhandledRejection", (reason) =>
			this.handleUnhandledRejection(reason),
		);
	}

	/**
	 * Register a callback to be executed during shutdown
	 */
	onShutdown(callback: ShutdownCallback): void {
		this.shutdownCallbacks.push(callback);
	}

	/**
	 * A signal arrived; the current run finishes its file and stops polling.
	 */
	isShutdownInProgress(): boolean {
		return this.isShuttingDown;
	}

	getSignal(): ShutdownSignal | undefined {
		return this.signal;
	}

	async onApplicationShutdown(signal?: string): Promise<void> {
		// LIFO, like the teardown order of the resources they close
		for (const callback of [...this.shutdownCallbacks].reverse()) {
			try {
				await callback();
			} catch (error) {
				this.logger.error(
					"Shutdown callback failed",
					error instanceof Error ? error.stack : String(error),
				);
			}
		}
		this.shutdownCallbacks = [];

		this.logger.info("Job shut down", {
			signal: signal ?? this.signal ?? "none",
		});
	}

	private handleSignal(signal: ShutdownSignal): void {
		if (this.isShuttingDown) {
			return;
		}

		this.isShuttingDown = true;
		this.signal = signal;
		this.logger.warn("Shutdown signal received", { signal });
		this.telemetry.increment("job.signal_received", 1, { signal });
	}

	private handleUncaughtException(error: Error): void {
		this.logger.critical("Uncaught exception", { error });
		this.telemetry.increment("job.uncaught_exception");

		// Give time for logs to flush, then exit
		setTimeout(() => {
			process.exit(1);
		}, 1000);
	}

	private handleUnhandledRejection(reason: unknown): void {
		const message = reason instanceof Error ? reason.message : String(reason);
		const stack = reason instanceof Error ? reason.stack : undefined;

		this.logger.critical("Unhandled rejection", { error_message: message, stack });
		this.telemetry.increment("job.unhandled_rejection");

		setTimeout(() => {
			process.exit(1);
		}, 1000);
	}
}
