import { createRequire } from "node:module";
import { Injectable } from "@nestjs/common";
import type { Span, Tracer } from "dd-trace";
import type { JobConfig } from "../config/config.module.js";

const require = createRequire(import.meta.url);

function isTracerModule(value: unknown): value is { default: Tracer } {
	return (
		typeof value === "object" &&
		value !== null &&
		"default" in value &&
		typeof value.default === "object" &&
		value.default !== null &&
		"init" in value.default
	);
}

@Injectable()
export class TelemetryService {
	private tracer: Tracer | null = null;
	private prefix = "sheet_intake";
	private baseTags: Record<string, string> = {};

	initialize(config: JobConfig): void {
		this.prefix = config.datadog.metricPrefix;

		// Set base tags for all metrics
		this.baseTags = {
			env: config.base.env,
			service: config.base.service.name,
			version: config.base.service.version,
			team: config.base.service.team,
			domain: config.base.service.domain,
			pipeline: config.base.service.pipeline,
		};

		if (!config.datadog.traceEnabled) {
			return;
		}

		try {
			const ddTrace: unknown = require("dd-trace");
			if (!isTracerModule(ddTrace)) {
				console.warn("dd-trace did not expose a tracer, tracing disabled");
				return;
			}
			this.tracer = ddTrace.default.init({
				service: config.base.service.name,
				version: config.base.service.version,
				env: config.base.env,
				logInjection: true,
				runtimeMetrics: config.datadog.runtimeMetricsEnabled,
			});
		} catch (error) {
			// dd-trace may not be available in all environments
			console.warn(
				`dd-trace not available, tracing disabled: ${
					error instanceof Error ? error.message : String(error)
				}`,
			);
		}
	}

	/**
	 * Get base tags for metrics (low cardinality only)
	 */
	getMetricTags(extra?: Record<string, string>): Record<string, string> {
		return { ...this.baseTags, ...extra };
	}

	/**
	 * Increment a counter metric
	 */
	increment(name: string, value = 1, tags?: Record<string, string>): void {
		this.tracer?.dogstatsd.increment(
			`${this.prefix}.${name}`,
			value,
			this.getMetricTags(tags),
		);
	}

	/**
	 * Record a gauge metric
	 */
	gauge(name: string, value: number, tags?: Record<string, string>): void {
		this.tracer?.dogstatsd.gauge(
			`${this.prefix}.${name}`,
			value,
			this.getMetricTags(tags),
		);
	}

	/**
	 * Record a histogram/timing metric
	 */
	timing(
		name: string,
		durationMs: number,
		tags?: Record<string, string>,
	): void {
		this.tracer?.dogstatsd.histogram(
			`${this.prefix}.${name}`,
			durationMs,
			this.getMetricTags(tags),
		);
	}

	/**
	 * Run `fn` inside a traced span; without a tracer `fn` gets no span.
	 */
	async withSpan<T>(
		name: string,
		tags: Record<string, string>,
		fn: (span?: Span) => Promise<T>,
	): Promise<T> {
		if (!this.tracer) {
			return fn();
		}

		return this.tracer.trace(name, { tags }, async (span: Span) => {
			try {
				return await fn(span);
			} catch (error) {
				span.setTag("error", true);
				if (error instanceof Error) {
					span.setTag("error.message", error.message);
				}
				throw error;
			}
		});
	}
}
