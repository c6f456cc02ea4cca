/**
 * OpenTelemetry helpers for bounded-exec
 *
 * Spans are only created when a tracer is configured; every helper
 * accepts `undefined` and does nothing in that case.
 */

import {
	type Attributes,
	type Context,
	context as otelContext,
	type Span,
	SpanStatusCode,
	type Tracer,
	trace,
} from "@opentelemetry/api";
import type { RunReport, TaskId, TaskResult } from "./types.js";

export interface RunSpan {
	readonly tracer: Tracer;
	readonly span: Span;
	readonly context: Context;
}

export function startRunSpan(
	tracer: Tracer | undefined,
	name: string,
	attributes: Attributes,
): RunSpan | undefined {
	if (!tracer) return undefined;
	const parent = otelContext.active();
	const span = tracer.startSpan(name, { attributes }, parent);
	return { tracer, span, context: trace.setSpan(parent, span) };
}

export function startTaskSpan(
	run: RunSpan | undefined,
	id: TaskId,
): Span | undefined {
	if (!run) return undefined;
	return run.tracer.startSpan(
		"task",
		{ attributes: { "task.id": String(id) } },
		run.context,
	);
}

export function endTaskSpan<T>(
	span: Span | undefined,
	outcome: TaskResult<T>,
	durationMs: number,
): void {
	if (!span) return;
	const [err] = outcome.result;
	span.setAttributes({
		"task.duration_ms": Math.round(durationMs),
		"task.outcome": err ? "failure" : "success",
	});
	if (err) {
		span.recordException(err);
		span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
	} else {
		span.setStatus({ code: SpanStatusCode.OK });
	}
	span.end();
}

export function endRunSpan<T>(
	run: RunSpan | undefined,
	report: RunReport<T>,
): void {
	if (!run) return;
	const { metrics } = report;
	run.span.setAttributes({
		"run.status": report.status,
		"run.results": report.results.length,
		"run.dispatched": metrics.dispatched,
		"run.succeeded": metrics.succeeded,
		"run.failed": metrics.failed,
		"run.dropped": metrics.dropped,
		"run.not_started": metrics.notStarted,
		"run.peak_concurrency": metrics.peakConcurrency,
	});
	if (report.reason) {
		run.span.recordException(report.reason);
		run.span.setStatus({
			code: SpanStatusCode.ERROR,
			message: report.reason.kind,
		});
	} else {
		run.span.setStatus({ code: SpanStatusCode.OK });
	}
	run.span.end();
}
