/**
 * Progress event helpers.
 *
 * The column layer reports noteworthy decisions (such as wrapping a geometry in
 * `ST_Transform`) as progress events handed to an `onProgress` callback. The
 * default callback writes them to the console.
 *
 * @module
 */

export type ProgressLevel = "info" | "warn"

/** Progress payload containing a message, its level and a timestamp. */
export type Progress = {
	msg: string
	level: ProgressLevel
	timestamp: number
}

/** CustomEvent carrying progress details. */
export interface ProgressEvent extends CustomEvent<Progress> {}

/** Create a Progress payload with the current timestamp. */
export function progress(msg: string, level: ProgressLevel = "info"): Progress {
	return {
		msg,
		level,
		timestamp: Date.now(),
	}
}

/** Create a ProgressEvent with the given message. */
export function progressEvent(
	msg: string,
	level: ProgressLevel = "info",
): ProgressEvent {
	return new CustomEvent("progress", { detail: progress(msg, level) })
}

/**
 * Log a progress event's message to the console. Warnings go to `console.warn`.
 */
export function logProgress(event: ProgressEvent) {
	const { msg, level } = event.detail
	if (level === "warn") console.warn(msg)
	else console.log(msg)
}

/** Callback that drops every event. */
export function ignoreProgress(_event: ProgressEvent) {}
