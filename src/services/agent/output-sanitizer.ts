/**
 * Output Sanitizer
 *
 * Turns a raw pane capture into the agent's answer. The work is split into
 * small named transforms applied in a fixed order; a new UI quirk is handled
 * by adding a transform to OUTPUT_TRANSFORMS.
 *
 * @module output-sanitizer
 */

import { SANITIZER_CONSTANTS } from '../../constants.js';
import { LoggerService } from '../core/logger.service.js';
import { EmptyResponseError } from '../core/errors.js';
import {
	hasTuiFrame,
	isBorderOnlyLine,
	isPromptLine,
	isStatusLine,
	startsWithDecorativeGlyph,
	stripAnsiCodes,
	stripLeadingGlyph,
	stripTuiLineBorders,
} from '../../utils/terminal-string-ops.js';
import { isAnyStandaloneMarkerLine, isStandaloneMarkerLine, markerInstructionFragment } from './sentinel-marker.js';

/**
 * What the sanitizer knows about the request that produced the capture.
 */
export interface SanitizeContext {
	/** Sentinel marker of this request */
	marker: string;
	/** Prompt as written by the user (without the marker instruction) */
	prompt?: string;
}

/** A single step of the sanitizer pipeline */
export interface OutputTransform {
	name: string;
	apply(lines: readonly string[], context: SanitizeContext): string[];
}

function isBlank(line: string): boolean {
	return line.trim().length === 0;
}

/**
 * First line of the prompt, cut to the length that is matched against the echo.
 */
export function promptNeedle(prompt: string): string {
	const firstLine = prompt.split('\n').find((line) => line.trim().length > 0) ?? '';
	return firstLine.trim().slice(0, SANITIZER_CONSTANTS.PROMPT_NEEDLE_LENGTH);
}

/**
 * Remove escape sequences and control bytes; CR/CRLF become line breaks.
 */
export function stripAnsiLines(lines: readonly string[]): string[] {
	return stripAnsiCodes(lines.join('\n')).split('\n');
}

export function trimLineEnds(lines: readonly string[]): string[] {
	return lines.map((line) => line.trimEnd());
}

/**
 * Keep only the answer region of the capture.
 *
 * The region ends before the last standalone marker line (or at the end of the
 * capture). Earlier requests still in the scrollback end with their own marker
 * line, so the region starts after the closest marker line of any request
 * above it. Within that, the answer starts after the prompt echo, found by the
 * marker instruction fragment or, failing that, by the last line holding the
 * prompt needle. Wrapped echo lines before the first answer line are skipped.
 */
export function selectResponseRegion(lines: readonly string[], context: SanitizeContext): string[] {
	const { marker } = context;

	let end = lines.length;
	for (let i = lines.length - 1; i >= 0; i--) {
		if (isStandaloneMarkerLine(lines[i], marker)) {
			end = i;
			break;
		}
	}

	let regionStart = 0;
	for (let i = end - 1; i >= 0; i--) {
		if (isStandaloneMarkerLine(lines[i], marker) || isAnyStandaloneMarkerLine(lines[i])) {
			regionStart = i + 1;
			break;
		}
	}

	let start = -1;
	const fragment = marker ? markerInstructionFragment(marker) : '';
	for (let i = end - 1; fragment && i >= regionStart; i--) {
		if (lines[i].includes(fragment)) {
			start = i + 1;
			break;
		}
	}

	const needle = context.prompt ? promptNeedle(context.prompt) : '';
	for (let i = end - 1; start === -1 && needle && i >= regionStart; i--) {
		if (lines[i].includes(needle)) {
			start = i + 1;
		}
	}

	if (start === -1) {
		return lines.slice(regionStart, end);
	}

	while (start < end) {
		const trimmed = lines[start].trim();
		const isEchoTail = trimmed.endsWith(')') && !startsWithDecorativeGlyph(trimmed);
		if (trimmed.length > 0 && !isEchoTail) break;
		start++;
	}
	return lines.slice(start, end);
}

/**
 * Remove any marker text left inside a line.
 */
export function stripMarker(lines: readonly string[], context: SanitizeContext): string[] {
	if (!context.marker) return [...lines];
	return lines.map((line) => {
		let result = line;
		while (result.includes(context.marker)) {
			result = result.split(context.marker).join('').trimEnd();
		}
		return result;
	});
}

/**
 * Drop spinner and progress lines such as `✻ Thinking…` or `• Thinking...`.
 */
export function stripStatusLines(lines: readonly string[]): string[] {
	return lines.filter((line) => !isStatusLine(line));
}

/**
 * Remove the decorative glyphs (● ⏺ ⎿ •) that prefix agent output blocks, and
 * the two-column indent of the lines that continue such a block.
 */
export function stripBullets(lines: readonly string[]): string[] {
	const out: string[] = [];
	let inBlock = false;
	for (const line of lines) {
		if (startsWithDecorativeGlyph(line)) {
			inBlock = true;
			out.push(stripLeadingGlyph(line));
		} else if (inBlock && line.startsWith('  ')) {
			out.push(line.slice(2));
		} else {
			out.push(line);
		}
	}
	return out;
}

/**
 * Drop horizontal rules and strip panel frames (│ ┃ ║).
 */
export function stripBorders(lines: readonly string[]): string[] {
	const out: string[] = [];
	for (const line of lines) {
		if (isBorderOnlyLine(line)) continue;
		out.push(hasTuiFrame(line) ? stripTuiLineBorders(line) : line);
	}
	return out;
}

function isTrailingChrome(line: string): boolean {
	const trimmed = line.trim();
	return (
		trimmed.length === 0 ||
		isPromptLine(trimmed) ||
		isBorderOnlyLine(trimmed) ||
		trimmed.includes(SANITIZER_CONSTANTS.SHORTCUTS_HINT) ||
		trimmed === '? for' ||
		trimmed === 'shortcuts'
	);
}

/**
 * Pop the idle input box and its hints from the end of the capture.
 */
export function stripTrailingChrome(lines: readonly string[]): string[] {
	let end = lines.length;
	while (end > 0 && isTrailingChrome(lines[end - 1])) end--;
	return lines.slice(0, end);
}

/**
 * Collapse runs of blank lines into a single empty line.
 */
export function collapseBlankRuns(lines: readonly string[]): string[] {
	const out: string[] = [];
	for (const line of lines) {
		if (isBlank(line)) {
			if (out.length > 0 && out[out.length - 1] === '') continue;
			out.push('');
		} else {
			out.push(line);
		}
	}
	return out;
}

/**
 * The sanitizer pipeline, in application order.
 */
export const OUTPUT_TRANSFORMS: readonly OutputTransform[] = [
	{ name: 'strip-ansi', apply: stripAnsiLines },
	{ name: 'trim-line-ends', apply: trimLineEnds },
	{ name: 'select-response-region', apply: selectResponseRegion },
	{ name: 'strip-marker', apply: stripMarker },
	{ name: 'strip-status-lines', apply: stripStatusLines },
	{ name: 'strip-bullets', apply: stripBullets },
	{ name: 'strip-borders', apply: stripBorders },
	{ name: 'strip-trailing-chrome', apply: stripTrailingChrome },
	{ name: 'collapse-blank-runs', apply: collapseBlankRuns },
];

/**
 * Transforms that only remove animation and formatting noise. Used to compare
 * successive snapshots while waiting for the response.
 */
const NORMALIZE_TRANSFORMS: readonly OutputTransform[] = [
	{ name: 'strip-ansi', apply: stripAnsiLines },
	{ name: 'trim-line-ends', apply: trimLineEnds },
	{ name: 'strip-status-lines', apply: stripStatusLines },
	{ name: 'collapse-blank-runs', apply: collapseBlankRuns },
];

function runTransforms(raw: string, transforms: readonly OutputTransform[], context: SanitizeContext): string {
	let lines = raw.split('\n');
	for (const transform of transforms) {
		lines = transform.apply(lines, context);
	}
	return lines.join('\n').trim();
}

/**
 * Reduce a snapshot to its substantive content so that spinner frames and
 * elapsed-time counters do not count as a change.
 */
export function normalizeSnapshot(raw: string): string {
	return runTransforms(raw, NORMALIZE_TRANSFORMS, { marker: '' });
}

/**
 * Run the full pipeline without the empty-result check.
 */
export function cleanOutput(raw: string, context: SanitizeContext): string {
	return runTransforms(raw, OUTPUT_TRANSFORMS, context);
}

/**
 * Extract the clean answer from a raw pane capture.
 *
 * @param raw - Pane snapshot that ended the wait
 * @param context - Marker and prompt of the request
 * @returns The answer text
 * @throws EmptyResponseError if nothing is left after sanitizing
 */
export function sanitize(raw: string, context: SanitizeContext): string {
	const answer = cleanOutput(raw, context);
	if (answer.length === 0) {
		LoggerService.getInstance()
			.createComponentLogger('OutputSanitizer')
			.debug('Sanitized output is empty; raw capture follows', { marker: context.marker, raw });
		throw new EmptyResponseError(raw);
	}
	return answer;
}
