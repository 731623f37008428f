/**
 * Sentinel marker helpers.
 *
 * The marker is appended to every prompt as an instruction ("print X on its
 * own line when done"). Only lines consisting of the marker alone count as the
 * agent's end-of-response signal; the echoed instruction, which contains the
 * marker inside other text, never does.
 *
 * @module sentinel-marker
 */

import { randomBytes } from 'crypto';
import { AGENT_PIPE_CONSTANTS } from '../../constants.js';
import { stripAnsiCodes, stripLeadingGlyph, stripTuiLineBorders } from '../../utils/terminal-string-ops.js';

/**
 * Generate a fresh marker, e.g. `===PIPE_END_9f86d081===`.
 */
export function createSentinelMarker(): string {
	const { PREFIX, SUFFIX, RANDOM_BYTES } = AGENT_PIPE_CONSTANTS.MARKER;
	return `${PREFIX}${randomBytes(RANDOM_BYTES).toString('hex')}${SUFFIX}`;
}

/**
 * Instruction appended to the prompt that asks the agent to print the marker.
 * Its `print <marker>` fragment identifies the prompt echo in the pane.
 */
export function buildMarkerInstruction(marker: string): string {
	return ` (When done, ${markerInstructionFragment(marker)} on its own line)`;
}

/**
 * Fragment of the instruction that is unique to the echoed prompt.
 */
export function markerInstructionFragment(marker: string): string {
	return `print ${marker}`;
}

/**
 * Prompt text as typed into the pane: the user prompt plus the marker instruction.
 */
export function appendMarkerInstruction(prompt: string, marker: string): string {
	return prompt + buildMarkerInstruction(marker);
}

/**
 * True when a line holds the marker and nothing else, ignoring surrounding
 * whitespace, panel borders and a leading response bullet.
 */
export function isStandaloneMarkerLine(line: string, marker: string): boolean {
	if (!marker || !line.includes(marker)) return false;
	return stripTuiLineBorders(stripLeadingGlyph(line)) === marker;
}

function isHexDigit(cp: number): boolean {
	return (cp >= 0x30 && cp <= 0x39) || (cp >= 0x61 && cp <= 0x66);
}

/**
 * True when a line holds a marker of any request, this one or an earlier one,
 * and nothing else.
 */
export function isAnyStandaloneMarkerLine(line: string): boolean {
	const { PREFIX, SUFFIX, RANDOM_BYTES } = AGENT_PIPE_CONSTANTS.MARKER;
	const text = stripTuiLineBorders(stripLeadingGlyph(line));
	if (text.length !== PREFIX.length + RANDOM_BYTES * 2 + SUFFIX.length) return false;
	if (!text.startsWith(PREFIX) || !text.endsWith(SUFFIX)) return false;
	for (let i = PREFIX.length; i < text.length - SUFFIX.length; i++) {
		if (!isHexDigit(text.charCodeAt(i))) return false;
	}
	return true;
}

/**
 * Count standalone marker lines in a pane snapshot.
 */
export function countStandaloneMarkers(text: string, marker: string): number {
	const plain = stripAnsiCodes(text);
	if (!marker || !plain.includes(marker)) return 0;
	let count = 0;
	for (const line of plain.split('\n')) {
		if (isStandaloneMarkerLine(line, marker)) count++;
	}
	return count;
}
