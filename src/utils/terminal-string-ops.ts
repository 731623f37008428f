/**
 * Terminal string operations: regex-free helpers for captured pane text.
 *
 * Every function in this module uses only string primitives (indexOf, includes,
 * startsWith, charCodeAt, codePointAt) with no regex, so large scrollback
 * captures cannot trigger catastrophic backtracking.
 *
 * @module terminal-string-ops
 */

import { PROMPT_DETECTION_CONSTANTS } from '../constants.js';

// ─── Character sets ───────────────────────────────────────────────────────────

/** Braille spinner characters. */
const SPINNER_CHARS = new Set([
	0x280B, // ⠋
	0x2819, // ⠙
	0x2839, // ⠹
	0x2838, // ⠸
	0x283C, // ⠼
	0x2834, // ⠴
	0x2826, // ⠦
	0x2827, // ⠧
	0x2807, // ⠇
	0x280F, // ⠏
]);

/** Star/asterisk glyphs the agent cycles through while it is working. */
const ACTIVITY_GLYPHS = new Set([
	0x273B, // ✻
	0x2736, // ✶
	0x2733, // ✳
	0x2722, // ✢
	0x273D, // ✽
	0x00B7, // ·
	0x002A, // *
]);

/**
 * Decorative glyphs that prefix blocks of agent output. These are removed
 * from the start of a line; the text after them is kept.
 */
const DECORATIVE_GLYPHS: readonly string[] = [
	'●', // U+25CF response bullet (older releases)
	'⏺', // U+23FA response bullet
	'⎿', // U+23BF tool-result elbow
	'•', // U+2022 generic bullet
];

const DECORATIVE_GLYPH_CODES = new Set(DECORATIVE_GLYPHS.map((glyph) => glyph.codePointAt(0) ?? 0));

/** Box-drawing codepoints (U+2500–U+257F). */
const BOX_DRAWING_MIN = 0x2500;
const BOX_DRAWING_MAX = 0x257F;

/** Vertical frame characters drawn around TUI panels. */
const TUI_BORDER_CHARS = new Set([
	0x2502, // │
	0x2503, // ┃
	0x2551, // ║
]);

/** Input prompt characters. */
const PROMPT_CHARS = new Set([
	0x276F, // ❯
	0x3E,   // >
	0x203A, // ›
]);

// ─── Helper predicates ────────────────────────────────────────────────────────

function isBoxDrawing(cp: number): boolean {
	return cp >= BOX_DRAWING_MIN && cp <= BOX_DRAWING_MAX;
}

function isTuiBorder(cp: number): boolean {
	return TUI_BORDER_CHARS.has(cp);
}

/**
 * Check if a codepoint is whitespace (space, tab or no-break space).
 */
function isWhitespace(cp: number): boolean {
	return cp === 0x20 || cp === 0x09 || cp === 0xA0;
}

function isAsciiLetter(cp: number): boolean {
	return (cp >= 0x41 && cp <= 0x5A) || (cp >= 0x61 && cp <= 0x7A);
}

/**
 * Width of a codepoint in UTF-16 code units.
 */
function codeUnitWidth(cp: number): number {
	return cp > 0xFFFF ? 2 : 1;
}

/**
 * Strip characters matching a predicate from both ends of a line.
 * All predicates in this module only match BMP characters.
 */
function trimWhere(line: string, predicate: (cp: number) => boolean): string {
	let start = 0;
	let end = line.length;
	while (start < end && predicate(line.charCodeAt(start))) start++;
	while (end > start && predicate(line.charCodeAt(end - 1))) end--;
	return line.slice(start, end);
}

// ─── stripAnsiCodes ───────────────────────────────────────────────────────────

/**
 * Strip ANSI escape codes and control bytes using a single-pass state machine.
 *
 * Handles CSI sequences, OSC sequences and two/three-byte escapes. Cursor-forward
 * (C) sequences become a space to preserve word boundaries. CR and CRLF become LF.
 *
 * @param content - Captured text that may contain escape sequences
 * @returns Plain text
 */
export function stripAnsiCodes(content: string): string {
	const len = content.length;
	const out: string[] = [];
	let i = 0;

	while (i < len) {
		const ch = content.charCodeAt(i);

		if (ch === 0x1B) {
			i++;
			if (i >= len) break;
			const next = content.charCodeAt(i);

			// CSI: ESC [ params intermediates final
			if (next === 0x5B) {
				i++;
				const isPrivate = i < len && content.charCodeAt(i) === 0x3F;
				while (i < len) {
					const c = content.charCodeAt(i);
					if (c >= 0x20 && c <= 0x3F) { i++; continue; }
					break;
				}
				if (i < len) {
					const final = content.charCodeAt(i);
					if (final >= 0x40 && final <= 0x7E) {
						if (!isPrivate && final === 0x43) out.push(' ');
						i++;
					}
				}
				continue;
			}

			// OSC: ESC ] ... BEL | ESC \
			if (next === 0x5D) {
				i++;
				while (i < len) {
					const c = content.charCodeAt(i);
					if (c === 0x07) { i++; break; }
					if (c === 0x1B && i + 1 < len && content.charCodeAt(i + 1) === 0x5C) { i += 2; break; }
					i++;
				}
				continue;
			}

			// Charset designation: ESC ( B, ESC ) 0
			if ((next === 0x28 || next === 0x29) && i + 1 < len) {
				i += 2;
				continue;
			}

			if (next >= 0x20 && next <= 0x7E) i++;
			continue;
		}

		if (ch === 0x0D) {
			out.push('\n');
			i += i + 1 < len && content.charCodeAt(i + 1) === 0x0A ? 2 : 1;
			continue;
		}

		// Control characters other than tab and newline
		if ((ch <= 0x08) || ch === 0x0B || ch === 0x0C || (ch >= 0x0E && ch <= 0x1F) || ch === 0x7F) {
			i++;
			continue;
		}

		out.push(content[i]);
		i++;
	}

	return out.join('');
}

// ─── Borders ──────────────────────────────────────────────────────────────────

/**
 * Strip box-drawing characters and whitespace from both ends of a line.
 */
export function stripBoxDrawing(line: string): string {
	return trimWhere(line, (cp) => isBoxDrawing(cp) || isWhitespace(cp));
}

/**
 * Strip TUI frame characters (│ ┃ ║) and surrounding whitespace from both
 * ends of a line.
 */
export function stripTuiLineBorders(line: string): string {
	return trimWhere(line, (cp) => isTuiBorder(cp) || isWhitespace(cp));
}

/**
 * True when the first non-blank character of a line is a TUI frame character.
 */
export function hasTuiFrame(line: string): boolean {
	let i = 0;
	while (i < line.length && isWhitespace(line.charCodeAt(i))) i++;
	return i < line.length && isTuiBorder(line.charCodeAt(i));
}

/**
 * True for a non-empty line made only of box-drawing characters and whitespace,
 * e.g. the horizontal rules above and below the agent input box.
 */
export function isBorderOnlyLine(line: string): boolean {
	let sawBox = false;
	for (let i = 0; i < line.length; i++) {
		const cp = line.charCodeAt(i);
		if (isBoxDrawing(cp)) {
			sawBox = true;
			continue;
		}
		if (!isWhitespace(cp)) return false;
	}
	return sawBox;
}

// ─── Glyphs ───────────────────────────────────────────────────────────────────

/**
 * Remove one leading decorative glyph (and the single space after it),
 * keeping the indentation in front of it.
 *
 * @param line - A single terminal line
 * @returns The line without its glyph, or the line unchanged
 */
export function stripLeadingGlyph(line: string): string {
	let i = 0;
	while (i < line.length && isWhitespace(line.charCodeAt(i))) i++;
	const cp = line.codePointAt(i);
	if (cp === undefined || !DECORATIVE_GLYPH_CODES.has(cp)) return line;
	let rest = i + codeUnitWidth(cp);
	if (rest < line.length && line.charCodeAt(rest) === 0x20) rest++;
	return line.slice(0, i) + line.slice(rest);
}

/**
 * True when the trimmed line starts with a decorative glyph.
 */
export function startsWithDecorativeGlyph(line: string): boolean {
	const cp = line.trimStart().codePointAt(0);
	return cp !== undefined && DECORATIVE_GLYPH_CODES.has(cp);
}

// ─── Prompt detection ─────────────────────────────────────────────────────────

/**
 * Check if a line is an empty agent input prompt: a prompt character, possibly
 * inside box-drawing borders, followed by at most the cursor cell.
 *
 * @param line - A single terminal line (already stripped of ANSI)
 */
export function isPromptLine(line: string): boolean {
	const stripped = stripBoxDrawing(line);
	if (stripped.length === 0 || stripped.length > PROMPT_DETECTION_CONSTANTS.MAX_PROMPT_LINE_LENGTH) {
		return false;
	}
	return PROMPT_CHARS.has(stripped.charCodeAt(0));
}

/**
 * Check if the agent appears to be waiting at its input prompt by scanning the
 * last lines of the pane. Trailing blank rows are ignored.
 *
 * @param output - Pane text (already stripped of ANSI codes)
 * @returns true if an empty input prompt is visible
 */
export function isAgentAtPrompt(output: string): boolean {
	if (!output) return false;
	const lines = output.split('\n');
	let end = lines.length;
	while (end > 0 && lines[end - 1].trim() === '') end--;
	const start = Math.max(0, end - PROMPT_DETECTION_CONSTANTS.VISIBLE_LINES);
	for (let i = start; i < end; i++) {
		if (isPromptLine(lines[i])) return true;
	}
	return false;
}

// ─── Processing indicator detection ───────────────────────────────────────────

/**
 * Check if text contains the "esc to interrupt" busy status bar.
 * Matches "esc", whitespace, "to", whitespace, "interrupt" case-insensitively.
 *
 * @param text - Text to check
 */
export function containsBusyStatusBar(text: string): boolean {
	const lower = text.toLowerCase();
	let idx = 0;

	while (true) {
		idx = lower.indexOf('esc', idx);
		if (idx === -1) return false;

		let pos = skipWhitespace(lower, idx + 3);
		if (pos === idx + 3 || !lower.startsWith('to', pos)) {
			idx++;
			continue;
		}
		const afterTo = pos + 2;
		pos = skipWhitespace(lower, afterTo);
		if (pos !== afterTo && lower.startsWith('interrupt', pos)) return true;

		idx++;
	}
}

/**
 * Check whether the busy status bar is shown on the last lines of the pane.
 * Older status lines further up in the scrollback are ignored.
 *
 * @param output - Pane text (already stripped of ANSI codes)
 */
export function isAgentBusy(output: string): boolean {
	if (!output) return false;
	const lines = output.split('\n');
	let end = lines.length;
	while (end > 0 && lines[end - 1].trim() === '') end--;
	const start = Math.max(0, end - PROMPT_DETECTION_CONSTANTS.VISIBLE_LINES);
	return containsBusyStatusBar(lines.slice(start, end).join('\n'));
}

function skipWhitespace(text: string, pos: number): number {
	while (pos < text.length && (isWhitespace(text.charCodeAt(pos)) || text.charCodeAt(pos) === 0x0A)) pos++;
	return pos;
}

/**
 * True for a spinner or activity glyph (braille spinner, ✻ ✶ ✳ ✢ ✽ · *).
 */
export function isSpinnerGlyph(cp: number): boolean {
	return SPINNER_CHARS.has(cp) || ACTIVITY_GLYPHS.has(cp);
}

/**
 * Check if a line is a transient status line rather than answer text.
 *
 * A status line is either any line showing the busy status bar, or a line
 * made of a leading spinner/activity/decorative glyph, a single word, an
 * ellipsis (`…` or `...`), and optionally a parenthesised status such as
 * `(12s · ↑ 1.2k tokens)`. Examples: `✻ Thinking…`, `• Thinking...`,
 * `⠋ Processing… (3s)`.
 *
 * @param line - A single terminal line (already stripped of ANSI)
 */
export function isStatusLine(line: string): boolean {
	if (containsBusyStatusBar(line)) return true;

	const trimmed = line.trim();
	const glyph = trimmed.codePointAt(0);
	if (glyph === undefined || !(isSpinnerGlyph(glyph) || DECORATIVE_GLYPH_CODES.has(glyph))) {
		return false;
	}

	let i = codeUnitWidth(glyph);
	const afterGlyph = i;
	while (i < trimmed.length && isWhitespace(trimmed.charCodeAt(i))) i++;
	if (i === afterGlyph) return false;

	const wordStart = i;
	while (i < trimmed.length && isAsciiLetter(trimmed.charCodeAt(i))) i++;
	if (i === wordStart) return false;

	if (trimmed.startsWith('…', i)) {
		i += 1;
	} else if (trimmed.startsWith('...', i)) {
		i += 3;
	} else {
		return false;
	}

	const rest = trimmed.slice(i).trim();
	return rest.length === 0 || (rest.startsWith('(') && rest.endsWith(')'));
}
