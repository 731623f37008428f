/**
 * Tests for terminal-string-ops, the regex-free pane text helpers.
 *
 * @module terminal-string-ops.test
 */

import {
	stripAnsiCodes,
	stripBoxDrawing,
	stripTuiLineBorders,
	hasTuiFrame,
	isBorderOnlyLine,
	stripLeadingGlyph,
	startsWithDecorativeGlyph,
	isPromptLine,
	isAgentAtPrompt,
	containsBusyStatusBar,
	isAgentBusy,
	isSpinnerGlyph,
	isStatusLine,
} from './terminal-string-ops.js';

// ─── stripAnsiCodes ───────────────────────────────────────────────────────────

describe('stripAnsiCodes (state machine)', () => {
	describe('color codes', () => {
		it('should remove basic color codes', () => {
			expect(stripAnsiCodes('\x1b[31mred text\x1b[0m')).toBe('red text');
		});

		it('should remove multi-parameter color codes', () => {
			expect(stripAnsiCodes('\x1b[1;33mBold Yellow\x1b[0m')).toBe('Bold Yellow');
		});

		it('should remove 256-color codes', () => {
			expect(stripAnsiCodes('\x1b[38;5;202morange\x1b[0m')).toBe('orange');
		});
	});

	describe('cursor movement', () => {
		it('should replace cursor forward with space', () => {
			expect(stripAnsiCodes('hello\x1b[5Cworld')).toBe('hello world');
		});

		it('should replace cursor forward (zero digits) with space', () => {
			expect(stripAnsiCodes('hello\x1b[Cworld')).toBe('hello world');
		});

		it('should remove cursor up sequences', () => {
			expect(stripAnsiCodes('line1\x1b[1Aup')).toBe('line1up');
		});

		it('should remove private-mode sequences', () => {
			expect(stripAnsiCodes('A\x1b[?25hB\x1b[?2026lC')).toBe('ABC');
		});
	});

	describe('OSC sequences', () => {
		it('should remove title change sequences', () => {
			expect(stripAnsiCodes('\x1b]0;My Terminal\x07text')).toBe('text');
		});

		it('should remove hyperlink sequences terminated by ST', () => {
			expect(stripAnsiCodes('\x1b]8;;https://example.com\x1b\\link\x1b]8;;\x1b\\')).toBe('link');
		});
	});

	it('should remove charset designations', () => {
		expect(stripAnsiCodes('\x1b(Bplain')).toBe('plain');
	});

	describe('line ending normalization', () => {
		it('should normalize CR+LF to LF', () => {
			expect(stripAnsiCodes('line1\r\nline2')).toBe('line1\nline2');
		});

		it('should normalize bare CR to LF', () => {
			expect(stripAnsiCodes('line1\rline2')).toBe('line1\nline2');
		});
	});

	describe('control characters', () => {
		it('should remove null bytes and bell', () => {
			expect(stripAnsiCodes('hel\x00lo\x07')).toBe('hello');
		});

		it('should keep tabs', () => {
			expect(stripAnsiCodes('a\tb')).toBe('a\tb');
		});
	});

	it('should leave marker-like text untouched', () => {
		expect(stripAnsiCodes('===PIPE_END_0a1b2c3d===')).toBe('===PIPE_END_0a1b2c3d===');
	});
});

// ─── Borders ──────────────────────────────────────────────────────────────────

describe('stripBoxDrawing', () => {
	it('should strip box-drawing characters and spaces from both ends', () => {
		expect(stripBoxDrawing('│ > │')).toBe('>');
	});

	it('should keep inner box-drawing characters', () => {
		expect(stripBoxDrawing('─ a ─ b ─')).toBe('a ─ b');
	});
});

describe('stripTuiLineBorders', () => {
	it('should strip vertical frames from both ends', () => {
		expect(stripTuiLineBorders('│ some text │')).toBe('some text');
	});

	it('should not touch horizontal rules', () => {
		expect(stripTuiLineBorders('──')).toBe('──');
	});
});

describe('hasTuiFrame', () => {
	it('should detect a leading frame after indentation', () => {
		expect(hasTuiFrame('  ┃ text')).toBe(true);
	});

	it('should ignore markdown table pipes', () => {
		expect(hasTuiFrame('| a | b |')).toBe(false);
	});
});

describe('isBorderOnlyLine', () => {
	it('should accept a horizontal rule', () => {
		expect(isBorderOnlyLine('  ╭──────╮ ')).toBe(true);
	});

	it('should reject blank lines', () => {
		expect(isBorderOnlyLine('   ')).toBe(false);
	});

	it('should reject ASCII rules so markdown survives', () => {
		expect(isBorderOnlyLine('---')).toBe(false);
	});

	it('should reject lines with text', () => {
		expect(isBorderOnlyLine('── title ──')).toBe(false);
	});
});

// ─── Glyphs ───────────────────────────────────────────────────────────────────

describe('stripLeadingGlyph', () => {
	it('should remove the response bullet and one space', () => {
		expect(stripLeadingGlyph('⏺ Hello')).toBe('Hello');
	});

	it('should keep indentation before the glyph', () => {
		expect(stripLeadingGlyph('  ⎿  result')).toBe('   result');
	});

	it('should leave lines without a glyph unchanged', () => {
		expect(stripLeadingGlyph('- list item')).toBe('- list item');
	});
});

describe('startsWithDecorativeGlyph', () => {
	it.each(['● a', '⏺ a', '  ⎿ a', '• a'])('should accept %p', (line) => {
		expect(startsWithDecorativeGlyph(line)).toBe(true);
	});

	it('should reject spinner glyphs', () => {
		expect(startsWithDecorativeGlyph('✻ Thinking…')).toBe(false);
	});
});

// ─── Prompt detection ─────────────────────────────────────────────────────────

describe('isPromptLine', () => {
	it.each(['❯', '> ', '›', '│ > │', '❯ '])('should accept bare prompt %p', (line) => {
		expect(isPromptLine(line)).toBe(true);
	});

	it('should reject a prompt with typed text', () => {
		expect(isPromptLine('> hello')).toBe(false);
	});

	it('should reject blank lines', () => {
		expect(isPromptLine('')).toBe(false);
	});
});

describe('isAgentAtPrompt', () => {
	it('should find the prompt inside the input box', () => {
		const pane = ['Answer text', '', '╭────────╮', '│ >      │', '╰────────╯', '  ? for shortcuts', '', ''].join('\n');
		expect(isAgentAtPrompt(pane)).toBe(true);
	});

	it('should ignore prompts scrolled above the last lines', () => {
		const lines = ['❯', ...Array.from({ length: 8 }, (_, i) => `output ${i}`)];
		expect(isAgentAtPrompt(lines.join('\n'))).toBe(false);
	});

	it('should return false for empty output', () => {
		expect(isAgentAtPrompt('')).toBe(false);
	});
});

// ─── Status lines ─────────────────────────────────────────────────────────────

describe('containsBusyStatusBar', () => {
	it('should match case-insensitively with any spacing', () => {
		expect(containsBusyStatusBar('(12s · Esc  to interrupt)')).toBe(true);
	});

	it('should require whitespace between words', () => {
		expect(containsBusyStatusBar('escto interrupt')).toBe(false);
	});
});

describe('isAgentBusy', () => {
	it('should detect the interrupt hint above the input box', () => {
		const pane = ['> hi', '✻ Thinking… (4s · esc to interrupt)', '╭──╮', '│ > │', '╰──╯', ''].join('\n');
		expect(isAgentBusy(pane)).toBe(true);
	});

	it('should ignore an interrupt hint left higher up in the scrollback', () => {
		const lines = ['(2s · esc to interrupt)', ...Array.from({ length: 8 }, (_, i) => `output ${i}`)];
		expect(isAgentBusy(lines.join('\n'))).toBe(false);
	});

	it('should return false for empty output', () => {
		expect(isAgentBusy('')).toBe(false);
	});
});

describe('isSpinnerGlyph', () => {
	it('should accept braille and star glyphs', () => {
		expect(isSpinnerGlyph(0x280b)).toBe(true);
		expect(isSpinnerGlyph(0x273b)).toBe(true);
	});

	it('should reject letters', () => {
		expect(isSpinnerGlyph(0x41)).toBe(false);
	});
});

describe('isStatusLine', () => {
	it.each([
		'✻ Thinking…',
		'• Thinking...',
		'⠋ Processing… (3s)',
		'✶ Pondering… (12s · ↑ 1.2k tokens)',
		'  · Working…',
		'anything with esc to interrupt',
	])('should classify %p as status', (line) => {
		expect(isStatusLine(line)).toBe(true);
	});

	it.each([
		'Result: 42',
		'• First item',
		'⏺ Done. Here is the summary…',
		'✻ Thinking… about it',
		'*emphasis*',
	])('should keep %p', (line) => {
		expect(isStatusLine(line)).toBe(false);
	});
});
