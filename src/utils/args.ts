/**
 * Parse a numeric command line flag. gunshi hands every value over as a string.
 */
export function parsePositiveInteger(flag: string, raw: string | undefined): number | undefined {
	if (raw == null) {
		return undefined;
	}

	const value = Number(raw.trim());
	if (!Number.isInteger(value) || value <= 0) {
		throw new Error(`--${flag} must be a positive integer (got "${raw}")`);
	}
	return value;
}

if (import.meta.vitest) {
	const vitest = await import('vitest');
	const { describe, it, expect } = vitest;

	describe('parsePositiveInteger', () => {
		it('should leave an absent flag undefined', () => {
			expect(parsePositiveInteger('timeout', undefined)).toBeUndefined();
		});

		it('should parse a positive integer', () => {
			expect(parsePositiveInteger('timeout', ' 90 ')).toBe(90);
		});

		it('should reject zero', () => {
			expect(() => parsePositiveInteger('stability', '0')).toThrow('--stability must be a positive integer (got "0")');
		});

		it('should reject fractions and words', () => {
			expect(() => parsePositiveInteger('interval', '1.5')).toThrow('--interval must be a positive integer (got "1.5")');
			expect(() => parsePositiveInteger('interval', 'fast')).toThrow('--interval must be a positive integer (got "fast")');
		});
	});
}
