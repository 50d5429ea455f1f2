import { createHash } from 'crypto';
import { describe, expect, it } from 'vitest';
import { ChainConfigError } from '../errors';
import { assertDifficulty, calculateHash, checkHashDifficulty, serializeBlockFields } from '../hash';

const fields = {
	index: 1,
	timestamp: 1700000000000,
	payload: 'a',
	previousHash: 'ab',
	nonce: 7,
};

describe('serializeBlockFields', () => {
	it('writes the fields as a JSON array in a fixed order', () => {
		expect(serializeBlockFields(fields)).toBe('[1,1700000000000,"a","ab",7]');
	});

	it('escapes quotes inside the payload', () => {
		expect(serializeBlockFields({ ...fields, payload: 'say "hi"' })).toBe(
			'[1,1700000000000,"say \\"hi\\"","ab",7]'
		);
	});
});

describe('calculateHash', () => {
	it('is the SHA-256 hex digest of the serialized fields', () => {
		const expected = createHash('sha256').update('[1,1700000000000,"a","ab",7]').digest('hex');

		expect(calculateHash(fields)).toBe(expected);
	});

	it('is deterministic', () => {
		expect(calculateHash(fields)).toBe(calculateHash({ ...fields }));
	});

	it('does not collide when text moves between payload and previous hash', () => {
		const left = calculateHash({ ...fields, payload: 'ab', previousHash: 'c' });
		const right = calculateHash({ ...fields, payload: 'a', previousHash: 'bc' });

		expect(left).not.toBe(right);
	});

	it('changes with the nonce', () => {
		expect(calculateHash({ ...fields, nonce: 8 })).not.toBe(calculateHash(fields));
	});
});

describe('checkHashDifficulty', () => {
	it('accepts hashes with enough leading zeros', () => {
		expect(checkHashDifficulty('00ab', 2)).toBe(true);
		expect(checkHashDifficulty('000b', 2)).toBe(true);
	});

	it('rejects hashes with too few leading zeros', () => {
		expect(checkHashDifficulty('0abc', 2)).toBe(false);
		expect(checkHashDifficulty('a000', 1)).toBe(false);
	});

	it('accepts any hash at difficulty 0', () => {
		expect(checkHashDifficulty('ffff', 0)).toBe(true);
	});
});

describe('assertDifficulty', () => {
	it.each([0, 3, 64])('accepts %d', (difficulty) => {
		expect(() => assertDifficulty(difficulty)).not.toThrow();
	});

	it.each([-1, 1.5, 65, Number.NaN])('rejects %d', (difficulty) => {
		expect(() => assertDifficulty(difficulty)).toThrow(ChainConfigError);
	});
});
