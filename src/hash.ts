import sha256 from 'crypto-js/sha256';
import { ChainConfigError } from './errors';

// A SHA-256 hex digest is 64 characters long, so no hash can carry more leading zeros.
const MAX_DIFFICULTY = 64;

interface BlockFields {
	index: number;
	timestamp: number;
	payload: string;
	previousHash: string;
	nonce: number;
}

/**
 * Builds the canonical string a block hash is computed over.
 *
 * Fields are written as a JSON array in a fixed order:
 * `[index, timestamp, payload, previousHash, nonce]`.
 * Strings are quoted and escaped, so two different field sets never
 * serialize to the same text. Changing the order changes every hash.
 *
 * @returns The canonical serialization of the block fields.
 */
const serializeBlockFields = ({
	index,
	timestamp,
	payload,
	previousHash,
	nonce,
}: BlockFields): string => {
	return JSON.stringify([index, timestamp, payload, previousHash, nonce]);
};

/**
 * Generates the SHA-256 hash (lowercase hex) of the given block fields.
 */
const calculateHash = (fields: BlockFields): string => {
	return sha256(serializeBlockFields(fields)).toString();
};

/**
 * Checks if a given hash starts with at least `difficulty` zero hex characters.
 *
 * @param hash The hash to check.
 * @param difficulty Number of leading zero characters required.
 */
const checkHashDifficulty = (hash: string, difficulty: number): boolean => {
	const requiredPrefix: string = '0'.repeat(difficulty);

	return hash.startsWith(requiredPrefix);
};

const assertDifficulty = (difficulty: number): void => {
	if (!Number.isInteger(difficulty) || difficulty < 0 || difficulty > MAX_DIFFICULTY) {
		throw new ChainConfigError(
			`Difficulty must be an integer between 0 and ${MAX_DIFFICULTY}. Found: ${difficulty}`
		);
	}
};

export type { BlockFields };
export {
	MAX_DIFFICULTY,
	serializeBlockFields,
	calculateHash,
	checkHashDifficulty,
	assertDifficulty,
};
