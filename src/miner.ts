import type { Block, BlockCandidate } from './block';
import { ChainConfigError, MiningAbortedError, MiningExhaustedError } from './errors';
import { assertDifficulty, checkHashDifficulty } from './hash';

interface MiningOptions {
	maxAttempts?: number; // Give up after this many hash computations
	signal?: AbortSignal; // Checked once per attempt
}

interface MiningResult {
	block: Block;
	attempts: number; // Hash computations performed, including the winning one
}

/**
 * Finds a valid block by trying successive nonces until the hash meets the difficulty.
 *
 * The candidate's hash is checked first; if it does not start with the required
 * number of zeros the nonce is incremented and the hash recomputed. The search
 * is unbounded unless `maxAttempts` is given.
 *
 * @param candidate The block being mined. Its nonce is advanced in place.
 * @param difficulty Number of leading zero hex characters required.
 *
 * @returns The sealed block and the number of hashes computed.
 *
 * @throws {MiningExhaustedError} If `maxAttempts` is reached or the nonce range runs out
 * @throws {MiningAbortedError} If `signal` is aborted
 * @throws {ChainConfigError} If the difficulty or `maxAttempts` is out of range
 */
const findBlock = (
	candidate: BlockCandidate,
	difficulty: number,
	{ maxAttempts, signal }: MiningOptions = {}
): MiningResult => {
	assertDifficulty(difficulty);

	if (maxAttempts !== undefined && (!Number.isInteger(maxAttempts) || maxAttempts < 1)) {
		throw new ChainConfigError(`maxAttempts must be a positive integer. Found: ${maxAttempts}`);
	}

	let attempts = 0;

	while (true) {
		if (signal?.aborted) throw new MiningAbortedError(attempts);

		attempts++;

		// Check if the hash starts with the required number of zeros
		if (checkHashDifficulty(candidate.hash, difficulty)) {
			return { block: candidate.seal(), attempts };
		}

		if (maxAttempts !== undefined && attempts >= maxAttempts) {
			throw new MiningExhaustedError(
				`No hash with ${difficulty} leading zeros found for block #${candidate.index} in ${attempts} attempts`,
				attempts
			);
		}

		candidate.incrementNonce();
	}
};

export type { MiningOptions, MiningResult };
export { findBlock };
