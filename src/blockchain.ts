import { Block, BlockCandidate } from './block';
import { ChainConfigError } from './errors';
import { assertDifficulty, checkHashDifficulty } from './hash';
import { findBlock } from './miner';
import type { MiningOptions, MiningResult } from './miner';

const GENESIS_PAYLOAD = 'Genesis Block';

const GENESIS_PREVIOUS_HASH = '0'.repeat(64);

const ValidationFailure = {
	HashMismatch: 'HashMismatch', // Stored hash differs from the recomputed one
	LinkBroken: 'LinkBroken', // previousHash does not point at the block before
	ProofOfWorkNotMet: 'ProofOfWorkNotMet', // Hash lacks the required leading zeros
	IndexMismatch: 'IndexMismatch', // Index is not one greater than the block before
	InvalidGenesis: 'InvalidGenesis', // First block does not match the genesis template
} as const;

type ValidationFailureReason = (typeof ValidationFailure)[keyof typeof ValidationFailure];

type ChainValidation =
	| { valid: true }
	| { valid: false; index: number; reason: ValidationFailureReason; message: string };

type Clock = () => number;

/**
 * Creates the genesis block of the blockchain.
 *
 * Genesis is not mined: it carries nonce 0 and is exempt from the
 * difficulty check during validation.
 *
 * @param timestamp Time of block creation.
 *
 * @returns The genesis block.
 */
const createGenesisBlock = (timestamp: number): Block => {
	return new BlockCandidate({
		index: 0,
		timestamp,
		payload: GENESIS_PAYLOAD,
		previousHash: GENESIS_PREVIOUS_HASH,
	}).seal();
};

const invalid = (
	index: number,
	reason: ValidationFailureReason,
	message: string
): ChainValidation => ({ valid: false, index, reason, message });

/**
 * Validates a new block against the block before it.
 *
 * Checks run in a fixed order and the first failure is reported:
 * hash, link, proof of work, then index.
 *
 * @returns The failure found, or `null` if the block is valid.
 */
const validateNewBlock = ({
	newBlock,
	previousBlock,
	position,
	difficulty,
}: {
	newBlock: Block;
	previousBlock: Block;
	position: number;
	difficulty: number;
}): ChainValidation | null => {
	if (newBlock.computeHash() !== newBlock.hash) {
		return invalid(position, ValidationFailure.HashMismatch, `Invalid block hash: ${newBlock.hash}`);
	}

	if (newBlock.previousHash !== previousBlock.hash) {
		return invalid(
			position,
			ValidationFailure.LinkBroken,
			`Invalid previous hash. Expected: ${previousBlock.hash}, Found: ${newBlock.previousHash}`
		);
	}

	if (!checkHashDifficulty(newBlock.hash, difficulty)) {
		return invalid(
			position,
			ValidationFailure.ProofOfWorkNotMet,
			`Block hash ${newBlock.hash} does not have ${difficulty} leading zeros`
		);
	}

	if (newBlock.index !== previousBlock.index + 1) {
		return invalid(
			position,
			ValidationFailure.IndexMismatch,
			`Invalid block index. Expected: ${previousBlock.index + 1}, Found: ${newBlock.index}`
		);
	}

	return null;
};

/**
 * Validates an entire list of blocks to ensure its integrity and consistency.
 *
 * The first block must match the genesis template and carry its own hash.
 * A genesis block with a changed index, payload or previousHash reports
 * `InvalidGenesis`; one with a changed timestamp, nonce or hash reports `HashMismatch`.
 * Every later block is checked against the one before it. Nothing is cached:
 * each hash is recomputed from the stored fields.
 *
 * @param blocks The blocks to validate, genesis first.
 * @param difficulty Leading zeros required of every non-genesis hash.
 *
 * @returns `{ valid: true }`, or the position and reason of the first failing block.
 */
const validateBlocks = ({
	blocks,
	difficulty,
}: {
	blocks: readonly Block[];
	difficulty: number;
}): ChainValidation => {
	assertDifficulty(difficulty);

	const genesis = blocks[0];

	if (!genesis) return invalid(0, ValidationFailure.InvalidGenesis, 'Chain has no genesis block');

	if (
		genesis.index !== 0 ||
		genesis.payload !== GENESIS_PAYLOAD ||
		genesis.previousHash !== GENESIS_PREVIOUS_HASH
	) {
		return invalid(0, ValidationFailure.InvalidGenesis, 'Invalid genesis block');
	}

	if (genesis.computeHash() !== genesis.hash) {
		return invalid(0, ValidationFailure.HashMismatch, `Invalid genesis hash: ${genesis.hash}`);
	}

	for (let i = 1; i < blocks.length; i++) {
		const failure = validateNewBlock({
			newBlock: blocks[i],
			previousBlock: blocks[i - 1],
			position: i,
			difficulty,
		});

		if (failure) return failure;
	}

	return { valid: true };
};

class Blockchain {
	public readonly difficulty: number;
	private readonly blocks: Block[];
	private readonly clock: Clock;

	/**
	 * Create a new blockchain holding only its genesis block.
	 *
	 * @param difficulty Number of leading zero hex characters required of mined blocks
	 * @param clock Source of block timestamps, `Date.now` by default
	 *
	 * @throws {ChainConfigError} If the difficulty is not an integer between 0 and 64
	 */
	constructor({ difficulty, clock = Date.now }: { difficulty: number; clock?: Clock }) {
		assertDifficulty(difficulty);

		this.difficulty = difficulty;
		this.clock = clock;
		this.blocks = [createGenesisBlock(clock())];
	}

	/**
	 * Wraps an existing list of blocks, e.g. a copy received from elsewhere, so it can be validated.
	 * The blocks are not checked here; call `validate()`.
	 */
	static fromBlocks({
		blocks,
		difficulty,
		clock,
	}: {
		blocks: readonly Block[];
		difficulty: number;
		clock?: Clock;
	}): Blockchain {
		if (blocks.length === 0) throw new ChainConfigError('A chain needs at least a genesis block');

		const chain = new Blockchain({ difficulty, clock });
		chain.blocks.length = 0;
		for (const block of blocks) chain.blocks.push(block);

		return chain;
	}

	get length(): number {
		return this.blocks.length;
	}

	getBlocks(): Block[] {
		return [...this.blocks];
	}

	getLastBlock(): Block {
		return this.blocks[this.blocks.length - 1];
	}

	getBlock(index: number): Block | undefined {
		return this.blocks[index];
	}

	findBlockByHash(hash: string): Block | undefined {
		return this.blocks.find((block) => block.hash === hash);
	}

	/**
	 * Mines a new block carrying the payload and appends it to the chain.
	 *
	 * @returns The sealed block.
	 */
	mineBlock(options: { payload: string; startNonce?: number } & MiningOptions): Block {
		return this.mineBlockWithStats(options).block;
	}

	/**
	 * Mines a new block and reports how many hashes the search took.
	 *
	 * The candidate links to the current last block and searches from `startNonce` (0 by default).
	 * If mining fails the chain is left untouched.
	 *
	 * @throws {ChainConfigError} If `startNonce` is not a safe non-negative integer
	 * @throws {MiningExhaustedError} If `maxAttempts` runs out
	 * @throws {MiningAbortedError} If `signal` is aborted
	 */
	mineBlockWithStats({
		payload,
		startNonce,
		...options
	}: { payload: string; startNonce?: number } & MiningOptions): MiningResult {
		const lastBlock = this.getLastBlock();

		const candidate = new BlockCandidate({
			index: lastBlock.index + 1,
			timestamp: this.clock(),
			payload,
			previousHash: lastBlock.hash,
			nonce: startNonce,
		});

		const result = findBlock(candidate, this.difficulty, options);

		this.blocks.push(result.block);

		return result;
	}

	validate(): ChainValidation {
		return validateBlocks({ blocks: this.blocks, difficulty: this.difficulty });
	}

	isValid(): boolean {
		return this.validate().valid;
	}
}

export type { ChainValidation, ValidationFailureReason, Clock };
export {
	Blockchain,
	ValidationFailure,
	GENESIS_PAYLOAD,
	GENESIS_PREVIOUS_HASH,
	createGenesisBlock,
	validateBlocks,
};
