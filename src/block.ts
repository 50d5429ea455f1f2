import { ChainConfigError, MiningExhaustedError } from './errors';
import { calculateHash } from './hash';

interface BlockData {
	index: number;
	timestamp: number;
	payload: string;
	previousHash: string;
	nonce: number;
	hash: string;
}

class Block {
	public readonly index: number; // Position in the chain, 0 for genesis
	public readonly timestamp: number; // Time of block creation (ms since epoch)
	public readonly payload: string; // Opaque data carried by the block
	public readonly previousHash: string; // Hash of the previous block
	public readonly nonce: number; // Proof found by the miner
	public readonly hash: string; // Hash of the block

	/**
	 * Restore a sealed block from its stored fields.
	 *
	 * The hash is taken as given, not recomputed. Use `computeHash()` or
	 * chain validation to check that it still matches the other fields.
	 *
	 * @param index Position of the block in the chain
	 * @param timestamp Time of block creation
	 * @param payload Data carried by the block
	 * @param previousHash Hash of the previous block
	 * @param nonce Proof found by the miner
	 * @param hash Hash of the block
	 */
	constructor({ index, timestamp, payload, previousHash, nonce, hash }: BlockData) {
		this.index = index;
		this.timestamp = timestamp;
		this.payload = payload;
		this.previousHash = previousHash;
		this.nonce = nonce;
		this.hash = hash;
	}

	computeHash(): string {
		return calculateHash(this);
	}

	toJSON(): BlockData {
		return {
			index: this.index,
			timestamp: this.timestamp,
			payload: this.payload,
			previousHash: this.previousHash,
			nonce: this.nonce,
			hash: this.hash,
		};
	}
}

/**
 * A block that is still being mined.
 *
 * The nonce is the only mutable field. Every change recomputes the hash,
 * so a candidate never carries a stale one. The search starts at `nonce`
 * (0 by default); a retry may start elsewhere in the range.
 */
class BlockCandidate {
	public readonly index: number;
	public readonly timestamp: number;
	public readonly payload: string;
	public readonly previousHash: string;
	private readonly startNonce: number;
	private currentNonce: number;
	private currentHash: string;

	constructor({
		index,
		timestamp,
		payload,
		previousHash,
		nonce = 0,
	}: Omit<BlockData, 'nonce' | 'hash'> & { nonce?: number }) {
		if (!Number.isSafeInteger(nonce) || nonce < 0) {
			throw new ChainConfigError(
				`Starting nonce must be an integer between 0 and ${Number.MAX_SAFE_INTEGER}. Found: ${nonce}`
			);
		}

		this.index = index;
		this.timestamp = timestamp;
		this.payload = payload;
		this.previousHash = previousHash;
		this.startNonce = nonce;
		this.currentNonce = nonce;
		this.currentHash = calculateHash(this);
	}

	get nonce(): number {
		return this.currentNonce;
	}

	get hash(): string {
		return this.currentHash;
	}

	incrementNonce(): void {
		if (this.currentNonce >= Number.MAX_SAFE_INTEGER) {
			throw new MiningExhaustedError(
				`Nonce range exhausted for block #${this.index}`,
				this.currentNonce - this.startNonce + 1
			);
		}

		this.currentNonce++;
		this.currentHash = calculateHash(this);
	}

	seal(): Block {
		return new Block({
			index: this.index,
			timestamp: this.timestamp,
			payload: this.payload,
			previousHash: this.previousHash,
			nonce: this.currentNonce,
			hash: this.currentHash,
		});
	}
}

export type { BlockData };
export { Block, BlockCandidate };
