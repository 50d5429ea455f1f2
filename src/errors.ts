class ChainError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Raised when a chain is built with settings it cannot work with,
 * e.g. a negative difficulty or an empty list of blocks.
 */
class ChainConfigError extends ChainError {}

/**
 * Raised when the nonce search runs out of attempts before a qualifying hash is found.
 * Nothing is appended to the chain; the caller may retry or lower the difficulty.
 */
class MiningExhaustedError extends ChainError {
	public readonly attempts: number;

	constructor(message: string, attempts: number) {
		super(message);
		this.attempts = attempts;
	}
}

class MiningAbortedError extends ChainError {
	public readonly attempts: number;

	constructor(attempts: number) {
		super(`Mining aborted after ${attempts} attempts`);
		this.attempts = attempts;
	}
}

export { ChainError, ChainConfigError, MiningExhaustedError, MiningAbortedError };
