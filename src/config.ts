import { ChainConfigError } from './errors';
import { assertDifficulty } from './hash';

interface Config {
	httpPort: number;
	difficulty: number;
	demoNodes: number;
}

const parseInteger = (name: string, value: string): number => {
	if (!/^\s*-?\d+\s*$/.test(value)) {
		throw new ChainConfigError(`${name} must be an integer. Found: ${value}`);
	}

	return parseInt(value, 10);
};

/**
 * Reads settings from the environment, falling back to defaults.
 *
 * - HTTP_PORT: port of the HTTP API (3000)
 * - DIFFICULTY: leading zero hex characters required of mined blocks (3)
 * - DEMO_NODES: number of verifiers in the demo (3)
 *
 * @throws {ChainConfigError} If a value is not a valid integer or out of range
 */
const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
	const httpPort = parseInteger('HTTP_PORT', env.HTTP_PORT || '3000');
	const difficulty = parseInteger('DIFFICULTY', env.DIFFICULTY || '3');
	const demoNodes = parseInteger('DEMO_NODES', env.DEMO_NODES || '3');

	if (httpPort < 0 || httpPort > 65535) {
		throw new ChainConfigError(`HTTP_PORT must be between 0 and 65535. Found: ${httpPort}`);
	}

	assertDifficulty(difficulty);

	if (demoNodes < 1) throw new ChainConfigError(`DEMO_NODES must be at least 1. Found: ${demoNodes}`);

	return { httpPort, difficulty, demoNodes };
};

export type { Config };
export { loadConfig };
