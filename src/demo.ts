import { Block } from './block';
import type { BlockData } from './block';
import { Blockchain } from './blockchain';
import type { ChainValidation } from './blockchain';

type Log = (message: string) => void;

interface NodeVerdict {
	node: number;
	result: ChainValidation;
}

const DEFAULT_PAYLOADS = ['Transaction Data #1', 'Transaction Data #2', 'Transaction Data #3'];

/**
 * Deep copies blocks through their JSON form, the way they would travel to another node.
 */
const copyBlocks = (blocks: readonly Block[]): Block[] => {
	return JSON.parse(JSON.stringify(blocks)).map((data: BlockData) => new Block(data));
};

/**
 * Mines a few blocks, then has several independent verifiers check the chain.
 *
 * Each verifier receives its own copy of the blocks and recomputes every
 * hash and link, the way other nodes would check a chain they were sent.
 *
 * @returns The mined chain and the verdict of every verifier.
 */
const runDemo = ({
	difficulty,
	payloads = DEFAULT_PAYLOADS,
	nodes = 3,
	log = console.log,
}: {
	difficulty: number;
	payloads?: string[];
	nodes?: number;
	log?: Log;
}): { blockchain: Blockchain; verdicts: NodeVerdict[] } => {
	const blockchain = new Blockchain({ difficulty });

	payloads.forEach((payload, i) => {
		log(`\nAdding Block #${i + 1} with data: '${payload}'`);
		log(`Mining block #${i + 1} ...`);

		const { block, attempts } = blockchain.mineBlockWithStats({ payload });

		log(`Block #${block.index} mined! Nonce: ${block.nonce} | Attempts: ${attempts} | Hash: ${block.hash}`);
	});

	log('\n=== Simulating distributed verification ===');

	const verdicts: NodeVerdict[] = [];

	for (let node = 1; node <= nodes; node++) {
		const copy = Blockchain.fromBlocks({ blocks: copyBlocks(blockchain.getBlocks()), difficulty });
		const result = copy.validate();

		if (result.valid) log(`Node ${node}: chain is valid`);
		else log(`Node ${node}: block #${result.index} failed (${result.reason}) ${result.message}`);

		verdicts.push({ node, result });
	}

	if (verdicts.every(({ result }) => result.valid)) log('All nodes confirm: The chain is valid!');
	else log('Some node found an inconsistency: The chain is invalid!');

	return { blockchain, verdicts };
};

export type { NodeVerdict };
export { runDemo, copyBlocks, DEFAULT_PAYLOADS };
