import express, { ErrorRequestHandler, NextFunction, Request, Response, Router } from 'express';
import { Block } from '../block';
import { Blockchain } from '../blockchain';
import { ChainConfigError, MiningExhaustedError } from '../errors';

/**
 * @swagger
 * tags:
 *   - name: Blockchain
 *     description: API endpoints for the blockchain
 */

/**
 * Builds the router for a given chain. The chain is owned by the caller;
 * every request reads or extends that one instance.
 */
const createBlockchainRouter = ({ blockchain }: { blockchain: Blockchain }): Router => {
	const router = express.Router();

	/**
	 * @swagger
	 * /blockchain/blocks:
	 *   get:
	 *     summary: Get blockchain
	 *     tags: [Blockchain]
	 *     parameters: []
	 *     responses:
	 *       '200':
	 *         description: Success response.
	 */
	router.get('/blocks', (req: Request, res: Response) => {
		res.status(200).json(blockchain.getBlocks());
	});

	/**
	 * @swagger
	 * /blockchain/blocks/latest:
	 *   get:
	 *     summary: Get the last block
	 *     tags: [Blockchain]
	 *     parameters: []
	 *     responses:
	 *       '200':
	 *         description: Success response.
	 */
	router.get('/blocks/latest', (req: Request, res: Response) => {
		res.status(200).json(blockchain.getLastBlock());
	});

	/**
	 * @swagger
	 * /blockchain/blocks/{hash}:
	 *   get:
	 *     summary: Get block by hash
	 *     tags: [Blockchain]
	 *     parameters:
	 *       - name: hash
	 *         in: path
	 *         required: true
	 *         description: Hash of the block
	 *         schema:
	 *           type: string
	 *     responses:
	 *       '200':
	 *         description: Success response.
	 *       '404':
	 *         description: Block not found.
	 */
	router.get('/blocks/:hash', (req: Request, res: Response) => {
		const { hash } = req.params;

		const block = blockchain.findBlockByHash(hash);

		if (!block) {
			res.status(404).json({ error: `Block ${hash} not found` });
			return;
		}

		res.status(200).json(block);
	});

	/**
	 * @swagger
	 * /blockchain/difficulty:
	 *   get:
	 *     summary: Get the difficulty of the chain
	 *     tags: [Blockchain]
	 *     responses:
	 *       '200':
	 *         description: Success response.
	 */
	router.get('/difficulty', (req: Request, res: Response) => {
		res.status(200).json({ difficulty: blockchain.difficulty });
	});

	/**
	 * @swagger
	 * /blockchain/validate:
	 *   get:
	 *     summary: Validate the whole chain
	 *     tags: [Blockchain]
	 *     responses:
	 *       '200':
	 *         description: Validation result, with the first failing block when invalid.
	 */
	router.get('/validate', (req: Request, res: Response) => {
		res.status(200).json(blockchain.validate());
	});

	/**
	 * @swagger
	 * /blockchain/mine:
	 *   post:
	 *     summary: Mine a new block
	 *     tags: [Blockchain]
	 *     requestBody:
	 *       required: true
	 *       content:
	 *         application/json:
	 *           schema:
	 *             type: object
	 *             properties:
	 *               payload:
	 *                 type: string
	 *               maxAttempts:
	 *                 type: integer
	 *             required:
	 *               - payload
	 *     responses:
	 *       '201':
	 *         description: Created.
	 *       '400':
	 *         description: Bad Request.
	 *       '503':
	 *         description: No proof found within maxAttempts.
	 */
	router.post('/mine', (req: Request, res: Response, next: NextFunction) => {
		const { payload, maxAttempts } = req.body ?? {};

		if (typeof payload !== 'string') {
			res.status(400).json({ error: 'Payload is required to mine a block' });
			return;
		}

		if (maxAttempts !== undefined && typeof maxAttempts !== 'number') {
			res.status(400).json({ error: 'maxAttempts must be a number' });
			return;
		}

		try {
			const newBlock: Block = blockchain.mineBlock({ payload, maxAttempts });

			console.log(`\nBlock #${newBlock.index} mined! Nonce: ${newBlock.nonce} | Hash: ${newBlock.hash}`);

			res.status(201).json(newBlock);
		} catch (error) {
			next(error);
		}
	});

	return router;
};

/**
 * Reads the 4xx status that express middleware such as express.json()
 * attaches to its errors (400 malformed body, 413 too large, 415 bad charset).
 */
const clientErrorStatus = (error: unknown): number | undefined => {
	if (typeof error !== 'object' || error === null) return undefined;

	const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;

	return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
};

/**
 * Error handler for the blockchain API, registered with four parameters so
 * express treats it as one. Configuration errors and rejected request bodies
 * are the client's fault; exhausted mining is a temporary condition.
 */
const handleBlockchainError: ErrorRequestHandler = (error, req, res, next) => {
	if (error instanceof ChainConfigError) {
		res.status(400).json({ error: error.message });
		return;
	}

	if (error instanceof MiningExhaustedError) {
		res.status(503).json({ error: error.message, attempts: error.attempts });
		return;
	}

	const status = clientErrorStatus(error);

	if (status !== undefined) {
		res.status(status).json({ error: error instanceof Error ? error.message : 'Bad request' });
		return;
	}

	console.error(`\nUnhandled error: ${error instanceof Error ? error.message : String(error)}`);
	res.status(500).json({ error: 'Internal server error' });
};

export { createBlockchainRouter, handleBlockchainError };
