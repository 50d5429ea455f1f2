import cors from 'cors';
import express, { Express } from 'express';
import { Blockchain } from './blockchain';
import { createBlockchainRouter, handleBlockchainError } from './containers/blockchain.container';
import { specs, swaggerUI } from './swagger/swagger';

/**
 * Builds the HTTP application around a chain.
 *
 * - GET /blockchain/blocks: Returns the entire blockchain as a JSON array.
 * - GET /blockchain/blocks/latest: Returns the last block.
 * - GET /blockchain/blocks/:hash: Returns a single block.
 * - POST /blockchain/mine: Mines a block carrying the 'payload' of the request body.
 * - GET /blockchain/validate: Re-verifies every block of the chain.
 * - GET /api-docs: OpenAPI documentation.
 */
const createApp = ({ blockchain }: { blockchain: Blockchain }): Express => {
	const app = express();

	// Middleware
	app.use(cors());
	app.use(express.json());
	app.use(express.urlencoded({ extended: true }));

	// API Routes
	app.use('/blockchain', createBlockchainRouter({ blockchain }));
	app.use('/api-docs', swaggerUI.serve, swaggerUI.setup(specs));

	app.use(handleBlockchainError);

	return app;
};

export { createApp };
