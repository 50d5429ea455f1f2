import { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../app';
import { Blockchain } from '../blockchain';

const servers: Server[] = [];

// Serves the app on an ephemeral local port and returns its base URL
const serve = async (blockchain: Blockchain): Promise<string> => {
	const app = createApp({ blockchain });

	const server = await new Promise<Server>((resolve) => {
		const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
	});
	servers.push(server);

	const address = server.address();
	if (address === null || typeof address === 'string') throw new Error('Server is not listening on a TCP port');

	return `http://127.0.0.1:${address.port}/blockchain`;
};

const postJson = (url: string, body: string) =>
	fetch(url, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body });

describe('blockchain API', () => {
	let blockchain: Blockchain;
	let baseUrl: string;

	beforeEach(async () => {
		vi.spyOn(console, 'log').mockImplementation(() => undefined);
		vi.spyOn(console, 'error').mockImplementation(() => undefined);

		blockchain = new Blockchain({ difficulty: 1 });
		baseUrl = await serve(blockchain);
	});

	afterEach(async () => {
		vi.restoreAllMocks();

		await Promise.all(
			servers.splice(0).map(
				(server) =>
					new Promise<void>((resolve, reject) => {
						server.closeAllConnections();
						server.close((error) => (error ? reject(error) : resolve()));
					})
			)
		);
	});

	it('lists the blocks', async () => {
		const res = await fetch(`${baseUrl}/blocks`);
		const body = await res.json();

		expect(res.status).toBe(200);
		expect(body).toEqual([blockchain.getLastBlock().toJSON()]);
	});

	it('mines a block from the request payload', async () => {
		const res = await postJson(`${baseUrl}/mine`, JSON.stringify({ payload: 'hello' }));
		const body = await res.json();

		expect(res.status).toBe(201);
		expect(body).toEqual(blockchain.getLastBlock().toJSON());
		expect(body).toMatchObject({ index: 1, payload: 'hello', hash: expect.stringMatching(/^0/) });
		expect(blockchain.length).toBe(2);
	});

	it('rejects a mine request without a payload', async () => {
		const res = await postJson(`${baseUrl}/mine`, JSON.stringify({}));

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: 'Payload is required to mine a block' });
		expect(blockchain.length).toBe(1);
	});

	it('rejects a malformed body', async () => {
		const res = await postJson(`${baseUrl}/mine`, '{"payload":');

		expect(res.status).toBe(400);
	});

	it('rejects a body over the size limit with 413', async () => {
		const res = await postJson(`${baseUrl}/mine`, JSON.stringify({ payload: 'x'.repeat(200_000) }));

		expect(res.status).toBe(413);
		expect(await res.json()).toEqual({ error: 'request entity too large' });
		expect(blockchain.length).toBe(1);
	});

	it('rejects a non-positive maxAttempts', async () => {
		const res = await postJson(`${baseUrl}/mine`, JSON.stringify({ payload: 'a', maxAttempts: 0 }));

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: 'maxAttempts must be a positive integer. Found: 0' });
	});

	it('answers 503 when mining runs out of attempts', async () => {
		const hardChain = new Blockchain({ difficulty: 64 });
		const hardUrl = await serve(hardChain);

		const res = await postJson(`${hardUrl}/mine`, JSON.stringify({ payload: 'a', maxAttempts: 2 }));
		const body = await res.json();

		expect(res.status).toBe(503);
		expect(body).toMatchObject({ attempts: 2 });
		expect(hardChain.length).toBe(1);
	});

	it('returns the latest block and looks blocks up by hash', async () => {
		const mined = blockchain.mineBlock({ payload: 'a' });

		const latest = await fetch(`${baseUrl}/blocks/latest`);
		expect(await latest.json()).toEqual(mined.toJSON());

		const byHash = await fetch(`${baseUrl}/blocks/${mined.hash}`);
		expect(byHash.status).toBe(200);
		expect(await byHash.json()).toEqual(mined.toJSON());
	});

	it('answers 404 for an unknown hash', async () => {
		const res = await fetch(`${baseUrl}/blocks/${'a'.repeat(64)}`);

		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({ error: `Block ${'a'.repeat(64)} not found` });
	});

	it('validates the chain', async () => {
		blockchain.mineBlock({ payload: 'a' });

		const res = await fetch(`${baseUrl}/validate`);

		expect(await res.json()).toEqual({ valid: true });
	});

	it('reports the difficulty', async () => {
		const res = await fetch(`${baseUrl}/difficulty`);

		expect(await res.json()).toEqual({ difficulty: 1 });
	});
});
