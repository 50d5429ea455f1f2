import { createApp } from './app';
import { Blockchain } from './blockchain';
import { loadConfig } from './config';

const { httpPort, difficulty } = loadConfig();

const blockchain = new Blockchain({ difficulty });

/**
 * Initializes an HTTP server that listens on a given port.
 *
 * @param {number} httpPort The port number to listen on.
 */
const initHttpServer = (httpPort: number) => {
	const app = createApp({ blockchain });

	// Start HTTP server
	app.listen(httpPort, () => {
		console.log(`\nHTTP server running on port ${httpPort} (difficulty ${difficulty})`);
	});
};

initHttpServer(httpPort);
