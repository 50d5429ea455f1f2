import swaggerJsDoc from 'swagger-jsdoc';
import swaggerUI from 'swagger-ui-express';

const options: swaggerJsDoc.Options = {
	definition: {
		openapi: '3.0.0',
		info: {
			title: 'Hashledger APIs',
			version: '1.0.0',
			description: 'APIs for mining and validating a proof-of-work hash chain',
		},
		servers: [
			{
				url: 'http://localhost:3000',
				description: 'Local Server',
			},
		],
	},
	apis: ['./src/containers/*.ts'],
};

const specs = swaggerJsDoc(options);

export { specs, swaggerUI };
