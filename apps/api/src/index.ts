import dotenv from 'dotenv';
import path from 'path';
import { createApp, createServices } from './app';
import { loadConfig } from './config';
import logger from './utils/logger';

// Try multiple paths for .env file
const envPaths = [
	path.resolve(__dirname, '../../.env'),           // For compiled code in dist/
	path.resolve(process.cwd(), '.env'),             // Current working directory
	path.resolve(process.cwd(), '../../.env'),       // Two levels up from apps/api
];
let envLoaded = false;
for (const envPath of envPaths) {
	const result = dotenv.config({ path: envPath });
	if (result.error === undefined) {
		logger.info('[STARTUP] Loaded .env', { path: envPath });
		envLoaded = true;
		break;
	}
}

if (!envLoaded) {
	logger.warn('[STARTUP] Could not find .env file', { paths: envPaths });
}

const config = loadConfig();

if (!config.openRouter.apiKey) {
	logger.warn('[STARTUP] OPENROUTER_API_KEY is not set; upstream calls will be rejected');
}

const app = createApp(createServices(config));

const server = app.listen(config.port, () => {
	logger.info('API server running', {
		port: config.port,
		environment: config.environment,
		upstream: config.openRouter.baseUrl,
	});
});

// Graceful shutdown
process.on('SIGTERM', () => {
	logger.info('SIGTERM signal received: closing HTTP server');
	server.close(() => {
		logger.info('HTTP server closed, exiting process');
		process.exit(0);
	});
});
