import { createApp } from './app.js';
import { getConfig } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import { ConfigValidator } from './lib/config/config-validator.js';

const config = getConfig();
new ConfigValidator(config, logger).validateOrThrow();

const app = createApp();
const server = app.listen(config.port, () => {
    logger.info(`Server listening on http://localhost:${config.port}`);
});

function shutdown(signal: NodeJS.Signals) {
    logger.info(`Received ${signal}. Shutting down gracefully...`);
    server.close(() => {
        logger.info('Server closed');
        process.exit(0);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
