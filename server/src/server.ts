import { createApp, createDependencies } from './app.js';
import { getConfig } from './config/env.js';
import { ConfigValidator } from './lib/config/config-validator.js';
import { destroyRateLimiter } from './middleware/rate-limit.middleware.js';
import { logger, errorContext } from './lib/logger/structured-logger.js';

new ConfigValidator().validateOrThrow();

const config = getConfig();
const deps = createDependencies(config);

if (!deps.llm) {
    logger.warn('OPENAI_API_KEY is not set. /api/v1/process-menus will answer 503 until it is provided.');
}
if (!deps.places) {
    logger.warn('APIFY_API_TOKEN is not set. Scans will only serve cached restaurants.');
}

const app = createApp(deps);
const server = app.listen(config.port, () => {
    logger.info(`Server listening on http://localhost:${config.port}`);
});

function shutdown(signal: NodeJS.Signals) {
    logger.info(`Received ${signal}. Shutting down gracefully...`);
    server.close(() => {
        logger.info({ background: deps.background.getStats() }, 'Server closed, waiting for background tasks');
        destroyRateLimiter();
        deps.background.drain()
            .then(() => {
                logger.info('Background tasks drained');
                process.exit(0);
            })
            .catch((err: unknown) => {
                logger.error({ err: errorContext(err) }, 'Background drain failed');
                process.exit(1);
            });
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
