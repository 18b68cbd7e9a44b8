import dotenv from 'dotenv';
import { createApp } from './api/createApp';
import { loadPipelineConfig } from './config/pipelineConfig';
import { errorMessage } from './errors/pipelineErrors';
import { createTradeServices } from './services/pipelineFactory';
import { logger } from './utils/logger';

dotenv.config();

async function bootstrap() {
    const config = loadPipelineConfig();
    const { pipeline, store, interpreter, notifier } = createTradeServices(config);
    await store.init();

    if (!notifier) {
        logger.warn('[Startup] SENDGRID_API_KEY, FROM_EMAIL and TO_EMAIL are not all set; notifications are disabled');
    }
    logger.info(`[Startup] interpreter=${interpreter.name} provider=${interpreter.provider} artifacts=${config.artifactMode}`);

    const app = createApp({ pipeline, store, allowedOrigins: config.allowedOrigins });
    app.listen(config.port, () => {
        logger.info(`[Startup] trade journal API listening on port ${config.port}`);
    });
}

bootstrap().catch((error) => {
    logger.error(`[Startup] failed to bootstrap: ${errorMessage(error)}`);
    process.exit(1);
});
