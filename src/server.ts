import app from './app';
import { appConfig } from './config';
import { closePool } from './database';
import Logger from './utils/logger';

const methodContext = 'Server';

export const server = app.listen(appConfig.port, '0.0.0.0', () => {
    Logger.info(`Server running at port ${appConfig.port}`, methodContext, {
        mode: appConfig.mode,
    });
});

const shutdown = (signal: string) => {
    Logger.info(`Received ${signal}, shutting down`, methodContext);
    server.close(() => {
        closePool()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                Logger.error('Error closing database pool', methodContext, error);
                process.exit(1);
            });
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
