import { env } from './config/env';
import { buildApp } from './app';
import { createContainer } from './container';
import { connectDatabase, disconnectDatabase } from './database/database.module';
import { logger } from './shared/kernel/logger';
import { startScheduledJobs, stopScheduledJobs } from './domains/voting/jobs/scheduled-jobs';

const start = async () => {
    const container = createContainer();

    // 1. Connect to Database
    if (container.driver === 'mongo') {
        await connectDatabase();
    } else {
        logger.warn('STORE_DRIVER=memory: all data is lost on restart');
    }

    // 2. HTTP application
    const app = await buildApp(container);

    // 3. Scheduled jobs
    const tasks = startScheduledJobs([
        {
            name: 'voting-deadlines',
            schedule: env.DEADLINE_CHECK_CRON,
            run: () => container.lifecycle.checkVotingDeadlines(new Date())
        },
        {
            name: 'otp-sweep',
            schedule: env.OTP_SWEEP_CRON,
            run: () => container.verification.cleanupExpired()
        }
    ]);

    // 4. Graceful Shutdown Handlers
    const shutdown = async (signal: string) => {
        app.log.info(`Received ${signal}, closing server gracefully...`);
        stopScheduledJobs(tasks);
        await app.close();
        if (container.driver === 'mongo') {
            await disconnectDatabase();
        }
        process.exit(0);
    };

    ['SIGINT', 'SIGTERM'].forEach(signal => {
        process.once(signal, () => {
            shutdown(signal).catch((err: unknown) => {
                logger.error({ err }, 'Error during shutdown');
                process.exit(1);
            });
        });
    });

    // 5. Start Server
    const port = parseInt(env.PORT, 10);
    await app.listen({ port, host: '0.0.0.0' });
    app.log.info(`Savings governance API running on :${port}`);
};

start().catch((err: unknown) => {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
});
