import cron, { ScheduledTask } from 'node-cron';
import { logger } from '../../../shared/kernel/logger';

export interface JobDefinition {
    name: string;
    schedule: string;
    run: () => Promise<unknown>;
}

/**
 * Wraps a job so a tick that fires while the previous run is still going is skipped.
 * Errors are logged, never rethrown into the scheduler.
 */
export function nonOverlapping(job: JobDefinition): () => Promise<void> {
    let running = false;

    return async () => {
        if (running) {
            logger.warn({ job: job.name }, '[CRON] Previous run still in progress, skipping');
            return;
        }

        running = true;
        const startedAt = Date.now();
        try {
            const result = await job.run();
            logger.debug({ job: job.name, result, durationMs: Date.now() - startedAt }, '[CRON] Job finished');
        } catch (error) {
            logger.error({ job: job.name, err: error }, '[CRON] Job failed');
        } finally {
            running = false;
        }
    };
}

export function startScheduledJobs(jobs: JobDefinition[]): ScheduledTask[] {
    return jobs.map(job => {
        if (!cron.validate(job.schedule)) {
            throw new Error(`Invalid cron expression for ${job.name}: ${job.schedule}`);
        }

        const tick = nonOverlapping(job);
        const task = cron.schedule(job.schedule, () => {
            void tick();
        }, { timezone: 'UTC' });

        logger.info({ job: job.name, schedule: job.schedule }, '[CRON] Job scheduled');
        return task;
    });
}

export const stopScheduledJobs = (tasks: ScheduledTask[]) => {
    tasks.forEach(task => task.stop());
};
