import { FastifyInstance } from 'fastify';

export type HealthRoutesOptions = {
    /** Store backend readiness; always true for the in-memory driver */
    isDatabaseReady: () => boolean;
};

interface HealthStatus {
    status: 'healthy' | 'unhealthy';
    timestamp: string;
    uptime: number;
    checks: {
        database: {
            status: 'up' | 'down';
            responseTime?: number;
        };
        memory: {
            usage: number;
            limit: number;
            percentage: number;
        };
    };
}

const MEMORY_LIMIT_BYTES = 512 * 1024 * 1024;

export async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions) {

    /**
     * Liveness probe - Is the app running?
     */
    fastify.get('/health', async (req, reply) => {
        return reply.send({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            uptime: process.uptime()
        });
    });

    /**
     * Readiness probe - Can the app serve traffic?
     */
    fastify.get('/ready', async (req, reply) => {
        const startTime = Date.now();

        const dbStatus = opts.isDatabaseReady() ? 'up' : 'down';
        const dbResponseTime = Date.now() - startTime;

        const memUsage = process.memoryUsage();
        const memPercentage = (memUsage.heapUsed / MEMORY_LIMIT_BYTES) * 100;

        const health: HealthStatus = {
            status: dbStatus === 'up' && memPercentage < 90 ? 'healthy' : 'unhealthy',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            checks: {
                database: {
                    status: dbStatus,
                    responseTime: dbResponseTime
                },
                memory: {
                    usage: memUsage.heapUsed,
                    limit: MEMORY_LIMIT_BYTES,
                    percentage: Math.round(memPercentage)
                }
            }
        };

        const statusCode = health.status === 'healthy' ? 200 : 503;
        return reply.status(statusCode).send(health);
    });
}
