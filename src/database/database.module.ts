import mongoose from 'mongoose';
import { env } from '../config/env';
import { logger } from '../shared/kernel/logger';

export const connectDatabase = async (uri: string = env.MONGO_URI) => {
    mongoose.connection.on('connected', () => {
        logger.info('MongoDB connected successfully');
    });

    mongoose.connection.on('error', (err) => {
        logger.error({ err }, 'MongoDB connection error');
    });

    mongoose.connection.on('disconnected', () => {
        logger.warn('MongoDB disconnected');
    });

    await mongoose.connect(uri, {
        autoIndex: env.NODE_ENV !== 'production',
        maxPoolSize: 10,
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 45000,
    });
};

export const isDatabaseConnected = (): boolean => mongoose.connection.readyState === 1;

export const disconnectDatabase = async () => {
    await mongoose.disconnect();
};
