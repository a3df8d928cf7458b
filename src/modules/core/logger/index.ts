export * from './logger';
export * from './interfaces/logger.interface';
