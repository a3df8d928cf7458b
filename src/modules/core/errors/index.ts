export * from './review.errors';
