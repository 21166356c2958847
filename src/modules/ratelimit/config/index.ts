export { rateLimitConfig } from './rate-limit.config';
