export { RateLimiter } from './rate-limiter.service';
