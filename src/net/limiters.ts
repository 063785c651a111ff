import { RateLimiter } from "./rateLimiter";

// Nominatim usage policy: at most one request per second.
export const nominatimRateLimiter = new RateLimiter({
  qps: 1,
  burst: 1
});

export const overpassRateLimiter = new RateLimiter({
  qps: 2,
  burst: 2,
  jitterRatio: 0.2
});
