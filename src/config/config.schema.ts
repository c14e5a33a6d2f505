import * as Joi from 'joi';

export const configValidationSchema = Joi.object({
  // Server
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().default(5000),
  REQUEST_TIMEOUT_MS: Joi.number().default(30000),

  // CORS
  CORS_ORIGIN: Joi.string().default('http://localhost:3000'),

  // Live feed
  CRICBUZZ_FEED_URL: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .default('http://synd.cricbuzz.com/j2me/1.0/livematches.xml'),
  CRICBUZZ_FEED_TIMEOUT_MS: Joi.number().integer().min(1).default(10000),
  FEED_PARSE_POLICY: Joi.string().valid('abort', 'skip').default('abort'),
});
