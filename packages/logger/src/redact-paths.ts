/**
 * Property names that carry credentials in this system's log bindings
 * (provider keys, connection strings, auth headers).
 */
const SENSITIVE_KEYS = [
  "apiKey",
  "api_key",
  "authorization",
  "password",
  "secret",
  "token",
  "databaseUrl",
  "redisUrl",
] as const;

/**
 * JSON paths for Pino's `redact` option: each key at the top level and one
 * level down (e.g. `config.apiKey`, `headers.authorization`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
];
